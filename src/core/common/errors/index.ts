// src/core/common/errors/index.ts
// 错误相关导出的统一入口

export * from './domain-error';
// validate-input.decorator / validation.formatter 依赖框架，按需从文件直接导入
