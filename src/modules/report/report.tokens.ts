// src/modules/report/report.tokens.ts
// 报表相关的 DI token 定义

export const REPORT_TOKENS = {
  DATA_SOURCE: Symbol('REPORT_DATA_SOURCE'),
  DEFINITIONS: Symbol('REPORT_DEFINITIONS'),
  SETTINGS: Symbol('REPORT_SETTINGS'),
} as const;
