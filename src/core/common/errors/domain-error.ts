// src/core/common/errors/domain-error.ts
// 领域错误与错误码：跨层共享的核心错误定义

/**
 * 领域错误类
 * 用于表示业务逻辑层的错误，可在 Service、Usecase 和 Adapter 层之间传递
 */
export class DomainError extends Error {
  readonly code: string;
  readonly details?: unknown;
  readonly cause?: unknown;

  constructor(code: string, message: string, details?: unknown, cause?: unknown) {
    super(message);
    this.name = 'DomainError';
    this.code = code;
    this.details = details;
    this.cause = cause;

    // 兼容某些编译目标/测试环境的原型链问题，确保 instanceof 正常
    Object.setPrototypeOf(this, new.target.prototype);
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, DomainError);
    }
  }

  toJSON() {
    return { name: this.name, code: this.code, message: this.message, details: this.details };
  }
}

// 报表相关错误码
export const REPORT_ERROR = {
  CONFIGURATION_INVALID: 'REPORT_CONFIGURATION_INVALID',
  OVERRUN_EXHAUSTED: 'REPORT_OVERRUN_EXHAUSTED',
  NOT_FOUND: 'REPORT_NOT_FOUND',
  DB_QUERY_FAILED: 'REPORT_DB_QUERY_FAILED',
  INPUT_INVALID: 'REPORT_INPUT_INVALID',
} as const;
Object.freeze(REPORT_ERROR);

// 类型辅助
export type ReportErrorCode = (typeof REPORT_ERROR)[keyof typeof REPORT_ERROR];

/**
 * 报表配置错误
 * 只在定义报表时抛出（默认排序列非法、列为空、页大小非正数等），属于编程错误，不做重试
 */
export class ConfigurationError extends DomainError {
  constructor(message: string, details?: unknown) {
    super(REPORT_ERROR.CONFIGURATION_INVALID, message, details);
    this.name = 'ConfigurationError';
  }
}

/**
 * 翻页越界重试耗尽
 * 说明结果集在分页读取期间持续变化，请求必须失败而不是继续循环
 */
export class OverrunExhaustedError extends DomainError {
  constructor(message: string, details?: unknown) {
    super(REPORT_ERROR.OVERRUN_EXHAUSTED, message, details);
    this.name = 'OverrunExhaustedError';
  }
}

const DOMAIN_ERROR_NAMES: ReadonlySet<string> = new Set([
  'DomainError',
  'ConfigurationError',
  'OverrunExhaustedError',
]);

// 类型守卫：统一判断是否为领域错误（兼容多包/反序列化场景）
export const isDomainError = (error: unknown): error is DomainError => {
  if (error instanceof DomainError) return true;
  if (!error || typeof error !== 'object') return false;
  const candidate = error as { name?: unknown; code?: unknown };
  return (
    typeof candidate.name === 'string' &&
    DOMAIN_ERROR_NAMES.has(candidate.name) &&
    typeof candidate.code === 'string'
  );
};
