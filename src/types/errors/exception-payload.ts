// src/types/errors/exception-payload.ts
import type { ReportErrorCode } from '@core/common/errors/domain-error';

/**
 * HttpException 响应体的约定形状
 * ValidationPipe 抛出的 BadRequestException 只带 message；业务异常可携带 errorCode
 */
export interface ExceptionPayload {
  /** 覆盖 GraphQL extensions.code（大类）——很少用 */
  code?: string;
  /** 业务细分码 */
  errorCode?: ReportErrorCode | string;
  /** 业务可读消息 */
  errorMessage?: string;
  /** Nest HttpException 可能带的 message（string | string[]） */
  message?: string | string[];
  [key: string]: unknown;
}
