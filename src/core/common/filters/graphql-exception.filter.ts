// src/core/common/filters/graphql-exception.filter.ts
import type { ExceptionPayload } from '@app-types/errors/exception-payload';
import { DomainError, isDomainError, REPORT_ERROR } from '@core/common/errors';
import { ArgumentsHost, Catch, HttpException } from '@nestjs/common';
import { BaseExceptionFilter } from '@nestjs/core';
import { GqlArgumentsHost } from '@nestjs/graphql';
import { GraphQLError, GraphQLResolveInfo } from 'graphql';

/** 将 HTTP 状态码映射为 GraphQL 标准错误类别代码（extensions.code）
 *  注意：这是 GraphQL/Apollo 通用的大类，不是业务 errorCode（业务码放在 extensions.errorCode）
 */
export function mapHttpToGqlCode(status: number): string {
  switch (status) {
    case 400:
    case 422:
      return 'BAD_USER_INPUT';
    case 404:
      return 'NOT_FOUND';
    case 409:
      return 'CONFLICT';
    default:
      return 'INTERNAL_SERVER_ERROR';
  }
}

// 报表错误码 => GraphQL 错误类别；未列出的一律视为服务端错误
const DOMAIN_CODE_MAP: Readonly<Record<string, string>> = {
  [REPORT_ERROR.NOT_FOUND]: 'NOT_FOUND',
  [REPORT_ERROR.OVERRUN_EXHAUSTED]: 'CONFLICT',
  [REPORT_ERROR.CONFIGURATION_INVALID]: 'INTERNAL_SERVER_ERROR',
  [REPORT_ERROR.DB_QUERY_FAILED]: 'INTERNAL_SERVER_ERROR',
  [REPORT_ERROR.INPUT_INVALID]: 'BAD_USER_INPUT',
};

export function mapDomainErrorToGqlCode(errorCode: string): string {
  return DOMAIN_CODE_MAP[errorCode] ?? 'INTERNAL_SERVER_ERROR';
}

function isPayload(value: unknown): value is ExceptionPayload {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** 从异常响应中提取错误信息 */
function extractPayload(resp: unknown): {
  code?: string;
  errorCode?: string;
  errorMessage?: string;
  fallbackMsg?: string;
} {
  if (typeof resp === 'string') {
    return { errorMessage: resp };
  }
  if (!isPayload(resp)) return {};
  const code = typeof resp.code === 'string' ? resp.code : undefined;
  const errorCode = typeof resp.errorCode === 'string' ? resp.errorCode : undefined;
  const explicitMsg = typeof resp.errorMessage === 'string' ? resp.errorMessage : undefined;

  let fallbackMsg: string | undefined;
  const msg = resp.message;
  if (Array.isArray(msg)) fallbackMsg = msg.join(', ');
  else if (typeof msg === 'string') fallbackMsg = msg;

  return { code, errorCode, errorMessage: explicitMsg, fallbackMsg };
}

/** 获取 GraphQL 字段路径 */
function getGqlPath(host: ArgumentsHost): string[] | undefined {
  const gqlHost = GqlArgumentsHost.create(host);
  const info = gqlHost.getInfo<GraphQLResolveInfo | undefined>();
  const field = info?.fieldName;
  return field ? [field] : undefined;
}

/** 根据 HttpException 构建 GraphQL 错误对象（ValidateInput 的校验失败走这里） */
function buildGraphQLErrorFromHttpException(
  exception: HttpException,
  host: ArgumentsHost,
): GraphQLError {
  const status = exception.getStatus();
  const { code, errorCode, errorMessage, fallbackMsg } = extractPayload(exception.getResponse());
  const finalMessage = errorMessage ?? fallbackMsg ?? exception.message;

  return new GraphQLError(finalMessage, {
    path: getGqlPath(host),
    extensions: {
      code: code ?? mapHttpToGqlCode(status),
      httpStatus: status,
      ...(errorCode ? { errorCode } : {}),
      ...(errorMessage ? { errorMessage } : {}),
    },
  });
}

/** 从未知异常构建 GraphQL 错误 */
function buildGraphQLErrorFromUnknown(exception: unknown, host: ArgumentsHost): GraphQLError {
  const msg = exception instanceof Error ? exception.message : 'Internal server error';

  return new GraphQLError(msg, {
    path: getGqlPath(host),
    extensions: {
      code: 'INTERNAL_SERVER_ERROR',
      httpStatus: 500,
      errorCode: 'INTERNAL_ERROR',
    },
  });
}

/** 从 DomainError 构建 GraphQL 错误对象 */
function buildGraphQLErrorFromDomainError(
  exception: DomainError,
  host: ArgumentsHost,
): GraphQLError {
  return new GraphQLError(exception.message, {
    path: getGqlPath(host),
    extensions: {
      code: mapDomainErrorToGqlCode(exception.code),
      errorCode: exception.code,
      errorMessage: exception.message,
      ...(exception.details ? { details: exception.details } : {}),
    },
  });
}

/** GraphQL 全局异常过滤器 */
@Catch()
export class GqlAllExceptionsFilter extends BaseExceptionFilter {
  override catch(exception: unknown, host: ArgumentsHost) {
    // HTTP 请求仍用默认处理；其余（GraphQL/RPC/WS）走下方分支
    if (host.getType() === 'http') {
      return super.catch(exception, host);
    }

    if (isDomainError(exception)) {
      return buildGraphQLErrorFromDomainError(exception, host);
    }

    if (exception instanceof HttpException) {
      return buildGraphQLErrorFromHttpException(exception, host);
    }

    return buildGraphQLErrorFromUnknown(exception, host);
  }
}
