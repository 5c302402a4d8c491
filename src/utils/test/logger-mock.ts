// src/utils/test/logger-mock.ts
import type { Provider } from '@nestjs/common';
import type { TestingModule } from '@nestjs/testing';
import { getLoggerToken } from 'nestjs-pino';

/**
 * PinoLogger 的测试替身：只保留用到的日志方法，便于断言调用
 */
export interface LoggerMock {
  info: jest.Mock;
  error: jest.Mock;
  warn: jest.Mock;
  debug: jest.Mock;
  trace: jest.Mock;
  fatal: jest.Mock;
  setContext: jest.Mock;
}

export function createLoggerMockValue(): LoggerMock {
  return {
    info: jest.fn(),
    error: jest.fn(),
    warn: jest.fn(),
    debug: jest.fn(),
    trace: jest.fn(),
    fatal: jest.fn(),
    setContext: jest.fn(),
  };
}

/**
 * 创建 @InjectPinoLogger(context) 对应的 mock provider
 * @param context logger 的上下文名称
 */
export function createLoggerMock(context: string): Provider {
  return {
    provide: getLoggerToken(context),
    useValue: createLoggerMockValue(),
  };
}

/**
 * 获取 logger mock 实例，用于验证调用
 * @param module 测试模块
 * @param context logger 上下文
 */
export function getLoggerMock(module: TestingModule, context: string): LoggerMock {
  return module.get<LoggerMock>(getLoggerToken(context));
}
