// src/core/common/errors/validate-input.decorator.ts

import { BadRequestException, UsePipes, ValidationPipe } from '@nestjs/common';
import { ValidationError } from 'class-validator';
import { REPORT_ERROR } from './domain-error';
import { formatValidationErrors } from './validation.formatter';

/**
 * 报表输入校验的异常工厂
 * 只校验 GraphQL 输入的形状；页码、排序等取值是否合法由用例层归一化，不在这里拒绝
 */
export function createInputValidationException(errors: ValidationError[]): BadRequestException {
  return new BadRequestException({
    errorCode: REPORT_ERROR.INPUT_INVALID,
    errorMessage: formatValidationErrors(errors).join('; '),
  });
}

/**
 * 输入验证装饰器
 * 为 GraphQL resolver 方法提供标准的输入验证，并返回详细的错误消息
 */
// eslint-disable-next-line @typescript-eslint/naming-convention
export const ValidateInput = () =>
  UsePipes(
    new ValidationPipe({
      whitelist: true, // 自动移除非装饰器属性
      forbidNonWhitelisted: true,
      transform: true,
      stopAtFirstError: false, // 显示所有验证错误
      validationError: {
        target: false,
        value: false,
      },
      exceptionFactory: createInputValidationException,
    }),
  );
