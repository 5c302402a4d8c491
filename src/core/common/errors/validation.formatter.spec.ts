// src/core/common/errors/validation.formatter.spec.ts
import { HttpStatus } from '@nestjs/common';
import { ValidationError } from 'class-validator';
import { REPORT_ERROR } from './domain-error';
import { createInputValidationException } from './validate-input.decorator';
import { formatValidationErrors } from './validation.formatter';

function validationError(
  property: string,
  constraints?: Record<string, string>,
  children: ValidationError[] = [],
): ValidationError {
  const error = new ValidationError();
  error.property = property;
  error.constraints = constraints;
  error.children = children;
  return error;
}

describe('formatValidationErrors', () => {
  it('带上嵌套字段路径', () => {
    const errors = [
      validationError('name', { isNotEmpty: '报表名称不能为空' }),
      validationError('params', undefined, [
        validationError('0', undefined, [validationError('key', { isNotEmpty: '参数名不能为空' })]),
      ]),
    ];

    expect(formatValidationErrors(errors)).toEqual([
      'name: 报表名称不能为空',
      'params.0.key: 参数名不能为空',
    ]);
  });
});

describe('createInputValidationException', () => {
  it('生成带业务码的 400 异常', () => {
    const exception = createInputValidationException([
      validationError('name', { isString: '报表名称必须是字符串', isNotEmpty: '报表名称不能为空' }),
    ]);

    expect(exception.getStatus()).toBe(HttpStatus.BAD_REQUEST);
    expect(exception.getResponse()).toEqual({
      errorCode: REPORT_ERROR.INPUT_INVALID,
      errorMessage: 'name: 报表名称必须是字符串; name: 报表名称不能为空',
    });
  });
});
