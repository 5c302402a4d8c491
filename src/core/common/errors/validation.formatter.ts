// src/core/common/errors/validation.formatter.ts

import { ValidationError } from 'class-validator';

/**
 * 展开校验错误为带字段路径的消息列表
 * 嵌套对象与数组元素的路径用点号连接，例如 `params.0.key: 参数名不能为空`
 * @param errors class-validator 返回的错误树
 * @param parentPath 上层字段路径
 */
export function formatValidationErrors(errors: ValidationError[], parentPath = ''): string[] {
  return errors.flatMap((error) => {
    const path = parentPath ? `${parentPath}.${error.property}` : error.property;
    const own = Object.values(error.constraints ?? {}).map((message) => `${path}: ${message}`);
    return [...own, ...formatValidationErrors(error.children ?? [], path)];
  });
}
