// src/core/report/column.factory.ts
// 列定义归一化：简写列与详细列统一转换为 ColumnSpec

import { ConfigurationError } from '@core/common/errors/domain-error';
import type { ColumnDefinition, ColumnSpec, DetailedColumnDefinition } from './report.types';

const ALIAS_PATTERN = /^.+\sAS\s+(`[^`]+`|"[^"]+"|[A-Za-z0-9_]+)$/is;
const TABLE_PREFIX_PATTERN = /^[A-Za-z0-9_]+\./;

function upperFirst(value: string): string {
  return value.charAt(0).toUpperCase() + value.slice(1);
}

function requireText(value: unknown, label: string, index: number): string {
  if (typeof value !== 'string' || value.trim().length === 0) {
    throw new ConfigurationError(`第 ${index + 1} 列的 ${label} 不能为空`, { index, [label]: value });
  }
  return value;
}

function fromSimple(name: string, index: number, columnSortDefault: boolean): ColumnSpec {
  const key = requireText(name, 'name', index).trim();
  return {
    key,
    queryFragment: key,
    orderFragment: key,
    displayLabel: upperFirst(key),
    sortable: columnSortDefault,
  };
}

function fromDetailed(def: DetailedColumnDefinition, index: number): ColumnSpec {
  const key = requireText(def.key, 'key', index).trim();
  const queryFragment = requireText(def.sql, 'sql', index);
  const orderFragment =
    def.order === undefined ? queryFragment : requireText(def.order, 'order', index);
  return {
    key,
    queryFragment,
    orderFragment,
    displayLabel: def.display ?? upperFirst(key),
    sortable: def.sortable ?? false,
  };
}

/**
 * 归一化列定义
 * @param columns 简写列（字符串）与详细列可混用
 * @param columnSortDefault 简写列是否可排序；详细列忽略此值
 * @returns 冻结后的 ColumnSpec 列表，顺序与声明一致
 */
export function normalizeColumns(
  columns: ReadonlyArray<ColumnDefinition>,
  columnSortDefault = true,
): ReadonlyArray<ColumnSpec> {
  if (columns.length === 0) {
    throw new ConfigurationError('报表至少需要一列');
  }

  const seen = new Set<string>();
  const specs = columns.map((column, index) => {
    const spec =
      typeof column === 'string'
        ? fromSimple(column, index, columnSortDefault)
        : fromDetailed(column, index);
    if (seen.has(spec.key)) {
      throw new ConfigurationError(`列 key 重复: ${spec.key}`, { key: spec.key });
    }
    seen.add(spec.key);
    return Object.freeze(spec);
  });
  return Object.freeze(specs);
}

/**
 * 推导查询片段在结果行中的字段名
 * - `expr AS alias` => alias（只认末尾的别名，`CAST(x AS CHAR)` 不算）
 * - `t.col` => col
 * - 其他 => 原样
 */
export function toResultField(queryFragment: string): string {
  const trimmed = queryFragment.trim();
  const aliased = ALIAS_PATTERN.exec(trimmed);
  if (aliased) return stripQuotes(aliased[1]);
  if (TABLE_PREFIX_PATTERN.test(trimmed)) return stripQuotes(trimmed.replace(TABLE_PREFIX_PATTERN, ''));
  return stripQuotes(trimmed);
}

function stripQuotes(identifier: string): string {
  const quoted = /^([`"])(.*)\1$/s.exec(identifier);
  return quoted ? quoted[2] : identifier;
}
