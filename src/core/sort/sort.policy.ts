// src/core/sort/sort.policy.ts
// 排序规则与纯函数：排序键白名单回退、方向归一化、表头链接

import { ConfigurationError } from '@core/common/errors/domain-error';
import type { SortDirection } from '@core/pagination/pagination.types';
import { buildLinkParams, type LinkContext } from '@core/report/link-params';
import type { ColumnSpec } from '@core/report/report.types';
import type { SortHeader, SortState } from './sort.types';

/**
 * 归一化排序方向：仅接受大小写不敏感的 asc / desc，其余一律为 ASC
 */
export function normalizeDirection(direction: unknown): SortDirection {
  if (typeof direction !== 'string') return 'ASC';
  return direction.trim().toUpperCase() === 'DESC' ? 'DESC' : 'ASC';
}

export function toggleDirection(direction: SortDirection): SortDirection {
  return direction === 'ASC' ? 'DESC' : 'ASC';
}

function isSortableKey(columns: ReadonlyArray<ColumnSpec>, key: unknown): key is string {
  if (typeof key !== 'string' || key.length === 0) return false;
  return columns.some((c) => c.key === key && c.sortable);
}

/**
 * 解析排序状态
 * - 排序键缺失、为空或不在可排序列中 => 默认排序键
 * - 默认排序键本身非法属于配置错误
 */
export function resolveSortState(
  requestedKey: unknown,
  requestedDirection: unknown,
  columns: ReadonlyArray<ColumnSpec>,
  defaultKey: string,
): SortState {
  if (!isSortableKey(columns, defaultKey)) {
    throw new ConfigurationError(`默认排序列非法或不可排序: ${defaultKey}`, { defaultKey });
  }
  return {
    activeKey: isSortableKey(columns, requestedKey) ? requestedKey : defaultKey,
    direction: normalizeDirection(requestedDirection),
  };
}

/**
 * 生成表头条目
 * 可排序列的链接：当前排序列翻转方向，其余列从 ASC 开始；保留当前页码与透传参数
 */
export function buildSortHeaders(
  columns: ReadonlyArray<ColumnSpec>,
  sortState: SortState,
  context: LinkContext,
): ReadonlyArray<SortHeader> {
  return columns.map((column) => {
    const active = column.key === sortState.activeKey;
    if (!column.sortable) {
      return {
        key: column.key,
        label: column.displayLabel,
        sortable: false,
        active,
        direction: active ? sortState.direction : null,
        params: null,
      };
    }
    const direction = active ? toggleDirection(sortState.direction) : 'ASC';
    return {
      key: column.key,
      label: column.displayLabel,
      sortable: true,
      active,
      direction: active ? sortState.direction : null,
      params: buildLinkParams(
        { page: context.currentIndex, sortKey: column.key, direction },
        context,
      ),
    };
  });
}
