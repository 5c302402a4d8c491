// src/core/report/query-planner.ts
// 查询计划：由排序状态与页码状态生成 ORDER BY / LIMIT 子句，纯函数

import { ConfigurationError } from '@core/common/errors/domain-error';
import type { PageState } from '@core/pagination/pagination.types';
import type { SortState } from '@core/sort/sort.types';
import type { ColumnSpec, QueryPlan } from './report.types';

/**
 * 生成查询计划
 * - orderByClause 使用列的 orderFragment，而不是展示用的 queryFragment
 * - limitClause 采用 MySQL 的 `LIMIT offset, count`，offset 从 0 开始
 * - projectedFields 按声明顺序原样输出每列的 queryFragment
 */
export function planQuery(
  sortState: SortState,
  pageState: PageState,
  columns: ReadonlyArray<ColumnSpec>,
): QueryPlan {
  const column = columns.find((c) => c.key === sortState.activeKey);
  if (!column || !column.sortable) {
    throw new ConfigurationError(`排序列不可用: ${sortState.activeKey}`, {
      activeKey: sortState.activeKey,
    });
  }

  const offset = (pageState.requestedIndex - 1) * pageState.pageSize;
  const limit = pageState.pageSize;
  return {
    orderByClause: `ORDER BY ${column.orderFragment} ${sortState.direction}`,
    limitClause: `LIMIT ${offset}, ${limit}`,
    projectedFields: columns.map((c) => c.queryFragment),
    offset,
    limit,
  };
}
