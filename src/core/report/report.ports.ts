// src/core/report/report.ports.ts
// 端口接口：报表数据源，零依赖抽象

import type { QueryPlan, ReportDefinition } from './report.types';

export type ReportRow = Readonly<Record<string, unknown>>;

export interface ReportFetchResult {
  /** 本次查询观测到的结果总数 */
  readonly totalCount: number;
  readonly rows: ReadonlyArray<ReportRow>;
}

/**
 * 报表数据源，核心层不直接访问数据库
 * - FOUND_ROWS：只调用 fetchPage，数据查询顺带带回总数
 * - COUNT_QUERY：先 countRows 核对页码，再 fetchPage 并传入 knownTotal 省去重复计数
 */
export interface IReportDataSource {
  countRows(input: { readonly definition: ReportDefinition }): Promise<number>;

  fetchPage(input: {
    readonly definition: ReportDefinition;
    readonly plan: QueryPlan;
    /** 调用方刚统计过的总数；本页为空时数据源应重新计数 */
    readonly knownTotal?: number;
  }): Promise<ReportFetchResult>;
}
