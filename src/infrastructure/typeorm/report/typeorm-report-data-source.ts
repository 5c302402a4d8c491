// src/infrastructure/typeorm/report/typeorm-report-data-source.ts
// IReportDataSource 的 TypeORM 实现：支持 FOUND_ROWS 与 COUNT_QUERY 两种总数统计方式

import { DomainError, REPORT_ERROR, isDomainError } from '@core/common/errors/domain-error';
import type {
  IReportDataSource,
  ReportFetchResult,
  ReportRow,
} from '@core/report/report.ports';
import type { QueryPlan, ReportDefinition } from '@core/report/report.types';
import type { DataSource, QueryRunner } from 'typeorm';

const COUNT_ALIAS = 'num';

/**
 * 组装数据查询语句
 * @param calcFoundRows 是否加上 SQL_CALC_FOUND_ROWS（MySQL 在同一连接上通过 FOUND_ROWS() 取总数）
 */
export function buildSelectStatement(
  definition: ReportDefinition,
  plan: QueryPlan,
  calcFoundRows: boolean,
): string {
  const modifier = calcFoundRows ? 'SQL_CALC_FOUND_ROWS ' : '';
  return `SELECT ${modifier}${plan.projectedFields.join(', ')} ${definition.sqlFragment} ${plan.orderByClause} ${plan.limitClause}`;
}

/**
 * 组装总数查询语句
 * 用子查询包裹，保证 sqlFragment 中带 GROUP BY / HAVING 时统计的是分组后的行数；
 * 子查询投影全部列，HAVING 才能引用列别名
 */
export function buildCountStatement(definition: ReportDefinition): string {
  const fields = definition.columns.map((c) => c.queryFragment).join(', ');
  return `SELECT COUNT(*) AS ${COUNT_ALIAS} FROM (SELECT ${fields} ${definition.sqlFragment}) AS report_count`;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * 从总数查询结果中读取计数（驱动可能以 number / string / bigint 返回）
 */
export function readCount(raw: unknown): number {
  const first: unknown = Array.isArray(raw) ? raw[0] : undefined;
  const value = isRecord(first) ? first[COUNT_ALIAS] : undefined;
  const count = value === undefined || value === null ? Number.NaN : Number(value);
  if (!Number.isSafeInteger(count) || count < 0) {
    throw new DomainError(REPORT_ERROR.DB_QUERY_FAILED, '无法读取结果总数', { value: String(value) });
  }
  return count;
}

function readRows(raw: unknown): ReadonlyArray<ReportRow> {
  if (!Array.isArray(raw)) {
    throw new DomainError(REPORT_ERROR.DB_QUERY_FAILED, '数据查询返回了非数组结果');
  }
  return raw.filter(isRecord);
}

export class TypeOrmReportDataSource implements IReportDataSource {
  constructor(private readonly dataSource: DataSource) {}

  async countRows(input: { readonly definition: ReportDefinition }): Promise<number> {
    const { definition } = input;
    return this.withRunner(definition, async (runner) => {
      const rawCount: unknown = await runner.query(buildCountStatement(definition));
      return readCount(rawCount);
    });
  }

  async fetchPage(input: {
    readonly definition: ReportDefinition;
    readonly plan: QueryPlan;
    readonly knownTotal?: number;
  }): Promise<ReportFetchResult> {
    const { definition, plan, knownTotal } = input;
    return this.withRunner(definition, (runner) =>
      definition.countStrategy === 'FOUND_ROWS'
        ? this.fetchWithFoundRows(runner, definition, plan)
        : this.fetchWithCountQuery(runner, definition, plan, knownTotal),
    );
  }

  /**
   * FOUND_ROWS() 依赖同一连接，因此每次操作都独占一个 QueryRunner
   * 驱动错误统一包装为 DB_QUERY_FAILED
   */
  private async withRunner<T>(
    definition: ReportDefinition,
    work: (runner: QueryRunner) => Promise<T>,
  ): Promise<T> {
    const runner = this.dataSource.createQueryRunner();
    try {
      await runner.connect();
      return await work(runner);
    } catch (error) {
      if (isDomainError(error)) throw error;
      throw new DomainError(
        REPORT_ERROR.DB_QUERY_FAILED,
        '报表查询失败',
        { report: definition.name, error: error instanceof Error ? error.message : '未知错误' },
        error,
      );
    } finally {
      await runner.release();
    }
  }

  private async fetchWithFoundRows(
    runner: QueryRunner,
    definition: ReportDefinition,
    plan: QueryPlan,
  ): Promise<ReportFetchResult> {
    const rawRows: unknown = await runner.query(buildSelectStatement(definition, plan, true));
    const rawCount: unknown = await runner.query(`SELECT FOUND_ROWS() AS ${COUNT_ALIAS}`);
    return { totalCount: readCount(rawCount), rows: readRows(rawRows) };
  }

  private async fetchWithCountQuery(
    runner: QueryRunner,
    definition: ReportDefinition,
    plan: QueryPlan,
    knownTotal: number | undefined,
  ): Promise<ReportFetchResult> {
    if (knownTotal === undefined) {
      const rawCount: unknown = await runner.query(buildCountStatement(definition));
      const rawRows: unknown = await runner.query(buildSelectStatement(definition, plan, false));
      return { totalCount: readCount(rawCount), rows: readRows(rawRows) };
    }

    const rows = readRows(await runner.query(buildSelectStatement(definition, plan, false)));
    // 已统计的总数说明本页存在，却取不到数据：结果集在计数后缩小了，重新计数交给上层核对
    if (rows.length === 0 && knownTotal > 0) {
      const rawCount: unknown = await runner.query(buildCountStatement(definition));
      return { totalCount: readCount(rawCount), rows };
    }
    return { totalCount: knownTotal, rows };
  }
}
