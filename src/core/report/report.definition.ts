// src/core/report/report.definition.ts
// 报表定义的校验与构建：所有配置错误都在这里一次性暴露

import { ConfigurationError } from '@core/common/errors/domain-error';
import { DEFAULT_PAGE_LINK_LABELS } from '@core/pagination/page-list.policy';
import { assertPositiveInteger } from '@core/pagination/pagination.policy';
import { normalizeColumns, toResultField } from './column.factory';
import type {
  CountStrategy,
  ReportDefaults,
  ReportDefinition,
  ReportDefinitionInput,
} from './report.types';

export const DEFAULT_REPORT_DEFAULTS: ReportDefaults = Object.freeze({
  pageSize: 25,
  windowSize: 5,
  countStrategy: 'FOUND_ROWS',
  columnSortDefault: true,
});

const COUNT_STRATEGIES: ReadonlyArray<CountStrategy> = ['FOUND_ROWS', 'COUNT_QUERY'];

/**
 * 校验并构建报表定义
 * @param input 原始定义
 * @param defaults 全局默认值（来自配置），定义中的显式值优先
 * @throws ConfigurationError 名称/SQL 片段为空、列为空或重复、结果字段重名、默认排序列不可排序、页大小非法等
 */
export function createReportDefinition(
  input: ReportDefinitionInput,
  defaults: ReportDefaults = DEFAULT_REPORT_DEFAULTS,
): ReportDefinition {
  if (typeof input.name !== 'string' || input.name.trim().length === 0) {
    throw new ConfigurationError('报表名称不能为空');
  }
  const name = input.name.trim();
  if (typeof input.sqlFragment !== 'string' || input.sqlFragment.trim().length === 0) {
    throw new ConfigurationError(`报表 ${name} 缺少 sqlFragment`, { report: name });
  }

  const columns = normalizeColumns(
    input.columns,
    input.columnSortDefault ?? defaults.columnSortDefault,
  );

  // 结果行以字段名为键，总数子查询也按字段名投影，同名字段会互相覆盖
  const resultFields = columns.map((c) => toResultField(c.queryFragment));
  const duplicated = resultFields.find((field, index) => resultFields.indexOf(field) !== index);
  if (duplicated !== undefined) {
    throw new ConfigurationError(`报表 ${name} 的结果字段重复: ${duplicated}`, {
      report: name,
      field: duplicated,
    });
  }

  const defaultColumn = columns.find((c) => c.key === input.defaultSort);
  if (!defaultColumn) {
    throw new ConfigurationError(`报表 ${name} 的默认排序列不存在: ${input.defaultSort}`, {
      report: name,
      defaultSort: input.defaultSort,
    });
  }
  if (!defaultColumn.sortable) {
    throw new ConfigurationError(`报表 ${name} 的默认排序列不可排序: ${input.defaultSort}`, {
      report: name,
      defaultSort: input.defaultSort,
    });
  }

  const pageSize = input.pageSize ?? defaults.pageSize;
  const windowSize = input.windowSize ?? defaults.windowSize;
  assertPositiveInteger(pageSize, 'pageSize');
  assertPositiveInteger(windowSize, 'windowSize');

  const countStrategy = input.countStrategy ?? defaults.countStrategy;
  if (!COUNT_STRATEGIES.includes(countStrategy)) {
    throw new ConfigurationError(`报表 ${name} 的总数统计策略非法`, { countStrategy });
  }

  return Object.freeze({
    name,
    sqlFragment: input.sqlFragment.trim(),
    columns,
    resultFields: Object.freeze(resultFields),
    defaultSort: defaultColumn.key,
    pageSize,
    windowSize,
    countStrategy,
    labels: Object.freeze({ ...DEFAULT_PAGE_LINK_LABELS, ...input.labels }),
  });
}
