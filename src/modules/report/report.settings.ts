// src/modules/report/report.settings.ts
// 从 ConfigService 读取报表默认值，并在启动时完成校验

import { ConfigurationError } from '@core/common/errors/domain-error';
import { assertPositiveInteger } from '@core/pagination/pagination.policy';
import {
  DEFAULT_REQUEST_PARAM_NAMES,
  type RequestParamNames,
} from '@core/report/link-params';
import { DEFAULT_REPORT_DEFAULTS } from '@core/report/report.definition';
import type { CountStrategy, ReportDefaults } from '@core/report/report.types';
import type { ConfigService } from '@nestjs/config';

export interface ReportSettings {
  readonly defaults: ReportDefaults;
  readonly paramNames: RequestParamNames;
}

function toCountStrategy(value: string | undefined): CountStrategy {
  if (value === undefined) return DEFAULT_REPORT_DEFAULTS.countStrategy;
  if (value === 'FOUND_ROWS' || value === 'COUNT_QUERY') return value;
  throw new ConfigurationError(`未知的总数统计策略: ${value}`, { countStrategy: value });
}

/**
 * 读取 report.* 配置
 * 参数名必须互不相同，否则翻页与排序链接会互相覆盖；页大小与窗口大小必须是正整数
 */
export function readReportSettings(config: ConfigService): ReportSettings {
  const paramNames: RequestParamNames = {
    page: config.get<string>('report.params.page', DEFAULT_REQUEST_PARAM_NAMES.page),
    sort: config.get<string>('report.params.sort', DEFAULT_REQUEST_PARAM_NAMES.sort),
    direction: config.get<string>(
      'report.params.direction',
      DEFAULT_REQUEST_PARAM_NAMES.direction,
    ),
  };
  const distinct = new Set([paramNames.page, paramNames.sort, paramNames.direction]);
  if (distinct.size !== 3) {
    throw new ConfigurationError('报表请求参数名不能重复', { ...paramNames });
  }

  const pageSize = config.get<number>('report.pageSize', DEFAULT_REPORT_DEFAULTS.pageSize);
  const windowSize = config.get<number>('report.windowSize', DEFAULT_REPORT_DEFAULTS.windowSize);
  assertPositiveInteger(pageSize, 'report.pageSize');
  assertPositiveInteger(windowSize, 'report.windowSize');

  return {
    defaults: {
      pageSize,
      windowSize,
      countStrategy: toCountStrategy(config.get<string>('report.countStrategy')),
      columnSortDefault: config.get<boolean>(
        'report.columnSortDefault',
        DEFAULT_REPORT_DEFAULTS.columnSortDefault,
      ),
    },
    paramNames,
  };
}
