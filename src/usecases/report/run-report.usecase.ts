// src/usecases/report/run-report.usecase.ts

import { runWithOverrunRecovery, type RecoveryTransition } from '@core/pagination/overrun-recovery';
import { buildPageList } from '@core/pagination/page-list.policy';
import { resolvePageState } from '@core/pagination/pagination.policy';
import type { PageLink, PageList, ResultWindow } from '@core/pagination/pagination.types';
import {
  buildLinkParams,
  extractPassthrough,
  type LinkContext,
} from '@core/report/link-params';
import { planQuery } from '@core/report/query-planner';
import type { IReportDataSource, ReportFetchResult, ReportRow } from '@core/report/report.ports';
import type { QueryPlan, ReportDefinition } from '@core/report/report.types';
import { buildSortHeaders, resolveSortState } from '@core/sort/sort.policy';
import type { LinkParams, SortHeader, SortState } from '@core/sort/sort.types';
import { Inject, Injectable } from '@nestjs/common';
import { ReportRegistry } from '@modules/report/report.registry';
import type { ReportSettings } from '@modules/report/report.settings';
import { REPORT_TOKENS } from '@modules/report/report.tokens';
import { InjectPinoLogger, PinoLogger } from 'nestjs-pino';

/**
 * 报表查询参数（均为未经校验的原始请求值）
 */
export interface RunReportInput {
  readonly name: string;
  readonly page?: string | null;
  readonly sort?: string | null;
  readonly direction?: string | null;
  /** 需要在链接中保留的其他请求参数 */
  readonly params?: Readonly<Record<string, string | undefined>>;
}

export interface ReportPageLink extends PageLink {
  readonly params: LinkParams;
}

export interface ReportPage {
  readonly name: string;
  /** 与 rows 中的键一一对应，按列声明顺序 */
  readonly fields: ReadonlyArray<string>;
  readonly rows: ReadonlyArray<ReportRow>;
  readonly sort: SortState;
  readonly window: ResultWindow;
  readonly plan: QueryPlan;
  readonly pageList: Omit<PageList, 'pageLinks'> & {
    readonly pageLinks: ReadonlyArray<ReportPageLink>;
  };
  readonly sortHeaders: ReadonlyArray<SortHeader>;
  /** 实际执行的查询次数（1 表示未发生越界重查） */
  readonly attempts: number;
}

/**
 * 执行报表查询用例
 *
 * 功能：
 * - 从请求参数推导排序与页码状态（非法输入静默回退到默认值）
 * - 生成查询计划并通过数据源执行
 * - COUNT_QUERY 策略先计数再查询，越界页码在第一次数据查询前就被修正
 * - 页码越界时按修正后的页码重查，最多 3 次查询
 * - 生成页码列表与表头链接，供渲染层使用
 */
@Injectable()
export class RunReportUsecase {
  constructor(
    private readonly registry: ReportRegistry,
    @Inject(REPORT_TOKENS.DATA_SOURCE)
    private readonly dataSource: IReportDataSource,
    @Inject(REPORT_TOKENS.SETTINGS)
    private readonly settings: ReportSettings,
    @InjectPinoLogger(RunReportUsecase.name)
    private readonly logger: PinoLogger,
  ) {}

  async execute(input: RunReportInput): Promise<ReportPage> {
    const definition = this.registry.get(input.name);

    const sort = resolveSortState(
      input.sort,
      input.direction,
      definition.columns,
      definition.defaultSort,
    );
    const initial = resolvePageState(input.page, definition.pageSize, definition.windowSize);

    const outcome = await runWithOverrunRecovery<QueryPlan, ReportFetchResult>({
      initial,
      plan: (pageState) => planQuery(sort, pageState, definition.columns),
      count:
        definition.countStrategy === 'COUNT_QUERY'
          ? () => this.dataSource.countRows({ definition })
          : undefined,
      query: (plan, _attempt, knownTotal) =>
        this.dataSource.fetchPage({ definition, plan, knownTotal }),
      onTransition: (transition) => this.logTransition(definition, transition),
    });

    const context: LinkContext = {
      paramNames: this.settings.paramNames,
      currentIndex: outcome.window.currentIndex,
      passthrough: extractPassthrough(input.params ?? {}, this.settings.paramNames),
    };

    return {
      name: definition.name,
      fields: definition.resultFields,
      rows: outcome.result.rows,
      sort,
      window: outcome.window,
      plan: outcome.plan,
      pageList: this.toPageList(definition, outcome.window, sort, context),
      sortHeaders: buildSortHeaders(definition.columns, sort, context),
      attempts: outcome.attempts,
    };
  }

  private toPageList(
    definition: ReportDefinition,
    window: ResultWindow,
    sort: SortState,
    context: LinkContext,
  ): ReportPage['pageList'] {
    const pageList = buildPageList(window, definition.windowSize, definition.labels);
    return {
      ...pageList,
      pageLinks: pageList.pageLinks.map((link) => ({
        ...link,
        params: buildLinkParams(
          { page: link.targetIndex, sortKey: sort.activeKey, direction: sort.direction },
          context,
        ),
      })),
    };
  }

  private logTransition(definition: ReportDefinition, transition: RecoveryTransition): void {
    const { phase, attempt, pageState, window, corrected } = transition;
    switch (phase) {
      case 'QUERYING':
        this.logger.debug(
          {
            report: definition.name,
            attempt,
            page: pageState.requestedIndex,
            offset: (pageState.requestedIndex - 1) * pageState.pageSize,
          },
          '执行报表查询',
        );
        return;
      case 'OVERRUN':
        this.logger.warn(
          {
            report: definition.name,
            attempt,
            requestedIndex: pageState.requestedIndex,
            correctedIndex: corrected?.requestedIndex,
            totalCount: window?.totalCount,
          },
          attempt === 0 ? '请求页码超出统计总数，按修正页码查询' : '请求页码越界，按修正页码重新查询',
        );
        return;
      case 'EXHAUSTED':
        this.logger.error(
          { report: definition.name, attempts: attempt, totalCount: window?.totalCount },
          '分页查询连续越界，放弃重试',
        );
        return;
      default:
        return;
    }
  }
}
