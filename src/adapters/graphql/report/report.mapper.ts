// src/adapters/graphql/report/report.mapper.ts
// 用例结果 => GraphQL DTO

import type { PageLinkKind, SortDirection } from '@core/pagination/pagination.types';
import type { LinkParams } from '@core/sort/sort.types';
import type { ReportSummary } from '@usecases/report/list-reports.usecase';
import type { ReportPage } from '@usecases/report/run-report.usecase';
import type { ReportParamInput } from './dto/report.input';
import type { LinkParamDTO, ReportPageResult, ReportSummaryDTO } from './dto/report.result';
import { GqlPageLinkKind, GqlSortDirection } from './report.enums';

const PAGE_LINK_KIND_MAP: Readonly<Record<PageLinkKind, GqlPageLinkKind>> = {
  FIRST: GqlPageLinkKind.FIRST,
  PREV: GqlPageLinkKind.PREV,
  PAGE: GqlPageLinkKind.PAGE,
  NEXT: GqlPageLinkKind.NEXT,
  LAST: GqlPageLinkKind.LAST,
};

export function toGqlSortDirection(direction: SortDirection): GqlSortDirection {
  return direction === 'DESC' ? GqlSortDirection.DESC : GqlSortDirection.ASC;
}

export function toLinkParamDTOs(params: LinkParams): LinkParamDTO[] {
  return Object.entries(params).map(([key, value]) => ({ key, value }));
}

/**
 * 透传参数列表 => 键值对；同名参数以最后一个为准
 */
export function toParamRecord(
  params: ReadonlyArray<ReportParamInput> | null | undefined,
): Record<string, string> {
  const record: Record<string, string> = {};
  for (const param of params ?? []) {
    record[param.key] = param.value;
  }
  return record;
}

export function toReportPageResult(page: ReportPage): ReportPageResult {
  return {
    name: page.name,
    fields: [...page.fields],
    rows: page.rows.map((row) => ({ ...row })),
    sort: {
      activeKey: page.sort.activeKey,
      direction: toGqlSortDirection(page.sort.direction),
    },
    window: { ...page.window },
    pageList: {
      pageLinks: page.pageList.pageLinks.map((link) => ({
        kind: PAGE_LINK_KIND_MAP[link.kind],
        label: link.label,
        targetIndex: link.targetIndex,
        current: link.current,
        params: toLinkParamDTOs(link.params),
      })),
      hasPrev: page.pageList.hasPrev,
      hasNext: page.pageList.hasNext,
      firstIndex: page.pageList.firstIndex,
      lastIndex: page.pageList.lastIndex,
    },
    sortHeaders: page.sortHeaders.map((header) => ({
      key: header.key,
      label: header.label,
      sortable: header.sortable,
      active: header.active,
      direction: header.direction === null ? null : toGqlSortDirection(header.direction),
      params: header.params === null ? null : toLinkParamDTOs(header.params),
    })),
    attempts: page.attempts,
  };
}

export function toReportSummaryDTO(summary: ReportSummary): ReportSummaryDTO {
  return {
    name: summary.name,
    columns: summary.columns.map((column) => ({ ...column })),
    defaultSort: summary.defaultSort,
    pageSize: summary.pageSize,
    windowSize: summary.windowSize,
  };
}
