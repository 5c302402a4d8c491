// src/core/report/link-params.ts
// 链接参数的组装：翻页与排序链接都要带上当前排序、页码以及透传参数

import type { SortDirection } from '@core/pagination/pagination.types';
import type { LinkParams } from '@core/sort/sort.types';

export interface RequestParamNames {
  readonly page: string;
  readonly sort: string;
  readonly direction: string;
}

export const DEFAULT_REQUEST_PARAM_NAMES: RequestParamNames = Object.freeze({
  page: 'page',
  sort: 'sort',
  direction: 'dir',
});

export interface LinkContext {
  readonly paramNames: RequestParamNames;
  /** 当前（已核对的）页码 */
  readonly currentIndex: number;
  /** 与分页排序无关、需要在链接中保留的请求参数 */
  readonly passthrough: LinkParams;
}

/**
 * 从请求参数中剔除受控参数，得到透传参数
 * 值为空（undefined）的参数不保留
 */
export function extractPassthrough(
  params: Readonly<Record<string, string | undefined>>,
  names: RequestParamNames,
): LinkParams {
  const managed = new Set([names.page, names.sort, names.direction]);
  const result: Record<string, string> = {};
  for (const [key, value] of Object.entries(params)) {
    if (managed.has(key) || value === undefined) continue;
    result[key] = value;
  }
  return Object.freeze(result);
}

export function buildLinkParams(
  target: { readonly page: number; readonly sortKey: string; readonly direction: SortDirection },
  context: LinkContext,
): LinkParams {
  const { paramNames } = context;
  return Object.freeze({
    ...context.passthrough,
    [paramNames.page]: String(target.page),
    [paramNames.sort]: target.sortKey,
    [paramNames.direction]: target.direction.toLowerCase(),
  });
}
