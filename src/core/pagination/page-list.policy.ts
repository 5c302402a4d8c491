// src/core/pagination/page-list.policy.ts
// 页码列表：首页/上一页/页码窗口/下一页/末页，只产出结构化数据，不关心标记语言

import { assertPositiveInteger } from './pagination.policy';
import type { PageLink, PageLinkLabels, PageList, ResultWindow } from './pagination.types';

export const DEFAULT_PAGE_LINK_LABELS: PageLinkLabels = Object.freeze({
  first: '«',
  prev: '‹',
  next: '›',
  last: '»',
});

/**
 * 计算页码窗口的起止页
 * 以当前页为中心，靠近边界时整体平移，窗口长度不超过 windowSize 与总页数
 */
export function computePageWindow(
  currentIndex: number,
  pageCount: number,
  windowSize: number,
): { readonly start: number; readonly end: number } | null {
  if (pageCount < 1) return null;
  const current = Math.min(Math.max(currentIndex, 1), pageCount);
  const half = Math.floor((windowSize - 1) / 2);
  let start = Math.max(1, current - half);
  const end = Math.min(pageCount, start + windowSize - 1);
  start = Math.max(1, end - windowSize + 1);
  return { start, end };
}

/**
 * 生成页码列表
 * 任何链接的目标页都落在 [1, pageCount] 之内；无结果时返回空列表
 */
export function buildPageList(
  window: ResultWindow,
  windowSize: number,
  labels: PageLinkLabels = DEFAULT_PAGE_LINK_LABELS,
): PageList {
  assertPositiveInteger(windowSize, 'windowSize');

  const range = computePageWindow(window.currentIndex, window.pageCount, windowSize);
  if (!range) {
    return { pageLinks: [], hasPrev: false, hasNext: false, firstIndex: null, lastIndex: null };
  }

  const { pageCount } = window;
  const current = Math.min(Math.max(window.currentIndex, 1), pageCount);
  const hasPrev = current > 1;
  const hasNext = current < pageCount;

  const links: PageLink[] = [];
  links.push({ kind: 'FIRST', label: labels.first, targetIndex: 1, current: false });
  if (hasPrev) {
    links.push({ kind: 'PREV', label: labels.prev, targetIndex: current - 1, current: false });
  }
  for (let index = range.start; index <= range.end; index += 1) {
    links.push({ kind: 'PAGE', label: String(index), targetIndex: index, current: index === current });
  }
  if (hasNext) {
    links.push({ kind: 'NEXT', label: labels.next, targetIndex: current + 1, current: false });
  }
  links.push({ kind: 'LAST', label: labels.last, targetIndex: pageCount, current: false });

  return { pageLinks: links, hasPrev, hasNext, firstIndex: 1, lastIndex: pageCount };
}
