// src/core/pagination/pagination.policy.ts
// 分页规则与纯函数：页码归一化、总页数计算、结果窗口核对

import { ConfigurationError, DomainError, REPORT_ERROR } from '@core/common/errors/domain-error';
import type { PageState, ReconcileDecision, ResultWindow } from './pagination.types';

const INTEGER_PATTERN = /^\s*[+-]?\d+\s*$/;

/**
 * 校验配置项为正整数，否则抛出配置错误
 * @param value 配置值
 * @param label 配置项名称（用于错误信息）
 */
export function assertPositiveInteger(value: number, label: string): void {
  if (!Number.isSafeInteger(value) || value <= 0) {
    throw new ConfigurationError(`${label} 必须是正整数`, { [label]: value });
  }
}

/**
 * 将原始页码输入转换为整数；无法识别时返回 null
 */
function parseRequestedIndex(raw: unknown): number | null {
  if (typeof raw === 'number') {
    return Number.isFinite(raw) ? Math.floor(raw) : null;
  }
  if (typeof raw === 'string' && INTEGER_PATTERN.test(raw)) {
    const parsed = Number(raw);
    return Number.isFinite(parsed) ? parsed : null;
  }
  return null;
}

/**
 * 能表示的最大页码：offset = (页码 - 1) * pageSize 不超过 Number.MAX_SAFE_INTEGER
 * 超过它的页不可能存在，截断后仍会在核对总数时被判为越界
 */
export function maxAddressablePage(pageSize: number): number {
  return Math.floor(Number.MAX_SAFE_INTEGER / pageSize) + 1;
}

/**
 * 解析请求页码
 * - 缺失或非数字 => 1
 * - 小于 1 => 1
 * - 不按总数截断：上限取决于尚未观测到的总数，只截断到 maxAddressablePage
 */
export function resolvePageState(
  requestedIndexRaw: unknown,
  pageSize: number,
  windowSize: number,
): PageState {
  assertPositiveInteger(pageSize, 'pageSize');
  assertPositiveInteger(windowSize, 'windowSize');

  const parsed = parseRequestedIndex(requestedIndexRaw);
  const requestedIndex =
    parsed === null || parsed < 1 ? 1 : Math.min(parsed, maxAddressablePage(pageSize));
  return { requestedIndex, pageSize, windowSize };
}

export function computePageCount(totalCount: number, pageSize: number): number {
  if (totalCount === 0) return 0;
  return Math.ceil(totalCount / pageSize);
}

/**
 * 用新观测到的总数核对当前页码
 * - totalCount 为 0 时恒为有效（空结果不是错误）
 * - 越界时给出修正后的页码：有页时取最后一页，否则为 1
 */
export function reconcile(observedTotalCount: number, pageState: PageState): ReconcileDecision {
  if (!Number.isSafeInteger(observedTotalCount) || observedTotalCount < 0) {
    throw new DomainError(REPORT_ERROR.DB_QUERY_FAILED, '结果总数必须是非负整数', {
      observedTotalCount,
    });
  }

  const pageCount = computePageCount(observedTotalCount, pageState.pageSize);
  const currentIndex = pageState.requestedIndex;
  const isValid =
    observedTotalCount === 0 || (currentIndex >= 1 && currentIndex <= Math.max(pageCount, 1));

  const window: ResultWindow = { totalCount: observedTotalCount, pageCount, currentIndex, isValid };
  if (isValid) return { kind: 'VALID', window };

  const correctedIndex = pageCount >= 1 ? Math.max(1, Math.min(currentIndex, pageCount)) : 1;
  return {
    kind: 'OVERRUN',
    window,
    corrected: { ...pageState, requestedIndex: correctedIndex },
  };
}
