// src/core/pagination/overrun-recovery.ts
// 翻页越界恢复：有界的“计划 -> 查询 -> 核对 -> 重试”状态机

import { OverrunExhaustedError } from '@core/common/errors/domain-error';
import { reconcile } from './pagination.policy';
import type { PageState, ResultWindow } from './pagination.types';

/** 每个请求最多查询 3 次，即最多 2 次纠正性重查 */
export const MAX_QUERY_ATTEMPTS = 3;

export type RecoveryPhase = 'COUNTING' | 'PLANNING' | 'QUERYING' | 'VALID' | 'OVERRUN' | 'EXHAUSTED';

export interface RecoveryTransition {
  readonly phase: RecoveryPhase;
  /** 从 1 开始的查询次数；数据查询之前的单独计数阶段为 0 */
  readonly attempt: number;
  readonly pageState: PageState;
  /** 仅 VALID / OVERRUN / EXHAUSTED 阶段存在 */
  readonly window?: ResultWindow;
  /** 仅 OVERRUN 阶段存在 */
  readonly corrected?: PageState;
}

export interface RecoveryOutcome<TPlan, TResult> {
  readonly plan: TPlan;
  readonly pageState: PageState;
  readonly window: ResultWindow;
  readonly result: TResult;
  readonly attempts: number;
}

/**
 * 执行带越界恢复的分页查询
 * - 提供 count 时先单独统计总数并核对页码，第一次数据查询就使用修正后的页码
 * - 每次查询都会带回新的总数，并重新计算结果窗口
 * - 越界时用修正后的页码重新生成计划并重查
 * - 连续越界达到上限视为结果集在读取期间持续变化，抛出 OverrunExhaustedError
 * @param input.initial 请求解析出的页码状态
 * @param input.plan 由页码状态生成查询计划（纯函数）
 * @param input.count 可选：在生成第一份计划前统计总数（不计入查询次数）
 * @param input.query 执行查询并返回观测到的总数；knownTotal 仅在第一次查询且已单独计数时传入
 * @param input.onTransition 可选：状态迁移回调（用于日志）
 */
export async function runWithOverrunRecovery<TPlan, TResult extends { readonly totalCount: number }>(
  input: {
    readonly initial: PageState;
    readonly plan: (pageState: PageState) => TPlan;
    readonly count?: () => Promise<number>;
    readonly query: (plan: TPlan, attempt: number, knownTotal?: number) => Promise<TResult>;
    readonly onTransition?: (transition: RecoveryTransition) => void;
  },
): Promise<RecoveryOutcome<TPlan, TResult>> {
  const { plan, count, query, onTransition } = input;
  let pageState = input.initial;
  let lastWindow: ResultWindow | undefined;
  let knownTotal: number | undefined;

  if (count) {
    onTransition?.({ phase: 'COUNTING', attempt: 0, pageState });
    knownTotal = await count();
    const decision = reconcile(knownTotal, pageState);
    if (decision.kind === 'OVERRUN') {
      onTransition?.({
        phase: 'OVERRUN',
        attempt: 0,
        pageState,
        window: decision.window,
        corrected: decision.corrected,
      });
      pageState = decision.corrected;
    }
  }

  for (let attempt = 1; attempt <= MAX_QUERY_ATTEMPTS; attempt += 1) {
    onTransition?.({ phase: 'PLANNING', attempt, pageState });
    const currentPlan = plan(pageState);

    onTransition?.({ phase: 'QUERYING', attempt, pageState });
    const result = await query(currentPlan, attempt, attempt === 1 ? knownTotal : undefined);

    const decision = reconcile(result.totalCount, pageState);
    lastWindow = decision.window;
    if (decision.kind === 'VALID') {
      onTransition?.({ phase: 'VALID', attempt, pageState, window: decision.window });
      return { plan: currentPlan, pageState, window: decision.window, result, attempts: attempt };
    }

    onTransition?.({
      phase: 'OVERRUN',
      attempt,
      pageState,
      window: decision.window,
      corrected: decision.corrected,
    });
    pageState = decision.corrected;
  }

  onTransition?.({
    phase: 'EXHAUSTED',
    attempt: MAX_QUERY_ATTEMPTS,
    pageState,
    window: lastWindow,
  });
  throw new OverrunExhaustedError('分页查询连续越界，结果集可能在读取期间持续变化', {
    attempts: MAX_QUERY_ATTEMPTS,
    requestedIndex: input.initial.requestedIndex,
    lastWindow,
  });
}
