// src/core/pagination/overrun-recovery.spec.ts
import { OverrunExhaustedError, REPORT_ERROR } from '@core/common/errors/domain-error';
import { MAX_QUERY_ATTEMPTS, runWithOverrunRecovery, type RecoveryTransition } from './overrun-recovery';
import type { PageState } from './pagination.types';

const initial = (requestedIndex: number): PageState => ({ requestedIndex, pageSize: 25, windowSize: 10 });

// 计划只记录页码，便于断言每次查询用的是哪一页
const plan = (pageState: PageState) => ({ page: pageState.requestedIndex });

describe('runWithOverrunRecovery', () => {
  it('页码有效时只查询一次', async () => {
    const query = jest.fn(async (_plan: { page: number }) => ({ totalCount: 60 }));

    const outcome = await runWithOverrunRecovery({ initial: initial(3), plan, query });

    expect(query).toHaveBeenCalledTimes(1);
    expect(outcome.attempts).toBe(1);
    expect(outcome.plan).toEqual({ page: 3 });
    expect(outcome.window).toEqual({ totalCount: 60, pageCount: 3, currentIndex: 3, isValid: true });
  });

  it('越界后按修正页码重查一次', async () => {
    const query = jest.fn(async (_plan: { page: number }) => ({ totalCount: 60 }));

    const outcome = await runWithOverrunRecovery({ initial: initial(9), plan, query });

    expect(query.mock.calls.map(([p]) => p)).toEqual([{ page: 9 }, { page: 3 }]);
    expect(outcome.attempts).toBe(2);
    expect(outcome.pageState.requestedIndex).toBe(3);
    expect(outcome.window.currentIndex).toBe(3);
  });

  it('总数为 0 时不重查', async () => {
    const query = jest.fn(async (_plan: { page: number }) => ({ totalCount: 0 }));

    const outcome = await runWithOverrunRecovery({ initial: initial(9), plan, query });

    expect(query).toHaveBeenCalledTimes(1);
    expect(outcome.window).toEqual({ totalCount: 0, pageCount: 0, currentIndex: 9, isValid: true });
  });

  it('结果集持续缩小导致连续越界时抛出 OverrunExhaustedError', async () => {
    // 每次查询时总数都在减少：修正后的页码总是再次越界
    const totals = [60, 40, 20];
    const query = jest.fn(async (_plan: { page: number }, attempt: number) => ({
      totalCount: totals[attempt - 1],
    }));

    await expect(runWithOverrunRecovery({ initial: initial(9), plan, query })).rejects.toThrow(
      OverrunExhaustedError,
    );
    expect(query).toHaveBeenCalledTimes(MAX_QUERY_ATTEMPTS);
    expect(query.mock.calls.map(([p]) => p)).toEqual([{ page: 9 }, { page: 3 }, { page: 2 }]);
  });

  it('重试耗尽的错误携带错误码与最后一次观测', async () => {
    const totals = [60, 40, 20];
    const query = async (_plan: { page: number }, attempt: number) => ({
      totalCount: totals[attempt - 1],
    });

    await expect(runWithOverrunRecovery({ initial: initial(9), plan, query })).rejects.toMatchObject({
      code: REPORT_ERROR.OVERRUN_EXHAUSTED,
      details: {
        attempts: 3,
        requestedIndex: 9,
        lastWindow: { totalCount: 20, pageCount: 1, currentIndex: 2, isValid: false },
      },
    });
  });

  it('按顺序报告状态迁移', async () => {
    const phases: string[] = [];
    const onTransition = (t: RecoveryTransition) => phases.push(`${t.phase}#${t.attempt}`);
    const totals = [60, 60];
    const query = async (_plan: { page: number }, attempt: number) => ({
      totalCount: totals[attempt - 1],
    });

    await runWithOverrunRecovery({ initial: initial(9), plan, query, onTransition });

    expect(phases).toEqual([
      'PLANNING#1',
      'QUERYING#1',
      'OVERRUN#1',
      'PLANNING#2',
      'QUERYING#2',
      'VALID#2',
    ]);
  });

  it('先单独计数时按计数结果修正页码，只执行一次数据查询', async () => {
    const count = jest.fn(async () => 60);
    const query = jest.fn(
      async (_plan: { page: number }, _attempt: number, knownTotal?: number) => ({
        totalCount: knownTotal ?? 60,
      }),
    );
    const phases: string[] = [];

    const outcome = await runWithOverrunRecovery({
      initial: initial(9),
      plan,
      count,
      query,
      onTransition: (t) => phases.push(`${t.phase}#${t.attempt}`),
    });

    expect(count).toHaveBeenCalledTimes(1);
    expect(query.mock.calls).toEqual([[{ page: 3 }, 1, 60]]);
    expect(outcome.attempts).toBe(1);
    expect(outcome.window).toEqual({ totalCount: 60, pageCount: 3, currentIndex: 3, isValid: true });
    expect(phases).toEqual(['COUNTING#0', 'OVERRUN#0', 'PLANNING#1', 'QUERYING#1', 'VALID#1']);
  });

  it('计数之后结果集缩小时照常重查，且重查不再携带旧的总数', async () => {
    const count = async () => 60;
    const totals = [40, 40];
    const query = jest.fn(
      async (_plan: { page: number }, attempt: number, _knownTotal?: number) => ({
        totalCount: totals[attempt - 1],
      }),
    );

    const outcome = await runWithOverrunRecovery({ initial: initial(3), plan, count, query });

    expect(query.mock.calls).toEqual([
      [{ page: 3 }, 1, 60],
      [{ page: 2 }, 2, undefined],
    ]);
    expect(outcome.attempts).toBe(2);
    expect(outcome.window.currentIndex).toBe(2);
  });
});
