// src/usecases/report/run-report.usecase.spec.ts
import { DomainError, OverrunExhaustedError, REPORT_ERROR } from '@core/common/errors/domain-error';
import { DEFAULT_REQUEST_PARAM_NAMES } from '@core/report/link-params';
import { DEFAULT_REPORT_DEFAULTS } from '@core/report/report.definition';
import type { IReportDataSource } from '@core/report/report.ports';
import type { ReportDefinitionInput } from '@core/report/report.types';
import { TypeOrmReportDataSource } from '@src/infrastructure/typeorm/report/typeorm-report-data-source';
import { ReportRegistry } from '@modules/report/report.registry';
import type { ReportSettings } from '@modules/report/report.settings';
import { REPORT_TOKENS } from '@modules/report/report.tokens';
import { Test } from '@nestjs/testing';
import type { DataSource } from 'typeorm';
import {
  createPeopleRows,
  InMemoryReportDataSource,
} from '@src/utils/test/in-memory-report-data-source';
import { createLoggerMock, getLoggerMock, type LoggerMock } from '@src/utils/test/logger-mock';
import { RunReportUsecase } from './run-report.usecase';

const PEOPLE: ReportDefinitionInput = {
  name: 'people',
  sqlFragment: 'FROM people p',
  columns: ['name', { key: 'email', sql: 'p.email' }, { key: 'age', sql: 'p.age', sortable: true }],
  defaultSort: 'name',
  pageSize: 25,
  windowSize: 10,
};

const PEOPLE_COUNTED: ReportDefinitionInput = {
  ...PEOPLE,
  name: 'people-counted',
  countStrategy: 'COUNT_QUERY',
};

const SETTINGS: ReportSettings = {
  defaults: DEFAULT_REPORT_DEFAULTS,
  paramNames: DEFAULT_REQUEST_PARAM_NAMES,
};

describe('RunReportUsecase', () => {
  let usecase: RunReportUsecase;
  let logger: LoggerMock;

  async function setup(dataSource: IReportDataSource): Promise<void> {
    const module = await Test.createTestingModule({
      providers: [
        RunReportUsecase,
        { provide: ReportRegistry, useValue: new ReportRegistry([PEOPLE, PEOPLE_COUNTED], SETTINGS.defaults) },
        { provide: REPORT_TOKENS.DATA_SOURCE, useValue: dataSource },
        { provide: REPORT_TOKENS.SETTINGS, useValue: SETTINGS },
        createLoggerMock(RunReportUsecase.name),
      ],
    }).compile();

    usecase = module.get(RunReportUsecase);
    logger = getLoggerMock(module, RunReportUsecase.name);
  }

  it('60 条、每页 25 条、第 3 页：一次查询即返回 10 条', async () => {
    const dataSource = new InMemoryReportDataSource(createPeopleRows(60));
    await setup(dataSource);

    const page = await usecase.execute({ name: 'people', page: '3' });

    expect(page.attempts).toBe(1);
    expect(page.rows).toHaveLength(10);
    expect(page.rows[0]).toEqual({ name: 'user-51', email: 'user-51@example.com', age: 30 });
    expect(page.window).toEqual({ totalCount: 60, pageCount: 3, currentIndex: 3, isValid: true });
    expect(page.plan.limitClause).toBe('LIMIT 50, 25');
    expect(page.fields).toEqual(['name', 'email', 'age']);
    expect(page.pageList.hasNext).toBe(false);
    expect(page.pageList.lastIndex).toBe(3);
    expect(logger.warn).not.toHaveBeenCalled();
  });

  it('请求第 9 页时修正到第 3 页并只重查一次', async () => {
    const dataSource = new InMemoryReportDataSource(createPeopleRows(60));
    await setup(dataSource);

    const page = await usecase.execute({ name: 'people', page: '9' });

    expect(page.attempts).toBe(2);
    expect(dataSource.plans.map((p) => p.limitClause)).toEqual(['LIMIT 200, 25', 'LIMIT 50, 25']);
    expect(page.window.currentIndex).toBe(3);
    expect(page.rows).toHaveLength(10);
    expect(logger.warn).toHaveBeenCalledTimes(1);
    expect(logger.warn).toHaveBeenCalledWith(
      { report: 'people', attempt: 1, requestedIndex: 9, correctedIndex: 3, totalCount: 60 },
      '请求页码越界，按修正页码重新查询',
    );
  });

  it('COUNT_QUERY：先计数修正页码，越界请求也只执行一次数据查询', async () => {
    const dataSource = new InMemoryReportDataSource(createPeopleRows(60));
    await setup(dataSource);

    const page = await usecase.execute({ name: 'people-counted', page: '9' });

    expect(dataSource.countCalls).toBe(1);
    expect(dataSource.plans.map((p) => p.limitClause)).toEqual(['LIMIT 50, 25']);
    expect(page.attempts).toBe(1);
    expect(page.window).toEqual({ totalCount: 60, pageCount: 3, currentIndex: 3, isValid: true });
    expect(page.rows).toHaveLength(10);
    expect(logger.warn).toHaveBeenCalledWith(
      { report: 'people-counted', attempt: 0, requestedIndex: 9, correctedIndex: 3, totalCount: 60 },
      '请求页码超出统计总数，按修正页码查询',
    );
  });

  it('COUNT_QUERY 越界请求在数据库上依次执行一次计数与一次数据查询', async () => {
    const statements: string[] = [];
    const responses: unknown[] = [[{ num: 60 }], createPeopleRows(60).slice(50)];
    const runner = {
      connect: async () => undefined,
      release: async () => undefined,
      query: async (sql: string): Promise<unknown> => {
        statements.push(sql);
        return responses.shift();
      },
    };
    // 只用到 createQueryRunner
    const dataSource = { createQueryRunner: () => runner } as unknown as DataSource;
    await setup(new TypeOrmReportDataSource(dataSource));

    const page = await usecase.execute({ name: 'people-counted', page: '9' });

    expect(statements).toEqual([
      'SELECT COUNT(*) AS num FROM (SELECT name, p.email, p.age FROM people p) AS report_count',
      'SELECT name, p.email, p.age FROM people p ORDER BY name ASC LIMIT 50, 25',
    ]);
    expect(page.window.currentIndex).toBe(3);
    expect(page.rows).toHaveLength(10);
  });

  it('没有数据时不重查，页码列表为空', async () => {
    const dataSource = new InMemoryReportDataSource([]);
    await setup(dataSource);

    const page = await usecase.execute({ name: 'people', page: '9' });

    expect(page.attempts).toBe(1);
    expect(page.rows).toEqual([]);
    expect(page.window).toEqual({ totalCount: 0, pageCount: 0, currentIndex: 9, isValid: true });
    expect(page.pageList).toEqual({
      pageLinks: [],
      hasPrev: false,
      hasNext: false,
      firstIndex: null,
      lastIndex: null,
    });
  });

  it('结果集连续缩小时在第三次越界后失败', async () => {
    const dataSource = new InMemoryReportDataSource(createPeopleRows(60), [60, 40, 20]);
    await setup(dataSource);

    await expect(usecase.execute({ name: 'people', page: '9' })).rejects.toThrow(
      OverrunExhaustedError,
    );
    expect(dataSource.plans).toHaveLength(3);
    expect(logger.warn).toHaveBeenCalledTimes(3);
    expect(logger.error).toHaveBeenCalledTimes(1);
  });

  it('非法的排序键、方向与页码静默回退到默认值', async () => {
    await setup(new InMemoryReportDataSource(createPeopleRows(5)));

    const page = await usecase.execute({
      name: 'people',
      page: 'abc',
      sort: 'salary',
      direction: 'sideways',
    });

    expect(page.sort).toEqual({ activeKey: 'name', direction: 'ASC' });
    expect(page.window.currentIndex).toBe(1);
    expect(page.plan.orderByClause).toBe('ORDER BY name ASC');
  });

  it('翻页与表头链接保留排序状态和透传参数', async () => {
    await setup(new InMemoryReportDataSource(createPeopleRows(60)));

    const page = await usecase.execute({
      name: 'people',
      page: '2',
      sort: 'age',
      direction: 'desc',
      params: { q: 'smith', page: '7', empty: undefined },
    });

    const next = page.pageList.pageLinks.find((link) => link.kind === 'NEXT');
    expect(next?.params).toEqual({ q: 'smith', page: '3', sort: 'age', dir: 'desc' });

    const [nameHeader, emailHeader, ageHeader] = page.sortHeaders;
    expect(nameHeader.params).toEqual({ q: 'smith', page: '2', sort: 'name', dir: 'asc' });
    expect(emailHeader.params).toBeNull();
    expect(ageHeader).toMatchObject({
      active: true,
      direction: 'DESC',
      params: { q: 'smith', page: '2', sort: 'age', dir: 'asc' },
    });
  });

  it('未知报表抛出 NOT_FOUND', async () => {
    await setup(new InMemoryReportDataSource([]));

    const promise = usecase.execute({ name: 'orders' });
    await expect(promise).rejects.toBeInstanceOf(DomainError);
    await expect(promise).rejects.toMatchObject({ code: REPORT_ERROR.NOT_FOUND });
  });
});
