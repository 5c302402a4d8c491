// src/modules/report/report.settings.spec.ts
import { ConfigurationError } from '@core/common/errors/domain-error';
import { ConfigService } from '@nestjs/config';
import { readReportSettings } from './report.settings';

describe('readReportSettings', () => {
  it('未配置时使用内置默认值', () => {
    const settings = readReportSettings(new ConfigService({}));

    expect(settings).toEqual({
      defaults: {
        pageSize: 25,
        windowSize: 5,
        countStrategy: 'FOUND_ROWS',
        columnSortDefault: true,
      },
      paramNames: { page: 'page', sort: 'sort', direction: 'dir' },
    });
  });

  it('读取 report.* 配置', () => {
    const settings = readReportSettings(
      new ConfigService({
        report: {
          pageSize: 50,
          windowSize: 9,
          countStrategy: 'COUNT_QUERY',
          columnSortDefault: false,
          params: { page: 'p', sort: 'order', direction: 'way' },
        },
      }),
    );

    expect(settings.defaults).toEqual({
      pageSize: 50,
      windowSize: 9,
      countStrategy: 'COUNT_QUERY',
      columnSortDefault: false,
    });
    expect(settings.paramNames).toEqual({ page: 'p', sort: 'order', direction: 'way' });
  });

  it('统计策略未知或参数名重复时抛出配置错误', () => {
    expect(() =>
      readReportSettings(new ConfigService({ report: { countStrategy: 'GUESS' } })),
    ).toThrow(ConfigurationError);
    expect(() =>
      readReportSettings(
        new ConfigService({ report: { params: { page: 'x', sort: 'x', direction: 'dir' } } }),
      ),
    ).toThrow('报表请求参数名不能重复');
  });
});

describe('readReportSettings：页大小校验', () => {
  it('环境变量解析出的非法页大小在启动时即被拒绝', () => {
    expect(() =>
      readReportSettings(new ConfigService({ report: { pageSize: Number.NaN } })),
    ).toThrow('report.pageSize 必须是正整数');
  });
});
