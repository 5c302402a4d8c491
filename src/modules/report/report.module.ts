// src/modules/report/report.module.ts
// 绑定报表注册表与数据源实现，并导出给用例层

import type { ReportDefinitionInput } from '@core/report/report.types';
import { DynamicModule, Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { TypeOrmReportDataSource } from '@src/infrastructure/typeorm/report/typeorm-report-data-source';
import { DataSource } from 'typeorm';
import { ReportRegistry } from './report.registry';
import { readReportSettings, type ReportSettings } from './report.settings';
import { REPORT_TOKENS } from './report.tokens';

export interface ReportModuleOptions {
  readonly definitions: ReadonlyArray<ReportDefinitionInput>;
}

@Module({})
export class ReportModule {
  /**
   * 注册报表定义
   * 定义在模块初始化时即被校验，配置错误会阻止应用启动
   */
  static forRoot(options: ReportModuleOptions): DynamicModule {
    return {
      module: ReportModule,
      global: true,
      providers: [
        { provide: REPORT_TOKENS.DEFINITIONS, useValue: options.definitions },
        {
          provide: REPORT_TOKENS.SETTINGS,
          inject: [ConfigService],
          useFactory: readReportSettings,
        },
        {
          provide: ReportRegistry,
          inject: [REPORT_TOKENS.DEFINITIONS, REPORT_TOKENS.SETTINGS],
          useFactory: (definitions: ReadonlyArray<ReportDefinitionInput>, settings: ReportSettings) =>
            new ReportRegistry(definitions, settings.defaults),
        },
        {
          provide: REPORT_TOKENS.DATA_SOURCE,
          inject: [DataSource],
          useFactory: (dataSource: DataSource) => new TypeOrmReportDataSource(dataSource),
        },
      ],
      exports: [ReportRegistry, REPORT_TOKENS.SETTINGS, REPORT_TOKENS.DATA_SOURCE],
    };
  }
}
