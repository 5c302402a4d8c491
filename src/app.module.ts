// src/app.module.ts

import { Module } from '@nestjs/common';
import { APP_FILTER } from '@nestjs/core';
import { GraphQLAdapterModule } from './adapters/graphql/graphql-adapter.module';
import { GqlAllExceptionsFilter } from './core/common/filters/graphql-exception.filter';
import { AppConfigModule } from './core/config/config.module';
import { DatabaseModule } from './core/database/database.module';
import { AppGraphQLModule } from './core/graphql/graphql.module';
import { LoggerModule } from './core/logger/logger.module';
import { ReportModule } from './modules/report/report.module';
import { REPORT_DEFINITIONS } from './reports';

@Module({
  imports: [
    AppConfigModule,
    LoggerModule,
    DatabaseModule,
    AppGraphQLModule,
    // 报表定义在这里注册，启动时统一校验
    ReportModule.forRoot({ definitions: REPORT_DEFINITIONS }),
    GraphQLAdapterModule,
  ],
  providers: [
    {
      provide: APP_FILTER,
      useClass: GqlAllExceptionsFilter,
    },
  ],
})
export class AppModule {}
