// src/adapters/graphql/graphql-adapter.module.ts

import { Module } from '@nestjs/common';
import { ReportUsecasesModule } from '@usecases/report/report-usecases.module';
import { ReportResolver } from './report/report.resolver';

/**
 * GraphQL 适配器模块
 * 统一管理所有 GraphQL Resolvers，遵循适配器层架构原则
 */
@Module({
  imports: [
    ReportUsecasesModule, // 报表查询与列表用例
  ],
  providers: [ReportResolver],
  exports: [ReportResolver],
})
export class GraphQLAdapterModule {}
