// 文件位置： src/usecases/report/report-usecases.module.ts
import { Module } from '@nestjs/common';
import { ListReportsUsecase } from './list-reports.usecase';
import { RunReportUsecase } from './run-report.usecase';

// ReportRegistry 与数据源由全局的 ReportModule.forRoot 提供
@Module({
  providers: [RunReportUsecase, ListReportsUsecase],
  exports: [RunReportUsecase, ListReportsUsecase],
})
export class ReportUsecasesModule {}
