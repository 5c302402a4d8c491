// src/adapters/graphql/report/report.resolver.ts
import { ValidateInput } from '@core/common/errors/validate-input.decorator';
import { Args, Query, Resolver } from '@nestjs/graphql';
import { ListReportsUsecase } from '@usecases/report/list-reports.usecase';
import { RunReportUsecase } from '@usecases/report/run-report.usecase';
import { ReportInput } from './dto/report.input';
import { ReportPageResult, ReportSummaryDTO } from './dto/report.result';
import { toParamRecord, toReportPageResult, toReportSummaryDTO } from './report.mapper';

/**
 * 报表 GraphQL Resolver
 * 只负责参数搬运与 DTO 映射，分页、排序与越界重查都在用例层完成
 */
@Resolver(() => ReportPageResult)
export class ReportResolver {
  constructor(
    private readonly runReportUsecase: RunReportUsecase,
    private readonly listReportsUsecase: ListReportsUsecase,
  ) {}

  @Query(() => ReportPageResult, { description: '查询报表的一页数据' })
  @ValidateInput()
  async report(@Args('input') input: ReportInput): Promise<ReportPageResult> {
    const page = await this.runReportUsecase.execute({
      name: input.name,
      page: input.page,
      sort: input.sort,
      direction: input.direction,
      params: toParamRecord(input.params),
    });
    return toReportPageResult(page);
  }

  @Query(() => [ReportSummaryDTO], { description: '列出已注册的报表' })
  reports(): ReportSummaryDTO[] {
    return this.listReportsUsecase.execute().map(toReportSummaryDTO);
  }
}
