// src/usecases/report/list-reports.usecase.ts

import { Injectable } from '@nestjs/common';
import { ReportRegistry } from '@modules/report/report.registry';

export interface ReportColumnSummary {
  readonly key: string;
  readonly label: string;
  /** 结果行中的字段名 */
  readonly field: string;
  readonly sortable: boolean;
}

export interface ReportSummary {
  readonly name: string;
  readonly columns: ReadonlyArray<ReportColumnSummary>;
  readonly defaultSort: string;
  readonly pageSize: number;
  readonly windowSize: number;
}

/**
 * 列出已注册的报表及其列配置
 */
@Injectable()
export class ListReportsUsecase {
  constructor(private readonly registry: ReportRegistry) {}

  execute(): ReadonlyArray<ReportSummary> {
    return this.registry.list().map((definition) => ({
      name: definition.name,
      columns: definition.columns.map((column, index) => ({
        key: column.key,
        label: column.displayLabel,
        field: definition.resultFields[index],
        sortable: column.sortable,
      })),
      defaultSort: definition.defaultSort,
      pageSize: definition.pageSize,
      windowSize: definition.windowSize,
    }));
  }
}
