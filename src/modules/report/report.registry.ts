// src/modules/report/report.registry.ts
// 报表注册表：启动时一次性校验全部定义，之后只读

import { ConfigurationError, DomainError, REPORT_ERROR } from '@core/common/errors/domain-error';
import { createReportDefinition } from '@core/report/report.definition';
import type {
  ReportDefaults,
  ReportDefinition,
  ReportDefinitionInput,
} from '@core/report/report.types';

export class ReportRegistry {
  private readonly definitions: ReadonlyMap<string, ReportDefinition>;

  /**
   * @param inputs 报表定义（原始形态）
   * @param defaults 全局默认值
   * @throws ConfigurationError 任一定义非法或名称重复
   */
  constructor(inputs: ReadonlyArray<ReportDefinitionInput>, defaults: ReportDefaults) {
    const map = new Map<string, ReportDefinition>();
    for (const input of inputs) {
      const definition = createReportDefinition(input, defaults);
      if (map.has(definition.name)) {
        throw new ConfigurationError(`报表名称重复: ${definition.name}`, {
          report: definition.name,
        });
      }
      map.set(definition.name, definition);
    }
    this.definitions = map;
  }

  get(name: string): ReportDefinition {
    const definition = this.definitions.get(name);
    if (!definition) {
      throw new DomainError(REPORT_ERROR.NOT_FOUND, `报表不存在: ${name}`, { report: name });
    }
    return definition;
  }

  list(): ReadonlyArray<ReportDefinition> {
    return [...this.definitions.values()];
  }
}
