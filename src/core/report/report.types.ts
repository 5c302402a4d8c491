// src/core/report/report.types.ts
// 报表定义相关的纯类型，零依赖

import type { PageLinkLabels } from '@core/pagination/pagination.types';

/**
 * 规范化后的列定义，核心组件只认识这一种形态
 */
export interface ColumnSpec {
  /** 请求参数中使用的排序键，同时用于查找排序片段 */
  readonly key: string;
  /** SELECT 中的表达式，原样输出 */
  readonly queryFragment: string;
  /** ORDER BY 使用的表达式，缺省与 queryFragment 相同 */
  readonly orderFragment: string;
  readonly displayLabel: string;
  readonly sortable: boolean;
}

/**
 * 详细列定义
 * order 可指向原始表达式：例如 SELECT 中选出格式化后的日期文本，排序仍按原始时间戳
 */
export interface DetailedColumnDefinition {
  readonly key: string;
  readonly sql: string;
  readonly display?: string;
  readonly sortable?: boolean;
  readonly order?: string;
}

/** 简写形式：仅给出列名 */
export type ColumnDefinition = string | DetailedColumnDefinition;

/**
 * 总数统计策略
 * - FOUND_ROWS：SQL_CALC_FOUND_ROWS + FOUND_ROWS()，每次数据查询顺带得到总数
 * - COUNT_QUERY：先执行 COUNT(*) 并核对页码，再执行数据查询
 */
export type CountStrategy = 'FOUND_ROWS' | 'COUNT_QUERY';

export interface ReportDefaults {
  readonly pageSize: number;
  readonly windowSize: number;
  readonly countStrategy: CountStrategy;
  /** 仅作用于简写列 */
  readonly columnSortDefault: boolean;
}

export interface ReportDefinitionInput {
  readonly name: string;
  /**
   * 从 FROM 开始直到 WHERE / GROUP BY / HAVING 结束的 SQL 片段
   * HAVING 可以引用列别名：COUNT_QUERY 的总数子查询同样投影全部列
   */
  readonly sqlFragment: string;
  readonly columns: ReadonlyArray<ColumnDefinition>;
  readonly defaultSort: string;
  readonly pageSize?: number;
  readonly windowSize?: number;
  readonly columnSortDefault?: boolean;
  readonly countStrategy?: CountStrategy;
  readonly labels?: Partial<PageLinkLabels>;
}

export interface ReportDefinition {
  readonly name: string;
  readonly sqlFragment: string;
  readonly columns: ReadonlyArray<ColumnSpec>;
  /** 与 columns 一一对应的结果字段名（去掉别名/表前缀后的行键） */
  readonly resultFields: ReadonlyArray<string>;
  readonly defaultSort: string;
  readonly pageSize: number;
  readonly windowSize: number;
  readonly countStrategy: CountStrategy;
  readonly labels: PageLinkLabels;
}

/**
 * 查询计划：只包含子句字符串，不访问数据库
 */
export interface QueryPlan {
  readonly orderByClause: string;
  readonly limitClause: string;
  readonly projectedFields: ReadonlyArray<string>;
  readonly offset: number;
  readonly limit: number;
}
