// src/core/sort/sort.types.ts
// 排序状态与表头条目的纯类型

import type { SortDirection } from '@core/pagination/pagination.types';

export interface SortState {
  readonly activeKey: string;
  readonly direction: SortDirection;
}

/** 链接参数：由渲染层编码为查询字符串 */
export type LinkParams = Readonly<Record<string, string>>;

export interface SortHeader {
  readonly key: string;
  readonly label: string;
  readonly sortable: boolean;
  /** 当前排序列，用于展示排序指示 */
  readonly active: boolean;
  /** 仅当前排序列有值 */
  readonly direction: SortDirection | null;
  /** 不可排序的列为 null */
  readonly params: LinkParams | null;
}
