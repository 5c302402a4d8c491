// src/core/pagination/pagination.types.ts
// 纯类型与值对象，零依赖、零副作用

export type SortDirection = 'ASC' | 'DESC';

/**
 * 单次请求的页码状态
 * requestedIndex 来自用户输入，在与实际总数核对之前都不可信
 */
export interface PageState {
  readonly requestedIndex: number;
  readonly pageSize: number;
  readonly windowSize: number;
}

/**
 * 结果窗口：每观测到一次总数就重新计算，决定是否需要重新查询
 */
export interface ResultWindow {
  readonly totalCount: number;
  /** ceil(totalCount / pageSize)，totalCount 为 0 时为 0 */
  readonly pageCount: number;
  readonly currentIndex: number;
  readonly isValid: boolean;
}

export type ReconcileDecision =
  | { readonly kind: 'VALID'; readonly window: ResultWindow }
  | { readonly kind: 'OVERRUN'; readonly window: ResultWindow; readonly corrected: PageState };

export type PageLinkKind = 'FIRST' | 'PREV' | 'PAGE' | 'NEXT' | 'LAST';

export interface PageLink {
  readonly kind: PageLinkKind;
  readonly label: string;
  readonly targetIndex: number;
  /** 仅 PAGE 类型可能为 true */
  readonly current: boolean;
}

export interface PageList {
  readonly pageLinks: ReadonlyArray<PageLink>;
  readonly hasPrev: boolean;
  readonly hasNext: boolean;
  /** 无结果时为 null */
  readonly firstIndex: number | null;
  readonly lastIndex: number | null;
}

export interface PageLinkLabels {
  readonly first: string;
  readonly prev: string;
  readonly next: string;
  readonly last: string;
}
