// src/adapters/graphql/schema/enum.registry.ts

import { registerEnumType } from '@nestjs/graphql';
import { GqlPageLinkKind, GqlSortDirection } from '@src/adapters/graphql/report/report.enums';

/**
 * 枚举注册配置接口
 */
interface EnumConfig {
  /** 枚举类型 */
  enumType: object;
  /** GraphQL 名称 */
  name: string;
  /** 描述 */
  description: string;
  /** 值映射 */
  valuesMap: Record<string, { description: string }>;
}

/**
 * 枚举注册配置映射表
 */
const ENUM_CONFIGS: Record<string, EnumConfig> = {
  SORT_DIRECTION: {
    enumType: GqlSortDirection,
    name: 'SortDirection',
    description: '排序方向',
    valuesMap: {
      ASC: { description: '升序' },
      DESC: { description: '降序' },
    },
  },
  PAGE_LINK_KIND: {
    enumType: GqlPageLinkKind,
    name: 'PageLinkKind',
    description: '页码链接类型',
    valuesMap: {
      FIRST: { description: '首页' },
      PREV: { description: '上一页' },
      PAGE: { description: '页码' },
      NEXT: { description: '下一页' },
      LAST: { description: '末页' },
    },
  },
};

/**
 * 应注册的枚举清单
 */
export const EXPECTED_ENUMS: ReadonlyArray<string> = ['SortDirection', 'PageLinkKind'];

/**
 * 注册所有 GraphQL 枚举类型
 * @returns 已注册的枚举名称
 */
export function registerEnums(): string[] {
  const registeredEnums: string[] = [];

  Object.values(ENUM_CONFIGS).forEach((config) => {
    registerEnumType(config.enumType, {
      name: config.name,
      description: config.description,
      valuesMap: config.valuesMap,
    });
    registeredEnums.push(config.name);
  });

  const missingEnums = EXPECTED_ENUMS.filter((enumName) => !registeredEnums.includes(enumName));
  if (missingEnums.length > 0) {
    throw new Error(`GraphQL 枚举注册失败：以下枚举未成功注册 - ${missingEnums.join(', ')}`);
  }
  return registeredEnums;
}
