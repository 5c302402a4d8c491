// src/adapters/graphql/schema/scalar.registry.ts
import GraphQLJSON from 'graphql-type-json';

/**
 * 收集 schema 中使用的自定义标量
 * 标量由字段声明直接引用（报表数据行），无需 registerEnumType 式的注册，这里只汇总名称用于指纹
 */
export function registerScalars(): { scalars: string[] } {
  return { scalars: [GraphQLJSON.name] };
}
