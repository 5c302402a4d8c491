// src/adapters/graphql/schema/schema.init.ts

import { createHash } from 'crypto';
import { registerEnums } from './enum.registry';
import { registerScalars } from './scalar.registry';

export interface SchemaInitResult {
  /** 重复调用时为 false */
  readonly success: boolean;
  readonly enums: ReadonlyArray<string>;
  readonly scalars: ReadonlyArray<string>;
  /** 已注册类型名的短哈希，用于比对不同实例的 schema 是否一致 */
  readonly fingerprint: string;
  readonly message: string;
}

let inited = false;

function generateSchemaFingerprint(types: ReadonlyArray<string>): string {
  return createHash('md5').update([...types].sort().join('|')).digest('hex').substring(0, 8);
}

/**
 * 初始化 GraphQL Schema
 * 必须在 NestFactory.create 之前调用：DTO 中引用的枚举要先注册才能生成 schema
 */
export function initGraphQLSchema(): SchemaInitResult {
  // 热更新与测试中可能重复调用，忽略即可
  if (inited) {
    return {
      success: false,
      enums: [],
      scalars: [],
      fingerprint: '',
      message: 'Schema 已初始化，重复调用已忽略',
    };
  }

  try {
    const enums = registerEnums();
    const { scalars } = registerScalars();
    inited = true;

    return {
      success: true,
      enums,
      scalars,
      fingerprint: generateSchemaFingerprint([...enums, ...scalars]),
      message: `成功注册 ${enums.length + scalars.length} 个 GraphQL 类型`,
    };
  } catch (error) {
    const errorMessage = error instanceof Error ? error.message : '未知错误';
    throw new Error(`GraphQL Schema 初始化失败: ${errorMessage}`);
  }
}

/**
 * 重置初始化状态（仅用于测试）
 * @internal
 */
export function resetInitState(): void {
  if (process.env.NODE_ENV !== 'test') {
    throw new Error('resetInitState 只能在测试环境中使用');
  }
  inited = false;
}
