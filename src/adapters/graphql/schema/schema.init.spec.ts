// src/adapters/graphql/schema/schema.init.spec.ts
import { initGraphQLSchema, resetInitState } from './schema.init';

describe('initGraphQLSchema', () => {
  beforeEach(() => {
    resetInitState();
  });

  it('注册报表用到的枚举与标量', () => {
    const result = initGraphQLSchema();

    expect(result.success).toBe(true);
    expect(result.enums).toEqual(['SortDirection', 'PageLinkKind']);
    expect(result.scalars).toEqual(['JSON']);
    expect(result.fingerprint).toHaveLength(8);
  });

  it('重复调用被忽略', () => {
    initGraphQLSchema();
    const second = initGraphQLSchema();

    expect(second.success).toBe(false);
    expect(second.message).toBe('Schema 已初始化，重复调用已忽略');
  });
});
