// src/core/common/errors/domain-error.spec.ts
import {
  ConfigurationError,
  DomainError,
  isDomainError,
  OverrunExhaustedError,
  REPORT_ERROR,
} from './domain-error';

describe('DomainError', () => {
  it('子类带固定错误码并保持 instanceof', () => {
    const configuration = new ConfigurationError('坏配置', { key: 'x' });
    const exhausted = new OverrunExhaustedError('越界');

    expect(configuration).toBeInstanceOf(DomainError);
    expect(configuration.code).toBe(REPORT_ERROR.CONFIGURATION_INVALID);
    expect(configuration.name).toBe('ConfigurationError');
    expect(exhausted.code).toBe(REPORT_ERROR.OVERRUN_EXHAUSTED);
    expect(exhausted.toJSON()).toEqual({
      name: 'OverrunExhaustedError',
      code: REPORT_ERROR.OVERRUN_EXHAUSTED,
      message: '越界',
      details: undefined,
    });
  });

  it('错误码表不可修改', () => {
    expect(Object.isFrozen(REPORT_ERROR)).toBe(true);
  });

  it('isDomainError 识别实例与反序列化后的对象', () => {
    expect(isDomainError(new ConfigurationError('x'))).toBe(true);
    expect(isDomainError({ name: 'OverrunExhaustedError', code: REPORT_ERROR.OVERRUN_EXHAUSTED })).toBe(
      true,
    );
    expect(isDomainError({ name: 'TypeError', code: 'X' })).toBe(false);
    expect(isDomainError(new Error('x'))).toBe(false);
    expect(isDomainError(null)).toBe(false);
  });
});
