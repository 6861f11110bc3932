import { describe, expect, it } from 'vitest';
import { config, envSchema } from '../../../src/config/env';

describe('Env Config', () => {
  it('loads processing defaults', () => {
    expect(config.PORT).toBeDefined();
    expect(config.DEFAULT_DECIMALS).toBeGreaterThanOrEqual(2);
    expect(config.DEFAULT_DECIMALS).toBeLessThanOrEqual(8);
  });

  it('falls back to documented defaults', () => {
    const parsed = envSchema.parse({});
    expect(parsed.PORT).toBe(4001);
    expect(parsed.DEFAULT_DECIMALS).toBe(6);
    expect(parsed.PROTECT_HEADERS).toBe('true');
    expect(parsed.LOG_LEVEL).toBe('info');
  });

  it('rejects precision outside 2..8', () => {
    expect(envSchema.safeParse({ DEFAULT_DECIMALS: '9' }).success).toBe(false);
    expect(envSchema.safeParse({ DEFAULT_DECIMALS: '1' }).success).toBe(false);
  });
});
