import { afterEach, describe, expect, test, vi } from 'vitest';
import { envBool, envInt, envStr } from '../env';

describe('env helpers', () => {
  afterEach(() => {
    vi.unstubAllEnvs();
  });

  test('envStr falls back when the variable is unset', () => {
    vi.stubEnv('SOURCES_DIR', 'captures');
    expect(envStr('SOURCES_DIR', 'out')).toBe('captures');
    expect(envStr('UNSET_TEST_VARIABLE', 'out')).toBe('out');
  });

  test('envInt ignores values that are not numbers', () => {
    vi.stubEnv('NAV_TIMEOUT_MS', '45000');
    expect(envInt('NAV_TIMEOUT_MS', 30000)).toBe(45000);
    vi.stubEnv('NAV_TIMEOUT_MS', 'soon');
    expect(envInt('NAV_TIMEOUT_MS', 30000)).toBe(30000);
  });

  test('envBool accepts the usual truthy spellings', () => {
    for (const v of ['1', 'true', 'YES', 'on']) {
      vi.stubEnv('HEADLESS', v);
      expect(envBool('HEADLESS', false)).toBe(true);
    }
    vi.stubEnv('HEADLESS', 'false');
    expect(envBool('HEADLESS', true)).toBe(false);
    expect(envBool('UNSET_TEST_VARIABLE', true)).toBe(true);
  });
});
