import { afterEach, describe, expect, it, vi } from 'vitest';
import { getEnv } from '../src/env.js';

describe('getEnv', () => {
  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it('parses numbers and the permanently-closed flag', () => {
    vi.stubEnv('PORT', '8081');
    vi.stubEnv('PROVIDER_TIMEOUT_MS', '2500');
    vi.stubEnv('INCLUDE_PERMANENTLY_CLOSED', '0');

    const env = getEnv();
    expect(env.PORT).toBe(8081);
    expect(env.PROVIDER_TIMEOUT_MS).toBe(2500);
    expect(env.INCLUDE_PERMANENTLY_CLOSED).toBe(false);
  });

  it('keeps permanently closed places unless told otherwise', () => {
    vi.stubEnv('INCLUDE_PERMANENTLY_CLOSED', 'true');
    expect(getEnv().INCLUDE_PERMANENTLY_CLOSED).toBe(true);
  });

  it('rejects a non-numeric provider timeout', () => {
    vi.stubEnv('PROVIDER_TIMEOUT_MS', 'soon');
    expect(() => getEnv()).toThrow(/Invalid environment variables/);
  });
});
