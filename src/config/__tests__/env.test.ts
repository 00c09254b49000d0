/**
 * Environment Variable Handler Tests
 *
 * Uses vi.stubEnv() for safe environment variable mocking.
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { loadEnv, getEnv, _clearEnvCache } from '../env.js';

describe('Environment Variable Loading', () => {
  beforeEach(() => {
    _clearEnvCache();
    vi.stubEnv('STACKTERM_HOME', '');
    vi.stubEnv('STACKTERM_LOG_FILE', '');
    vi.stubEnv('SHELL', '');
  });

  afterEach(() => {
    _clearEnvCache();
    vi.unstubAllEnvs();
  });

  it('treats empty values as unset', () => {
    const env = loadEnv();

    expect(env.STACKTERM_HOME).toBeUndefined();
    expect(env.STACKTERM_LOG_FILE).toBeUndefined();
  });

  it('falls back to /bin/sh for SHELL', () => {
    expect(getEnv('SHELL')).toBe('/bin/sh');
  });

  it('reads configured values', () => {
    vi.stubEnv('STACKTERM_HOME', '/tmp/stackterm-home');
    vi.stubEnv('STACKTERM_LOG_FILE', '/tmp/stackterm.log');
    vi.stubEnv('SHELL', '/bin/zsh');

    expect(loadEnv()).toEqual({
      STACKTERM_HOME: '/tmp/stackterm-home',
      STACKTERM_LOG_FILE: '/tmp/stackterm.log',
      SHELL: '/bin/zsh',
    });
  });

  it('caches environment variables after first load', () => {
    vi.stubEnv('SHELL', '/bin/bash');
    loadEnv();

    vi.stubEnv('SHELL', '/bin/fish');

    expect(getEnv('SHELL')).toBe('/bin/bash');
  });

  it('returns fresh values after cache is cleared', () => {
    vi.stubEnv('SHELL', '/bin/bash');
    loadEnv();

    _clearEnvCache();
    vi.stubEnv('SHELL', '/bin/fish');

    expect(getEnv('SHELL')).toBe('/bin/fish');
  });
});
