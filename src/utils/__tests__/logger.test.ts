/**
 * Logger Tests
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { mkdtempSync, readFileSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { consoleLogger, createFileLogger, silentLogger } from '../logger.js';

describe('createFileLogger', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'stackterm-log-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('appends timestamped lines with their level', () => {
    const path = join(dir, 'session.log');
    const logger = createFileLogger(path, () => new Date('2024-05-01T12:00:00.000Z'));

    logger.debug?.('spawned buffer "home"');
    logger.warn('redraw failed');

    expect(readFileSync(path, 'utf-8')).toBe(
      '2024-05-01T12:00:00.000Z DEBUG spawned buffer "home"\n' +
        '2024-05-01T12:00:00.000Z WARN redraw failed\n'
    );
  });
});

describe('consoleLogger', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('sends warnings to console.warn and debug to console.log', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});

    consoleLogger.warn('careful');
    consoleLogger.debug?.('details');

    expect(warn).toHaveBeenCalledWith('careful');
    expect(log).toHaveBeenCalledWith('details');
  });
});

describe('silentLogger', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('prints nothing', () => {
    const warn = vi.spyOn(console, 'warn');
    const log = vi.spyOn(console, 'log');

    silentLogger.warn('ignored');
    silentLogger.debug?.('ignored');

    expect(warn).not.toHaveBeenCalled();
    expect(log).not.toHaveBeenCalled();
  });
});
