/**
 * Tests for error handling system
 *
 * Tests cover:
 * - Error class instantiation and properties
 * - Contract-violation family
 * - Error formatting (text and JSON)
 * - Exit code extraction and the cleanup hook
 */

import { describe, it, expect, vi, afterEach } from 'vitest';
import {
  CLIError,
  ConfigError,
  ValidationError,
  ContractViolationError,
  BufferNotOnStackError,
  DuplicateBufferError,
  InvalidTitleError,
  PromptActiveError,
  formatError,
  getExitCode,
  handleError,
} from '../index.js';

describe('Error Classes', () => {
  describe('CLIError', () => {
    it('creates error with message only', () => {
      const error = new CLIError('Something went wrong');

      expect(error.message).toBe('Something went wrong');
      expect(error.hint).toBeUndefined();
      expect(error.code).toBe(1);
      expect(error.name).toBe('CLIError');
    });

    it('creates error with custom exit code', () => {
      const error = new CLIError('Critical failure', 'Reboot', 99);

      expect(error.hint).toBe('Reboot');
      expect(error.code).toBe(99);
    });

    it('is instanceof Error', () => {
      const error = new CLIError('test');

      expect(error).toBeInstanceOf(Error);
      expect(error).toBeInstanceOf(CLIError);
    });
  });

  describe('ConfigError', () => {
    it('creates error with default hint', () => {
      const error = new ConfigError('Invalid option');

      expect(error.hint).toBe('Run: stackterm config list  to see valid options');
      expect(error.code).toBe(2);
      expect(error.name).toBe('ConfigError');
    });

    it('creates error with custom hint', () => {
      expect(new ConfigError('Invalid option', 'Custom hint').hint).toBe('Custom hint');
    });
  });

  describe('ValidationError', () => {
    it('lists issues in the hint', () => {
      const error = new ValidationError('Invalid input', ['rows: Too small', 'key: Required']);

      expect(error.hint).toBe('Issues:\n  rows: Too small\n  key: Required');
      expect(error.issues).toEqual(['rows: Too small', 'key: Required']);
      expect(error.code).toBe(1);
    });

    it('creates error without issues', () => {
      const error = new ValidationError('Invalid input');

      expect(error.hint).toBe('Check your input and try again');
      expect(error.issues).toHaveLength(0);
    });
  });

  describe('contract violations', () => {
    it('exits with EX_SOFTWARE and a caller-bug hint by default', () => {
      const error = new ContractViolationError('bad call');

      expect(error.code).toBe(70);
      expect(error.hint).toBe('This is a bug in the calling code');
      expect(error).toBeInstanceOf(CLIError);
    });

    it('BufferNotOnStackError names the buffer', () => {
      const error = new BufferNotOnStackError('inbox');

      expect(error.message).toBe('Buffer not on stack: "inbox"');
      expect(error.title).toBe('inbox');
      expect(error).toBeInstanceOf(ContractViolationError);
      expect(error.name).toBe('BufferNotOnStackError');
    });

    it('DuplicateBufferError names the title', () => {
      expect(new DuplicateBufferError('inbox').message).toBe('Duplicate buffer name: "inbox"');
    });

    it('InvalidTitleError reports the received type', () => {
      expect(new InvalidTitleError(42).message).toBe('Buffer title must be a string, got number');
    });

    it('PromptActiveError quotes the question', () => {
      const error = new PromptActiveError('Save? ');

      expect(error.message).toBe('Cannot ask "Save? ": another prompt is already active');
      expect(error.code).toBe(70);
    });
  });
});

describe('formatError', () => {
  describe('text output', () => {
    it('formats CLIError with hint', () => {
      const output = formatError(new CLIError('Failed', 'Try again'));

      expect(output).toContain('Failed');
      expect(output).toContain('Hint:');
      expect(output).toContain('Try again');
    });

    it('formats CLIError without hint', () => {
      const output = formatError(new CLIError('Failed'));

      expect(output).toContain('Failed');
      expect(output).not.toContain('Hint:');
      expect(output.split('\n')).toHaveLength(1);
    });

    it('points standard errors at --verbose', () => {
      const output = formatError(new Error('Something broke'));

      expect(output).toContain('Something broke');
      expect(output).toContain('--verbose');
    });

    it('shows stack trace in verbose mode', () => {
      const output = formatError(new CLIError('Failed', 'Try again'), { verbose: true });

      expect(output).toContain('Stack trace:');
    });

    it('formats unknown error types', () => {
      expect(formatError('string error')).toContain('string error');
    });
  });

  describe('JSON output', () => {
    it('formats CLIError as JSON', () => {
      const parsed: unknown = JSON.parse(formatError(new ConfigError('Bad config', 'Fix it'), { json: true }));

      expect(parsed).toEqual({ error: 'Bad config', code: 2, hint: 'Fix it' });
    });

    it('formats contract violations with their exit code', () => {
      const parsed: unknown = JSON.parse(formatError(new InvalidTitleError(null), { json: true }));

      expect(parsed).toEqual({
        error: 'Buffer title must be a string, got object',
        code: 70,
        hint: 'This is a bug in the calling code',
      });
    });

    it('includes the stack only in verbose mode', () => {
      const error = new CLIError('Failed');
      const quiet: unknown = JSON.parse(formatError(error, { json: true }));
      const loud: unknown = JSON.parse(formatError(error, { json: true, verbose: true }));

      expect(quiet).toEqual({ error: 'Failed', code: 1 });
      expect(loud).toEqual({ error: 'Failed', code: 1, stack: error.stack });
    });

    it('formats unknown error as JSON', () => {
      const parsed: unknown = JSON.parse(formatError(42, { json: true }));

      expect(parsed).toEqual({ error: '42', code: 1 });
    });
  });
});

describe('getExitCode', () => {
  it('returns code from CLIError', () => {
    expect(getExitCode(new CLIError('test', undefined, 42))).toBe(42);
    expect(getExitCode(new ConfigError('bad'))).toBe(2);
    expect(getExitCode(new PromptActiveError('q'))).toBe(70);
  });

  it('returns 1 for anything else', () => {
    expect(getExitCode(new Error('test'))).toBe(1);
    expect(getExitCode('string')).toBe(1);
    expect(getExitCode(undefined)).toBe(1);
  });
});

describe('handleError', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('runs cleanup before printing, then exits with the error code', () => {
    const order: string[] = [];
    vi.spyOn(console, 'error').mockImplementation(() => {
      order.push('print');
    });
    const exit = vi.spyOn(process, 'exit').mockImplementation(() => {
      throw new Error('exit called');
    });

    expect(() =>
      handleError(new ConfigError('bad'), {
        cleanup: () => {
          order.push('cleanup');
        },
      })
    ).toThrow('exit called');

    expect(order).toEqual(['cleanup', 'print']);
    expect(exit).toHaveBeenCalledWith(2);
  });
});
