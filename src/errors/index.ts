/**
 * Error handling module for stackterm
 *
 * This module exports:
 * - Error classes with recovery hints and exit codes
 * - Error formatting and handling utilities
 *
 * Usage:
 *   import { ConfigError, handleError } from './errors/index.js';
 *
 *   throw new ConfigError('Invalid option', 'Try: stackterm config list');
 */

// Error types
export {
  CLIError,
  ConfigError,
  ValidationError,
  ContractViolationError,
  BufferNotOnStackError,
  DuplicateBufferError,
  InvalidTitleError,
  PromptActiveError,
} from './types.js';

// Error handling utilities
export {
  formatError,
  getExitCode,
  handleError,
  createGlobalErrorHandler,
  type ErrorHandlerOptions,
  type ErrorOutput,
} from './handler.js';
