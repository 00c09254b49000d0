/**
 * Error types for stackterm.
 *
 * Every error the CLI reports carries a recovery hint and an exit code.
 * Screen-layer contract violations form their own family under
 * ContractViolationError: they signal a bug in the calling code and fail
 * immediately.
 */

/**
 * Base class for all reportable errors.
 */
export class CLIError extends Error {
  /** Recovery suggestion shown to the user */
  public readonly hint?: string;

  /** Exit code (1-255, 0 is reserved for success) */
  public readonly code: number;

  constructor(message: string, hint?: string, code: number = 1) {
    super(message);
    // Keep instanceof working for subclasses after transpilation
    Object.setPrototypeOf(this, new.target.prototype);
    this.name = 'CLIError';
    this.hint = hint;
    this.code = code;
  }
}

/**
 * Invalid TOML, a schema violation or an unknown config key.
 *
 * Exit code 2: Configuration error
 */
export class ConfigError extends CLIError {
  constructor(message: string, hint?: string) {
    super(message, hint ?? 'Run: stackterm config list  to see valid options', 2);
    this.name = 'ConfigError';
  }
}

/**
 * Input that fails a zod schema, with one line per issue.
 */
export class ValidationError extends CLIError {
  /** Individual validation issues */
  public readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    const hint = issues.length > 0 ? `Issues:\n  ${issues.join('\n  ')}` : 'Check your input and try again';
    super(message, hint, 1);
    this.name = 'ValidationError';
    this.issues = issues;
  }
}

/**
 * Base class for programming-contract violations in the screen layer.
 *
 * These indicate a caller bug (operating on a buffer that isn't on the
 * stack, starting a second prompt, ...). They are thrown immediately and
 * are not meant to be caught and retried.
 *
 * Exit code 70: internal software error (EX_SOFTWARE)
 */
export class ContractViolationError extends CLIError {
  constructor(message: string, hint?: string) {
    super(message, hint ?? 'This is a bug in the calling code', 70);
    this.name = 'ContractViolationError';
  }
}

/**
 * Thrown when a buffer operation targets a buffer not on the stack.
 */
export class BufferNotOnStackError extends ContractViolationError {
  /** Title of the offending buffer */
  public readonly title: string;

  constructor(title: string) {
    super(
      `Buffer not on stack: ${JSON.stringify(title)}`,
      'Buffers can only be raised, focused or killed while they are on the stack'
    );
    this.name = 'BufferNotOnStackError';
    this.title = title;
  }
}

/**
 * Thrown when a buffer is registered under a title that is already taken.
 */
export class DuplicateBufferError extends ContractViolationError {
  constructor(title: string) {
    super(
      `Duplicate buffer name: ${JSON.stringify(title)}`,
      'Use spawn(), which picks a unique title, instead of registering directly'
    );
    this.name = 'DuplicateBufferError';
  }
}

export class InvalidTitleError extends ContractViolationError {
  constructor(title: unknown) {
    super(`Buffer title must be a string, got ${typeof title}`);
    this.name = 'InvalidTitleError';
  }
}

/**
 * Thrown when a prompt starts while another prompt is active.
 */
export class PromptActiveError extends ContractViolationError {
  constructor(question: string) {
    super(
      `Cannot ask ${JSON.stringify(question)}: another prompt is already active`,
      'Only one prompt or confirmation dialog may run at a time'
    );
    this.name = 'PromptActiveError';
  }
}
