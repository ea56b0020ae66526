/**
 * Error types raised by the query-string engine.
 *
 * Every failure is local and synchronous: it points at an offset in the input
 * text, or at the field/operator name that could not be handled. Nothing here
 * is retryable.
 */

export type QueryStringStage = 'lexer' | 'parser' | 'builder' | 'serializer' | 'pipeline';

/**
 * Base class carrying the stage and an optional troubleshooting hint.
 */
export class QueryStringError extends Error {
  /** Stage where the error occurred */
  public readonly stage: QueryStringStage;

  /** Human-readable troubleshooting hint */
  public readonly hint?: string;

  constructor(options: {
    message: string;
    stage: QueryStringStage;
    hint?: string;
    cause?: unknown;
  }) {
    super(options.message, options.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = 'QueryStringError';
    this.stage = options.stage;
    this.hint = options.hint;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }
}

/**
 * Malformed token: unterminated quote, bad escape, stray control character.
 */
export class LexError extends QueryStringError {
  public readonly offset: number;
  public readonly reason: string;

  constructor(offset: number, reason: string, hint?: string) {
    super({
      message: `${reason} at character offset ${offset}`,
      stage: 'lexer',
      hint,
    });
    this.name = 'LexError';
    this.offset = offset;
    this.reason = reason;
  }
}

/**
 * Grammar violation: unbalanced parentheses, dangling connective, malformed range.
 */
export class ParseError extends QueryStringError {
  public readonly offset: number;
  public readonly expected: string;
  public readonly found: string;

  constructor(options: {
    offset: number;
    expected: string;
    found: string;
    message?: string;
    hint?: string;
  }) {
    super({
      message:
        options.message ??
        `Expected ${options.expected} but found ${options.found} at character offset ${options.offset}`,
      stage: 'parser',
      hint: options.hint,
    });
    this.name = 'ParseError';
    this.offset = options.offset;
    this.expected = options.expected;
    this.found = options.found;
  }
}

/**
 * Raised by the transform pipeline when the input cannot be lexed or parsed.
 * The underlying {@link LexError} or {@link ParseError} is kept as `cause`.
 */
export class QueryStringParseError extends QueryStringError {
  public readonly offset: number;
  public readonly detail: string;

  constructor(offset: number, detail: string, cause?: LexError | ParseError) {
    super({
      message: `Failed to parse query string: ${detail}`,
      stage: 'pipeline',
      hint: cause?.hint,
      cause,
    });
    this.name = 'QueryStringParseError';
    this.offset = offset;
    this.detail = detail;
  }
}

/**
 * The builder was given an operator outside its mapping table.
 */
export class UnsupportedOperatorError extends QueryStringError {
  public readonly operator: string;

  constructor(operator: string) {
    super({
      message: `Unsupported operator: ${operator}`,
      stage: 'builder',
      hint: 'Use one of the built-in operators, map the name through operatorMapping, or register a condition parser for it',
    });
    this.name = 'UnsupportedOperatorError';
    this.operator = operator;
  }
}

/**
 * A field name fails the identifier pattern `[A-Za-z_][A-Za-z0-9_.]*`.
 */
export class InvalidIdentifierError extends QueryStringError {
  public readonly identifier: string;

  constructor(identifier: string, context?: string) {
    super({
      message: `Invalid identifier "${identifier}"${context ? ` in ${context}` : ''}`,
      stage: 'builder',
      hint: 'Identifiers start with a letter or underscore and contain only letters, digits, underscores and dots',
    });
    this.name = 'InvalidIdentifierError';
    this.identifier = identifier;
  }
}

/**
 * A condition is structurally unusable, e.g. `between` with a single value.
 */
export class InvalidConditionError extends QueryStringError {
  public readonly field: string;
  public readonly operator: string;

  constructor(field: string, operator: string, reason: string) {
    super({
      message: `Invalid condition on "${field}" (${operator}): ${reason}`,
      stage: 'builder',
    });
    this.name = 'InvalidConditionError';
    this.field = field;
    this.operator = operator;
  }
}

/**
 * A programming error: the serializer was handed a tree that breaks the AST
 * invariants (for instance a group with no children).
 */
export class InvariantError extends QueryStringError {
  constructor(message: string) {
    super({ message, stage: 'serializer' });
    this.name = 'InvariantError';
  }
}
