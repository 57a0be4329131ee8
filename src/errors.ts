/**
 * Error taxonomy shared by the scanner, parser, invoker and extractor
 */

export abstract class AiLintError extends Error {
  abstract readonly code: string;
  readonly exitCode: number = 1;

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = this.constructor.name;
  }
}

/** No session, policy or file matches what was asked for */
export class NotFoundError extends AiLintError {
  readonly code = 'NOT_FOUND';
}

/**
 * A single transcript line that could not be parsed. Raised and caught
 * inside the parser; never reaches the CLI.
 */
export class MalformedRecordError extends AiLintError {
  readonly code = 'MALFORMED_RECORD';

  constructor(
    readonly lineNumber: number,
    reason: string,
  ) {
    super(`Line ${lineNumber}: ${reason}`);
  }
}

export type InvocationFailure = 'missing-executable' | 'timeout' | 'exit';

export class InvocationError extends AiLintError {
  readonly code = 'INVOCATION_FAILED';

  constructor(
    readonly reason: InvocationFailure,
    message: string,
    readonly stderr = '',
    options?: ErrorOptions,
  ) {
    super(message, options);
  }
}

/** The model response could not be recovered into structured data */
export class ParseError extends AiLintError {
  readonly code = 'PARSE_FAILED';

  constructor(
    message: string,
    readonly raw: string,
  ) {
    super(message);
  }
}

/** Standard input ended while a question was waiting for an answer */
export class InputClosedError extends AiLintError {
  readonly code = 'INPUT_CLOSED';
}

export class ConfigError extends AiLintError {
  readonly code = 'CONFIG_INVALID';
}

export function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && 'code' in err;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
