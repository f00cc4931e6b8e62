export type SanitizerErrorCode =
  | 'CONFIG_INVALID'
  | 'RULES_SOURCE'
  | 'RULE_INVALID'
  | 'RULES_EMPTY'
  | 'FILE_PROCESSING';

export abstract class SanitizerError extends Error {
  abstract readonly code: SanitizerErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class ConfigError extends SanitizerError {
  readonly code = 'CONFIG_INVALID';
}

/** The rules file could not be read at all. */
export class RulesSourceError extends SanitizerError {
  readonly code = 'RULES_SOURCE';

  constructor(readonly path: string, cause: unknown) {
    super(`Rules file not readable: ${path} (${describeError(cause)})`, { cause });
  }
}

export class InvalidRuleError extends SanitizerError {
  readonly code = 'RULE_INVALID';

  constructor(
    readonly sourceName: string,
    readonly lineNumber: number,
    readonly sourceText: string,
    readonly underlyingMessage: string,
  ) {
    super(`Invalid regex on line ${lineNumber} of ${sourceName}: ${underlyingMessage}`);
  }
}

export class EmptyRuleSetError extends SanitizerError {
  readonly code = 'RULES_EMPTY';

  constructor(readonly sourceName: string) {
    super(`No sanitization rules found in ${sourceName}`);
  }
}

export class FileProcessingError extends SanitizerError {
  readonly code = 'FILE_PROCESSING';

  constructor(readonly path: string, cause: unknown) {
    super(`Failed to process ${path}: ${describeError(cause)}`, { cause });
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
