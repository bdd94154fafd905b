// packages/sieve-core/src/errors.ts
//
// Error taxonomy shared by the engine and its front ends.
//
//   • ValidationError   → malformed attempt pair (length, marker, letter)
//   • UsageError        → malformed argument list (odd count of attempt args)
//   • ContradictionError→ feedback that no single solution could produce
//   • DictionaryError   → candidate source could not be read
//
// Every class carries a stable `code` so the CLI and the HTTP layer can map
// failures without matching on messages.

export type ValidationCode =
  | 'LENGTH_MISMATCH'
  | 'UNKNOWN_MARKER'
  | 'UNKNOWN_LETTER'
  | 'EMPTY_GUESS'
  | 'INVALID_WINDOW'
  | 'INVALID_LIMIT';

export type ContradictionKind =
  | 'excluded-then-placed'
  | 'placed-then-excluded'
  | 'position-locked';

export class SieveError extends Error {
  readonly code: string;

  constructor(code: string, message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

export class ValidationError extends SieveError {
  declare readonly code: ValidationCode;

  constructor(
    code: ValidationCode,
    message: string,
    readonly record?: number,
  ) {
    super(code, message);
  }
}

export class UsageError extends SieveError {
  constructor(message: string) {
    super('USAGE', message);
  }
}

/**
 * Raised (or returned from ConstraintEngine.fold) when feedback asserts a
 * letter both absent and present, or locks one position to two letters.
 */
export class ContradictionError extends SieveError {
  declare readonly code: 'CONTRADICTION';

  constructor(
    readonly kind: ContradictionKind,
    readonly letter: string,
    readonly position: number,
    readonly record: number,
    detail: string,
  ) {
    super('CONTRADICTION', `attempt #${record + 1}: ${detail}`);
  }
}

export class DictionaryError extends SieveError {
  constructor(
    readonly path: string,
    cause: unknown,
  ) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super('DICTIONARY', `cannot read dictionary ${path}: ${reason}`, { cause });
  }
}
