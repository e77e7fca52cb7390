/**
 * Error types raised by the version parsers and converters.
 */

export type VersionErrorKind =
  | 'EmptyInput'
  | 'DoesNotStartWithDigit'
  | 'TooManyNumericParts'
  | 'NumericOverflow'
  | 'EmptyNumericPart'
  | 'SemverParseFailure';

const DEFAULT_MESSAGES: Record<VersionErrorKind, string> = {
  EmptyInput: 'There is no version string to parse',
  DoesNotStartWithDigit: 'The version string does not start with a number',
  TooManyNumericParts:
    'There were additional numeric characters after the first 4 parts of the version',
  NumericOverflow: 'A numeric part of the version is too large',
  EmptyNumericPart: 'A numeric part of the version is empty',
  SemverParseFailure: 'The value is not a valid semantic version',
};

/**
 * A recoverable failure to read a version string.
 * Callers branch on `kind`; the message is meant for humans.
 */
export class VersionParseError extends Error {
  readonly kind: VersionErrorKind;
  readonly input: string;

  constructor(kind: VersionErrorKind, input: string, detail?: string) {
    const base = DEFAULT_MESSAGES[kind];
    super(detail ? `${base}: ${detail}` : base);
    this.name = 'VersionParseError';
    this.kind = kind;
    this.input = input;
  }
}

/**
 * Raised when a Chocolatey version was assembled into a string that the
 * semver parser rejects. This is a bug in the converter, not bad input.
 */
export class InternalAssemblyError extends Error {
  readonly assembled: string;

  constructor(assembled: string, cause?: unknown) {
    super(`Converted version "${assembled}" is not a valid semantic version`, { cause });
    this.name = 'InternalAssemblyError';
    this.assembled = assembled;
  }
}

export function isVersionParseError(err: unknown): err is VersionParseError {
  return err instanceof VersionParseError;
}
