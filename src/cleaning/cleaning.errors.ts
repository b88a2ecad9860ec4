/**
 * Raised while assembling a pipeline: malformed patterns, wrong argument
 * shapes, or unknown rule names under the `fail` policy.
 */
export class ConfigurationError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ConfigurationError';
  }
}

/**
 * A mandatory reference file (numeral table, punctuation set, list file,
 * phrase source) is missing or does not match its schema.
 */
export class ReferenceDataError extends Error {
  constructor(
    message: string,
    public readonly path?: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'ReferenceDataError';
  }
}

/** Never escapes the transliteration capability; the token passes through. */
export class TransliterationFailure extends Error {
  constructor(
    public readonly token: string,
    options?: { cause?: unknown },
  ) {
    super(`transliteration failed for "${token}"`, options);
    this.name = 'TransliterationFailure';
  }
}
