export type PassphraseErrorCode =
  | 'INVALID_CONFIGURATION'
  | 'EMPTY_CANDIDATE_SET'
  | 'WORD_SOURCE_UNAVAILABLE';

/**
 * Base class for everything the generator throws on purpose.
 * `status` is the HTTP status the service answers with.
 */
export abstract class PassphraseError extends Error {
  abstract readonly code: PassphraseErrorCode;
  abstract readonly status: number;
  abstract readonly title: string;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class InvalidConfigurationError extends PassphraseError {
  readonly code = 'INVALID_CONFIGURATION';
  readonly status = 400;
  readonly title = 'Invalid Configuration';

  constructor(
    readonly field: string,
    readonly value: unknown,
    reason: string
  ) {
    super(`Invalid value for ${field}: ${reason}`);
  }
}

export class EmptyCandidateSetError extends PassphraseError {
  readonly code = 'EMPTY_CANDIDATE_SET';
  readonly status = 422;
  readonly title = 'Empty Candidate Set';

  constructor(
    readonly minWordLength: number,
    readonly maxWordLength: number,
    readonly sourceSize: number
  ) {
    super(
      `No words longer than ${minWordLength} and shorter than ${maxWordLength} characters among ${sourceSize} candidates`
    );
  }
}

export class WordSourceUnavailableError extends PassphraseError {
  readonly code = 'WORD_SOURCE_UNAVAILABLE';
  readonly status = 503;
  readonly title = 'Word Source Unavailable';

  constructor(
    readonly path: string,
    cause: unknown
  ) {
    super(
      `Failed to read word list ${path}: ${cause instanceof Error ? cause.message : String(cause)}`,
      { cause }
    );
  }
}
