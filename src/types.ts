export const PADDING_TYPES = ['None', 'Fixed', 'Adaptive'] as const;

export type PaddingType = (typeof PADDING_TYPES)[number];

export const CASE_TRANSFORMS = [
  'None',
  'UpperCase',
  'LowerCase',
  'Capitalize',
  'Invert',
  'Alternate',
  'Random',
] as const;

export type CaseTransform = (typeof CASE_TRANSFORMS)[number];

/**
 * A character setting that can be left to chance, switched off, or pinned.
 * For padding characters, 'none' behaves like 'random'.
 */
export type CharacterChoice =
  | { kind: 'random' }
  | { kind: 'none' }
  | { kind: 'fixed'; char: string };

export interface PassphraseOptions {
  wordListPath: string;
  symbolAlphabet: Iterable<string>;
  separatorAlphabet: Iterable<string>;
  minWordLength: number;
  maxWordLength: number;
  wordCount: number;
  separatorCharacter: CharacterChoice;
  paddingDigitsBefore: number;
  paddingDigitsAfter: number;
  paddingType: PaddingType;
  paddingCharacter: CharacterChoice;
  paddingCharactersBefore: number;
  paddingCharactersAfter: number;
  padToLength: number;
  caseTransform: CaseTransform;
  characterSubstitutions: Iterable<readonly [string, string]>;
}

/** JSON-friendly view of a configuration, as reported by the service. */
export interface PassphraseOptionsSnapshot {
  wordListPath: string;
  symbolAlphabet: string;
  separatorAlphabet: string;
  minWordLength: number;
  maxWordLength: number;
  wordCount: number;
  separatorCharacter: CharacterChoice;
  paddingDigitsBefore: number;
  paddingDigitsAfter: number;
  paddingType: PaddingType;
  paddingCharacter: CharacterChoice;
  paddingCharactersBefore: number;
  paddingCharactersAfter: number;
  padToLength: number;
  caseTransform: CaseTransform;
  characterSubstitutions: Record<string, string>;
}

/** Uniform integer source; everything random in a generator goes through one of these. */
export interface RandomSource {
  /** Returns an integer in [0, maxExclusive). */
  nextInt(maxExclusive: number): number;
}

/** Supplies the raw candidate words, one per line of the underlying list. */
export interface WordSource {
  readWords(): string[];
}

export interface GeneratePassphraseResponse {
  passphrase: string;
}

export interface GeneratePassphrasesResponse {
  passphrases: string[];
}

export interface HealthResponse {
  status: 'ok';
  timestamp: string;
}
