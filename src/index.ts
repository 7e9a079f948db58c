export { PassphraseConfig, DEFAULT_SYMBOL_ALPHABET, DEFAULT_WORD_LIST_PATH } from './config';
export {
  PassphraseGenerator,
  applyAdaptivePadding,
  applyFixedPadding,
  randomDigits,
  resolveSeparator,
} from './passphrase';
export type { PassphraseGeneratorOptions } from './passphrase';
export { transformCase, transformWord } from './caseTransform';
export { substituteCharacters } from './substitution';
export { filterCandidates, selectWords } from './words';
export type { WordLengthBounds } from './words';
export { ArrayWordSource, FileWordSource, createWordSource } from './wordSource';
export { CryptoRandom, SeededRandom, coinFlip, pick } from './random';
export {
  EmptyCandidateSetError,
  InvalidConfigurationError,
  PassphraseError,
  WordSourceUnavailableError,
} from './errors';
export type { PassphraseErrorCode } from './errors';
export { CASE_TRANSFORMS, PADDING_TYPES } from './types';
export type {
  CaseTransform,
  CharacterChoice,
  PaddingType,
  PassphraseOptions,
  PassphraseOptionsSnapshot,
  RandomSource,
  WordSource,
} from './types';
