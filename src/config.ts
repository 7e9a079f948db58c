import { InvalidConfigurationError } from './errors';
import { CASE_TRANSFORMS, PADDING_TYPES } from './types';
import type {
  CaseTransform,
  CharacterChoice,
  PaddingType,
  PassphraseOptions,
  PassphraseOptionsSnapshot,
} from './types';

export const DEFAULT_WORD_LIST_PATH = '?en.gz';

export const DEFAULT_SYMBOL_ALPHABET = '!@$%^&*-_+=:|~?';

function requireInteger(field: string, value: number, minimum?: number): number {
  if (!Number.isInteger(value)) {
    throw new InvalidConfigurationError(field, value, 'must be an integer');
  }
  if (minimum !== undefined && value < minimum) {
    throw new InvalidConfigurationError(field, value, `must be at least ${minimum}`);
  }
  return value;
}

function requireCharacter(field: string, value: string): string {
  if (typeof value !== 'string' || value.length !== 1) {
    throw new InvalidConfigurationError(field, value, 'must be a single character');
  }
  return value;
}

function requireChoice(field: string, value: CharacterChoice): CharacterChoice {
  switch (value.kind) {
    case 'random':
    case 'none':
      return { kind: value.kind };
    case 'fixed':
      return { kind: 'fixed', char: requireCharacter(field, value.char) };
    default:
      throw new InvalidConfigurationError(field, value, 'must be random, none or fixed');
  }
}

function toCharacterSet(field: string, chars: Iterable<string>): Set<string> {
  const result = new Set<string>();
  for (const char of chars) {
    result.add(requireCharacter(field, char));
  }
  return result;
}

/**
 * Settings for a PassphraseGenerator.
 *
 * Every setter validates before it stores, so a rejected assignment leaves the
 * previous value in place. Nothing is snapshotted: the generator reads these
 * fields on every call.
 */
export class PassphraseConfig {
  private _wordListPath = DEFAULT_WORD_LIST_PATH;
  private _symbolAlphabet = new Set(DEFAULT_SYMBOL_ALPHABET);
  private _separatorAlphabet = new Set<string>();
  private _minWordLength = 4;
  private _maxWordLength = 8;
  private _wordCount = 4;
  private _separatorCharacter: CharacterChoice = { kind: 'random' };
  private _paddingDigitsBefore = 2;
  private _paddingDigitsAfter = 2;
  private _paddingType: PaddingType = 'Fixed';
  private _paddingCharacter: CharacterChoice = { kind: 'random' };
  private _paddingCharactersBefore = 2;
  private _paddingCharactersAfter = 2;
  private _padToLength = 0;
  private _caseTransform: CaseTransform = 'Capitalize';
  private _characterSubstitutions = new Map<string, string>();

  constructor(options: Partial<PassphraseOptions> = {}) {
    this.apply(options);
  }

  /**
   * Assigns every present option through its setter, in declaration order.
   * Stops at the first invalid value.
   */
  apply(options: Partial<PassphraseOptions>): this {
    if (options.wordListPath !== undefined) this.wordListPath = options.wordListPath;
    if (options.symbolAlphabet !== undefined) this.symbolAlphabet = options.symbolAlphabet;
    if (options.separatorAlphabet !== undefined) this.separatorAlphabet = options.separatorAlphabet;
    if (options.minWordLength !== undefined) this.minWordLength = options.minWordLength;
    if (options.maxWordLength !== undefined) this.maxWordLength = options.maxWordLength;
    if (options.wordCount !== undefined) this.wordCount = options.wordCount;
    if (options.separatorCharacter !== undefined) this.separatorCharacter = options.separatorCharacter;
    if (options.paddingDigitsBefore !== undefined) this.paddingDigitsBefore = options.paddingDigitsBefore;
    if (options.paddingDigitsAfter !== undefined) this.paddingDigitsAfter = options.paddingDigitsAfter;
    if (options.paddingType !== undefined) this.paddingType = options.paddingType;
    if (options.paddingCharacter !== undefined) this.paddingCharacter = options.paddingCharacter;
    if (options.paddingCharactersBefore !== undefined) this.paddingCharactersBefore = options.paddingCharactersBefore;
    if (options.paddingCharactersAfter !== undefined) this.paddingCharactersAfter = options.paddingCharactersAfter;
    if (options.padToLength !== undefined) this.padToLength = options.padToLength;
    if (options.caseTransform !== undefined) this.caseTransform = options.caseTransform;
    if (options.characterSubstitutions !== undefined) this.characterSubstitutions = options.characterSubstitutions;
    return this;
  }

  /** Path of the word list; a leading '?' names a bundled gzip list. */
  get wordListPath(): string {
    return this._wordListPath;
  }

  set wordListPath(value: string) {
    if (typeof value !== 'string' || value.trim() === '') {
      throw new InvalidConfigurationError('wordListPath', value, 'must be a non-empty path');
    }
    this._wordListPath = value;
  }

  get symbolAlphabet(): ReadonlySet<string> {
    return this._symbolAlphabet;
  }

  set symbolAlphabet(value: Iterable<string>) {
    const chars = toCharacterSet('symbolAlphabet', value);
    if (chars.size === 0) {
      throw new InvalidConfigurationError('symbolAlphabet', value, 'must contain at least one character');
    }
    this._symbolAlphabet = chars;
  }

  /** Separator candidates; when empty the symbol alphabet is used instead. */
  get separatorAlphabet(): ReadonlySet<string> {
    return this._separatorAlphabet;
  }

  set separatorAlphabet(value: Iterable<string>) {
    this._separatorAlphabet = toCharacterSet('separatorAlphabet', value);
  }

  get minWordLength(): number {
    return this._minWordLength;
  }

  set minWordLength(value: number) {
    this._minWordLength = requireInteger('minWordLength', value, 1);
  }

  get maxWordLength(): number {
    return this._maxWordLength;
  }

  set maxWordLength(value: number) {
    this._maxWordLength = requireInteger('maxWordLength', value, 1);
  }

  get effectiveMinWordLength(): number {
    return Math.min(this._minWordLength, this._maxWordLength);
  }

  get effectiveMaxWordLength(): number {
    return Math.max(this._minWordLength, this._maxWordLength);
  }

  get wordCount(): number {
    return this._wordCount;
  }

  set wordCount(value: number) {
    this._wordCount = requireInteger('wordCount', value, 1);
  }

  get separatorCharacter(): CharacterChoice {
    return this._separatorCharacter;
  }

  set separatorCharacter(value: CharacterChoice) {
    this._separatorCharacter = requireChoice('separatorCharacter', value);
  }

  get paddingDigitsBefore(): number {
    return this._paddingDigitsBefore;
  }

  set paddingDigitsBefore(value: number) {
    this._paddingDigitsBefore = requireInteger('paddingDigitsBefore', value, 0);
  }

  get paddingDigitsAfter(): number {
    return this._paddingDigitsAfter;
  }

  set paddingDigitsAfter(value: number) {
    this._paddingDigitsAfter = requireInteger('paddingDigitsAfter', value, 0);
  }

  get paddingType(): PaddingType {
    return this._paddingType;
  }

  set paddingType(value: PaddingType) {
    if (!PADDING_TYPES.includes(value)) {
      throw new InvalidConfigurationError('paddingType', value, `must be one of ${PADDING_TYPES.join(', ')}`);
    }
    this._paddingType = value;
  }

  get paddingCharacter(): CharacterChoice {
    return this._paddingCharacter;
  }

  set paddingCharacter(value: CharacterChoice) {
    this._paddingCharacter = requireChoice('paddingCharacter', value);
  }

  get paddingCharactersBefore(): number {
    return this._paddingCharactersBefore;
  }

  set paddingCharactersBefore(value: number) {
    this._paddingCharactersBefore = requireInteger('paddingCharactersBefore', value, 0);
  }

  get paddingCharactersAfter(): number {
    return this._paddingCharactersAfter;
  }

  set paddingCharactersAfter(value: number) {
    this._paddingCharactersAfter = requireInteger('paddingCharactersAfter', value, 0);
  }

  /** Target length for Adaptive padding; values <= 0 switch it off. */
  get padToLength(): number {
    return this._padToLength;
  }

  set padToLength(value: number) {
    this._padToLength = requireInteger('padToLength', value);
  }

  get caseTransform(): CaseTransform {
    return this._caseTransform;
  }

  set caseTransform(value: CaseTransform) {
    if (!CASE_TRANSFORMS.includes(value)) {
      throw new InvalidConfigurationError('caseTransform', value, `must be one of ${CASE_TRANSFORMS.join(', ')}`);
    }
    this._caseTransform = value;
  }

  get characterSubstitutions(): ReadonlyMap<string, string> {
    return this._characterSubstitutions;
  }

  set characterSubstitutions(value: Iterable<readonly [string, string]>) {
    const substitutions = new Map<string, string>();
    for (const [from, to] of value) {
      substitutions.set(
        requireCharacter('characterSubstitutions', from),
        requireCharacter('characterSubstitutions', to)
      );
    }
    this._characterSubstitutions = substitutions;
  }

  /** Independent copy; later changes to either side do not leak into the other. */
  clone(): PassphraseConfig {
    return new PassphraseConfig({
      wordListPath: this._wordListPath,
      symbolAlphabet: this._symbolAlphabet,
      separatorAlphabet: this._separatorAlphabet,
      minWordLength: this._minWordLength,
      maxWordLength: this._maxWordLength,
      wordCount: this._wordCount,
      separatorCharacter: this._separatorCharacter,
      paddingDigitsBefore: this._paddingDigitsBefore,
      paddingDigitsAfter: this._paddingDigitsAfter,
      paddingType: this._paddingType,
      paddingCharacter: this._paddingCharacter,
      paddingCharactersBefore: this._paddingCharactersBefore,
      paddingCharactersAfter: this._paddingCharactersAfter,
      padToLength: this._padToLength,
      caseTransform: this._caseTransform,
      characterSubstitutions: this._characterSubstitutions,
    });
  }

  toOptions(): PassphraseOptionsSnapshot {
    return {
      wordListPath: this._wordListPath,
      symbolAlphabet: [...this._symbolAlphabet].join(''),
      separatorAlphabet: [...this._separatorAlphabet].join(''),
      minWordLength: this._minWordLength,
      maxWordLength: this._maxWordLength,
      wordCount: this._wordCount,
      separatorCharacter: { ...this._separatorCharacter },
      paddingDigitsBefore: this._paddingDigitsBefore,
      paddingDigitsAfter: this._paddingDigitsAfter,
      paddingType: this._paddingType,
      paddingCharacter: { ...this._paddingCharacter },
      paddingCharactersBefore: this._paddingCharactersBefore,
      paddingCharactersAfter: this._paddingCharactersAfter,
      padToLength: this._padToLength,
      caseTransform: this._caseTransform,
      characterSubstitutions: Object.fromEntries(this._characterSubstitutions),
    };
  }
}
