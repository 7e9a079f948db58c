import { SpanStatusCode, trace } from '@opentelemetry/api';
import { transformCase } from './caseTransform';
import { PassphraseConfig } from './config';
import { InvalidConfigurationError } from './errors';
import { CryptoRandom, pick } from './random';
import { substituteCharacters } from './substitution';
import type { RandomSource, WordSource } from './types';
import { createWordSource } from './wordSource';
import { selectWords } from './words';

const tracer = trace.getTracer('wordpass-generator', '1.0.0');

const DIGITS = '0123456789';

export interface PassphraseGeneratorOptions {
  config?: PassphraseConfig;
  random?: RandomSource;
  /** Fixed word source; when omitted, config.wordListPath is read on every call. */
  wordSource?: WordSource;
}

/**
 * The string placed between words and next to the digit groups.
 */
export function resolveSeparator(config: PassphraseConfig, random: RandomSource): string {
  const choice = config.separatorCharacter;
  if (choice.kind === 'none') {
    return '';
  }
  if (choice.kind === 'fixed') {
    return choice.char;
  }
  const alphabet = config.separatorAlphabet.size > 0 ? config.separatorAlphabet : config.symbolAlphabet;
  return pick(random, [...alphabet]);
}

export function randomDigits(count: number, random: RandomSource): string {
  let digits = '';
  for (let i = 0; i < count; i++) {
    digits += DIGITS[random.nextInt(DIGITS.length)];
  }
  return digits;
}

/**
 * Prepends `before` units of padding character plus `unitSeparator`, appends
 * `after` bare padding characters.
 */
export function applyFixedPadding(
  core: string,
  paddingCharacter: string,
  unitSeparator: string,
  before: number,
  after: number
): string {
  return (paddingCharacter + unitSeparator).repeat(before) + core + paddingCharacter.repeat(after);
}

/**
 * Pads with `paddingCharacter` or truncates so the result is exactly
 * `padToLength` long. A target of 0 or less leaves the input alone.
 */
export function applyAdaptivePadding(value: string, paddingCharacter: string, padToLength: number): string {
  if (padToLength <= 0) {
    return value;
  }
  if (value.length < padToLength) {
    return value + paddingCharacter.repeat(padToLength - value.length);
  }
  if (value.length > padToLength) {
    return value.slice(0, padToLength);
  }
  return value;
}

/**
 * Generates passphrases by joining random dictionary words with separators,
 * digit groups and symbol padding, all driven by a PassphraseConfig.
 */
export class PassphraseGenerator {
  readonly config: PassphraseConfig;
  private readonly random: RandomSource;
  private readonly wordSource?: WordSource;

  constructor(options: PassphraseGeneratorOptions = {}) {
    this.config = options.config ?? new PassphraseConfig();
    this.random = options.random ?? new CryptoRandom();
    this.wordSource = options.wordSource;
  }

  private readCandidates(): string[] {
    const source = this.wordSource ?? createWordSource(this.config.wordListPath);
    return source.readWords();
  }

  private buildPassphrase(): string {
    const config = this.config;
    const random = this.random;

    const separator = resolveSeparator(config, random);

    let words = selectWords(
      this.readCandidates(),
      { min: config.effectiveMinWordLength, max: config.effectiveMaxWordLength },
      config.wordCount,
      random
    );
    if (config.caseTransform !== 'None') {
      words = transformCase(words, config.caseTransform, random);
    }
    words = substituteCharacters(words, config.characterSubstitutions);

    let passphrase = randomDigits(config.paddingDigitsBefore, random);
    if (config.paddingDigitsBefore > 0) {
      passphrase += separator;
    }
    passphrase += words.join(separator);
    if (config.paddingDigitsAfter > 0) {
      passphrase += separator;
    }
    passphrase += randomDigits(config.paddingDigitsAfter, random);

    const fixedPaddingCharacter = config.paddingCharacter.kind === 'fixed' ? config.paddingCharacter.char : undefined;

    switch (config.paddingType) {
      case 'None':
        return passphrase;
      case 'Fixed':
        return applyFixedPadding(
          passphrase,
          fixedPaddingCharacter ?? (separator.slice(0, 1) || pick(random, [...config.symbolAlphabet])),
          // Only a configured separator goes into the leading units
          config.separatorCharacter.kind === 'fixed' ? config.separatorCharacter.char : '',
          config.paddingCharactersBefore,
          config.paddingCharactersAfter
        );
      case 'Adaptive':
        if (config.padToLength <= 0) {
          return passphrase;
        }
        return applyAdaptivePadding(
          passphrase,
          fixedPaddingCharacter ?? pick(random, [...config.symbolAlphabet]),
          config.padToLength
        );
    }
  }

  /**
   * Generates one passphrase from the current configuration.
   */
  generate(): string {
    const span = tracer.startSpan('passphrase.generate', {
      attributes: {
        'passphrase.word_count': this.config.wordCount,
        'passphrase.padding_type': this.config.paddingType,
        'passphrase.case_transform': this.config.caseTransform,
      },
    });

    try {
      const passphrase = this.buildPassphrase();
      span.setAttributes({ 'passphrase.length': passphrase.length });
      span.setStatus({ code: SpanStatusCode.OK });
      return passphrase;
    } catch (error) {
      span.recordException(error instanceof Error ? error : String(error));
      span.setStatus({
        code: SpanStatusCode.ERROR,
        message: error instanceof Error ? error.message : 'Failed to generate passphrase',
      });
      throw error;
    } finally {
      span.end();
    }
  }

  /**
   * Lazily generates `count` passphrases. Each one is built from scratch,
   * word list included, when the iterator reaches it.
   */
  generateMany(count: number): Iterable<string> {
    if (!Number.isInteger(count) || count < 0) {
      throw new InvalidConfigurationError('count', count, 'must be a non-negative integer');
    }
    return this.iterate(count);
  }

  private *iterate(count: number): Generator<string, void, undefined> {
    for (let i = 0; i < count; i++) {
      yield this.generate();
    }
  }
}
