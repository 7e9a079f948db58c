import { z } from 'zod';
import { CASE_TRANSFORMS, PADDING_TYPES } from './types';
import type { PassphraseOptions } from './types';

const zChar = z.string().length(1, 'must be a single character');

export const zCharacterChoice = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('random') }),
  z.object({ kind: z.literal('none') }),
  z.object({ kind: z.literal('fixed'), char: zChar }),
]);

const zCount = z.number().int().min(0);

// Alphabets travel as strings ("!@$"), substitutions as an object ({ "a": "@" })
export const zPassphraseOptions = z
  .object({
    symbolAlphabet: z.string().min(1),
    separatorAlphabet: z.string(),
    minWordLength: z.number().int().min(1),
    maxWordLength: z.number().int().min(1),
    wordCount: z.number().int().min(1),
    separatorCharacter: zCharacterChoice,
    paddingDigitsBefore: zCount,
    paddingDigitsAfter: zCount,
    paddingType: z.enum(PADDING_TYPES),
    paddingCharacter: zCharacterChoice,
    paddingCharactersBefore: zCount,
    paddingCharactersAfter: zCount,
    padToLength: z.number().int(),
    caseTransform: z.enum(CASE_TRANSFORMS),
    characterSubstitutions: z.record(zChar, zChar),
  })
  .partial()
  .strict();

export const zGeneratePassphrasesRequest = (maxBatchSize: number) =>
  z
    .object({
      count: z.number().int().min(1).max(maxBatchSize).default(1),
      options: zPassphraseOptions.default({}),
    })
    .strict();

export type PassphraseOptionsInput = z.infer<typeof zPassphraseOptions>;

export function toPassphraseOptions(input: PassphraseOptionsInput): Partial<PassphraseOptions> {
  const { characterSubstitutions, ...rest } = input;
  return {
    ...rest,
    ...(characterSubstitutions !== undefined
      ? { characterSubstitutions: Object.entries(characterSubstitutions) }
      : {}),
  };
}
