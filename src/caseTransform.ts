import { coinFlip } from './random';
import type { CaseTransform, RandomSource } from './types';

function capitalize(word: string): string {
  return word.slice(0, 1).toUpperCase() + word.slice(1);
}

function invert(word: string): string {
  return word.slice(0, 1).toLowerCase() + word.slice(1).toUpperCase();
}

// One coin per word: heads uppercases even indices, tails odd ones.
// Case changes go through toUpperCase/toLowerCase, so digits and symbols in a
// word stay as they are rather than having their 0x20 bit flipped.
function alternate(word: string, random: RandomSource): string {
  const startCaps = coinFlip(random);
  const chars = Array.from(word.toLowerCase(), (char, i) =>
    (i % 2 === 0) === startCaps ? char.toUpperCase() : char
  );
  return chars.join('');
}

// One coin per character: heads lowercases it, tails leaves it uppercase.
// Non-letters pass through unchanged here too.
function randomCase(word: string, random: RandomSource): string {
  const chars = Array.from(word.toUpperCase(), (char) =>
    coinFlip(random) ? char.toLowerCase() : char
  );
  return chars.join('');
}

export function transformWord(word: string, transform: CaseTransform, random: RandomSource): string {
  switch (transform) {
    case 'None':
      return word;
    case 'UpperCase':
      return word.toUpperCase();
    case 'LowerCase':
      return word.toLowerCase();
    case 'Capitalize':
      return capitalize(word);
    case 'Invert':
      return invert(word);
    case 'Alternate':
      return alternate(word, random);
    case 'Random':
      return randomCase(word, random);
  }
}

/**
 * Applies a case transformation to each word independently.
 * Random draws happen in word order, then character order.
 */
export function transformCase(words: readonly string[], transform: CaseTransform, random: RandomSource): string[] {
  return words.map((word) => transformWord(word, transform, random));
}
