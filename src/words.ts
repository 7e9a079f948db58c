import { EmptyCandidateSetError } from './errors';
import { pick } from './random';
import type { RandomSource } from './types';

export interface WordLengthBounds {
  min: number;
  max: number;
}

/**
 * Keeps words strictly longer than `min` and strictly shorter than `max`.
 * A word whose length equals either bound is rejected.
 */
export function filterCandidates(words: readonly string[], bounds: WordLengthBounds): string[] {
  return words.filter((word) => word.length > bounds.min && word.length < bounds.max);
}

/**
 * Draws `count` words uniformly, with replacement, from the candidates that
 * fit the length bounds.
 */
export function selectWords(
  words: readonly string[],
  bounds: WordLengthBounds,
  count: number,
  random: RandomSource
): string[] {
  const candidates = filterCandidates(words, bounds);
  if (candidates.length === 0) {
    throw new EmptyCandidateSetError(bounds.min, bounds.max, words.length);
  }

  const selected: string[] = [];
  for (let i = 0; i < count; i++) {
    selected.push(pick(random, candidates));
  }
  return selected;
}
