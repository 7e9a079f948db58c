import { describe, it, expect } from 'vitest';
import { EmptyCandidateSetError } from '../src/errors';
import { filterCandidates, selectWords } from '../src/words';
import { ScriptedRandom } from './helpers/scriptedRandom';

const WORDS = ['four', 'horse', 'staple', 'battery', 'eightchr', 'cat'];

describe('filterCandidates', () => {
  it('excludes words whose length equals either bound', () => {
    expect(filterCandidates(WORDS, { min: 4, max: 8 })).toEqual(['horse', 'staple', 'battery']);
  });

  it('rejects "four" at a minimum of four', () => {
    expect(filterCandidates(['four'], { min: 4, max: 8 })).toEqual([]);
  });

  it('keeps source order', () => {
    expect(filterCandidates(['staple', 'horse'], { min: 1, max: 10 })).toEqual(['staple', 'horse']);
  });
});

describe('selectWords', () => {
  it('draws the requested number of words with replacement', () => {
    const random = new ScriptedRandom([2, 0, 2]);

    expect(selectWords(WORDS, { min: 4, max: 8 }, 3, random)).toEqual(['battery', 'horse', 'battery']);
    expect(random.requested).toEqual([3, 3, 3]);
  });

  it('samples from the filtered list only', () => {
    const random = new ScriptedRandom([0]);

    expect(selectWords(['a', 'bb', 'ccc'], { min: 2, max: 4 }, 1, random)).toEqual(['ccc']);
    expect(random.requested).toEqual([1]);
  });

  it('throws when no word fits the bounds', () => {
    const random = new ScriptedRandom([]);

    expect(() => selectWords(['four', 'cat'], { min: 4, max: 8 }, 2, random)).toThrow(EmptyCandidateSetError);
  });

  it('describes the bounds and source size in the error', () => {
    try {
      selectWords(['four'], { min: 4, max: 8 }, 1, new ScriptedRandom([]));
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(EmptyCandidateSetError);
      if (error instanceof EmptyCandidateSetError) {
        expect(error.message).toBe('No words longer than 4 and shorter than 8 characters among 1 candidates');
        expect(error.minWordLength).toBe(4);
        expect(error.maxWordLength).toBe(8);
        expect(error.sourceSize).toBe(1);
        expect(error.code).toBe('EMPTY_CANDIDATE_SET');
        expect(error.status).toBe(422);
      }
    }
  });
});
