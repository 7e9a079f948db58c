import { describe, it, expect } from 'vitest';
import { PassphraseConfig } from '../src/config';
import { toPassphraseOptions, zGeneratePassphrasesRequest, zPassphraseOptions } from '../src/schema';

describe('zPassphraseOptions', () => {
  it('accepts tagged character choices', () => {
    const parsed = zPassphraseOptions.parse({
      separatorCharacter: { kind: 'fixed', char: '.' },
      paddingCharacter: { kind: 'none' },
    });

    expect(parsed.separatorCharacter).toEqual({ kind: 'fixed', char: '.' });
    expect(parsed.paddingCharacter).toEqual({ kind: 'none' });
  });

  it('rejects a fixed choice without a single character', () => {
    expect(zPassphraseOptions.safeParse({ separatorCharacter: { kind: 'fixed', char: '--' } }).success).toBe(false);
  });

  it('rejects unknown enumeration members', () => {
    expect(zPassphraseOptions.safeParse({ caseTransform: 'Shout' }).success).toBe(false);
    expect(zPassphraseOptions.safeParse({ paddingType: 'Adaptive' }).success).toBe(true);
  });
});

describe('zGeneratePassphrasesRequest', () => {
  it('fills in count and options', () => {
    expect(zGeneratePassphrasesRequest(10).parse({})).toEqual({ count: 1, options: {} });
  });

  it('caps count at the batch size', () => {
    expect(zGeneratePassphrasesRequest(3).safeParse({ count: 4 }).success).toBe(false);
    expect(zGeneratePassphrasesRequest(3).safeParse({ count: 3 }).success).toBe(true);
  });
});

describe('toPassphraseOptions', () => {
  it('turns the substitution object into ordered entries', () => {
    const options = toPassphraseOptions({ characterSubstitutions: { a: '@', s: '$' }, wordCount: 3 });
    const config = new PassphraseConfig(options);

    expect([...config.characterSubstitutions]).toEqual([
      ['a', '@'],
      ['s', '$'],
    ]);
    expect(config.wordCount).toBe(3);
  });

  it('leaves substitutions out when none were sent', () => {
    expect(toPassphraseOptions({ symbolAlphabet: '#' })).toEqual({ symbolAlphabet: '#' });
  });
});
