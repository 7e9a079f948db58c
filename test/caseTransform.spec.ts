import { describe, it, expect } from 'vitest';
import { transformCase, transformWord } from '../src/caseTransform';
import { ScriptedRandom } from './helpers/scriptedRandom';

describe('transformWord', () => {
  const noDraws = () => new ScriptedRandom([]);

  it('leaves the word alone for None', () => {
    expect(transformWord('hOrSe', 'None', noDraws())).toBe('hOrSe');
  });

  it('uppercases and lowercases the whole word', () => {
    expect(transformWord('horse', 'UpperCase', noDraws())).toBe('HORSE');
    expect(transformWord('HoRsE', 'LowerCase', noDraws())).toBe('horse');
  });

  it('capitalizes only the first character', () => {
    expect(transformWord('horse', 'Capitalize', noDraws())).toBe('Horse');
    expect(transformWord('hORSE', 'Capitalize', noDraws())).toBe('HORSE');
  });

  it('inverts by lowercasing the first character and uppercasing the rest', () => {
    expect(transformWord('Horse', 'Invert', noDraws())).toBe('hORSE');
    expect(transformWord('horse', 'Invert', noDraws())).toBe('hORSE');
  });

  it('alternates starting with a capital on heads', () => {
    expect(transformWord('HORSE', 'Alternate', new ScriptedRandom([1]))).toBe('HoRsE');
  });

  it('alternates starting with a lowercase letter on tails', () => {
    expect(transformWord('horse', 'Alternate', new ScriptedRandom([0]))).toBe('hOrSe');
  });

  it('flips a coin for every character in Random', () => {
    const random = new ScriptedRandom([1, 0, 1]);

    expect(transformWord('cat', 'Random', random)).toBe('cAt');
    expect(random.requested).toEqual([2, 2, 2]);
  });

  it('keeps every character uppercase when all coins land tails', () => {
    expect(transformWord('staple', 'Random', new ScriptedRandom([0, 0, 0, 0, 0, 0]))).toBe('STAPLE');
  });

  it('passes digits and symbols through Alternate and Random unchanged', () => {
    expect(transformWord('h0r$e', 'Alternate', new ScriptedRandom([1]))).toBe('H0R$E');
    expect(transformWord('h0r$e', 'Random', new ScriptedRandom([1, 1, 1, 1, 1]))).toBe('h0r$e');
  });
});

describe('transformCase', () => {
  it('flips one independent coin per word for Alternate', () => {
    const random = new ScriptedRandom([1, 0]);

    expect(transformCase(['horse', 'staple'], 'Alternate', random)).toEqual(['HoRsE', 'sTaPlE']);
    expect(random.remaining).toBe(0);
  });

  it('maps each word independently', () => {
    expect(transformCase(['correct', 'horse'], 'Capitalize', new ScriptedRandom([]))).toEqual([
      'Correct',
      'Horse',
    ]);
  });
});
