import { describe, expect, it } from 'vitest';
import { ensureMaximumLength, getSeName, padId } from '../src/text.js';

describe('getSeName', () => {
  it('lowercases and joins words with dashes', () => {
    expect(getSeName('  Red Shoes & Socks! ')).toBe('red-shoes-socks');
  });

  it('reduces accented letters to their base letter', () => {
    expect(getSeName('Crème Brûlée')).toBe('creme-brulee');
  });

  it('collapses runs of underscores', () => {
    expect(getSeName('snake__case___name')).toBe('snake_case_name');
  });

  it('drops characters without a latin base letter', () => {
    expect(getSeName('Ünïcode 東京')).toBe('unicode-');
  });

  it('returns an empty string for empty input', () => {
    expect(getSeName('')).toBe('');
    expect(getSeName(undefined)).toBe('');
    expect(getSeName(null)).toBe('');
  });
});

describe('padId', () => {
  it('pads to the requested width', () => {
    expect(padId(42, 7)).toBe('0000042');
    expect(padId(12345678, 7)).toBe('12345678');
  });
});

describe('ensureMaximumLength', () => {
  it('cuts long values and keeps short ones', () => {
    expect(ensureMaximumLength('abcdef', 3)).toBe('abc');
    expect(ensureMaximumLength('ab', 3)).toBe('ab');
  });
});
