import { describe, it, expect } from 'vitest';
import { classifyInput, isCancellation, isLikelyName } from './inputClassifier';

describe('isLikelyName', () => {
  it('accepts two to four capitalised words', () => {
    expect(isLikelyName('John Doe')).toBe(true);
    expect(isLikelyName('Mary Ann De Vries')).toBe(true);
  });

  it('rejects other shapes', () => {
    expect(isLikelyName('John')).toBe(false);
    expect(isLikelyName('Anna Bea Cara Dee Eve')).toBe(false);
    expect(isLikelyName('john doe')).toBe(false);
    expect(isLikelyName('John | Doe')).toBe(false);
    expect(isLikelyName('Pay $100 Now')).toBe(false);
    expect(isLikelyName('Visit http Site')).toBe(false);
    expect(isLikelyName('')).toBe(false);
  });
});

describe('isCancellation', () => {
  it('accepts the cancel words in any case', () => {
    expect(isCancellation('/cancel')).toBe(true);
    expect(isCancellation('  Never Mind ')).toBe(true);
    expect(isCancellation('STOP')).toBe(true);
    expect(isCancellation('stop it')).toBe(false);
  });
});

describe('classifyInput', () => {
  it('recognises profile references and canonicalises them', () => {
    expect(classifyInput('https://www.linkedin.com/in/jane-roe')).toEqual({
      kind: 'reference',
      reference: 'https://www.linkedin.com/in/jane-roe',
    });
    expect(classifyInput('see linkedin.com/in/jane-roe/?trk=abc')).toEqual({
      kind: 'reference',
      reference: 'https://www.linkedin.com/in/jane-roe',
    });
  });

  it('normalises spacing in names', () => {
    expect(classifyInput('  John   Doe ')).toEqual({ kind: 'name', name: 'John Doe' });
  });

  it('checks cancellation before anything else', () => {
    expect(classifyInput('cancel')).toEqual({ kind: 'cancel' });
  });

  it('leaves everything else unrecognised', () => {
    expect(classifyInput('not a url or name')).toEqual({ kind: 'unrecognized' });
    expect(classifyInput('   ')).toEqual({ kind: 'unrecognized' });
  });
});
