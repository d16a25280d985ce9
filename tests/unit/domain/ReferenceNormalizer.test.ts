import { describe, expect, it } from 'vitest';
import { removeWrapWhitespace } from '../../../src/domain/services/ReferenceNormalizer.js';
import { wrapLikeExport } from '../../helpers/spardaExport.js';

describe('removeWrapWhitespace', () => {
  it('leaves references shorter than 54 characters untouched', () => {
    const reference = 'SVWZ+ Miete Februar  EREF+ M-2024-02';
    expect(removeWrapWhitespace(reference)).toBe(reference);
    expect(removeWrapWhitespace('')).toBe('');
  });

  it('removes the space at the 54th character', () => {
    const clean = 'A'.repeat(53) + 'BCD';
    expect(removeWrapWhitespace(`${'A'.repeat(53)} BCD`)).toBe(clean);
  });

  it('re-indexes against the shortened string after each removal', () => {
    const clean = 'x'.repeat(53) + 'y'.repeat(54) + 'z'.repeat(20);
    const wrapped = `${'x'.repeat(53)} ${'y'.repeat(54)} ${'z'.repeat(20)}`;

    expect(wrapLikeExport(clean)).toBe(wrapped);
    expect(removeWrapWhitespace(wrapped)).toBe(clean);
  });

  it('keeps non-space characters at wrap positions', () => {
    const reference = 'b'.repeat(120);
    expect(removeWrapWhitespace(reference)).toBe(reference);
  });

  it('also removes a genuine space that lands on a wrap position', () => {
    const reference = `${'a'.repeat(53)} word`;
    expect(removeWrapWhitespace(reference)).toBe(`${'a'.repeat(53)}word`);
  });
});
