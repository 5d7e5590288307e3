import { describe, it, expect } from 'vitest';
import {
  GRADE_LETTERS,
  InvalidGradeCodeError,
  isGradeLetter,
  letterToValue,
  valueToLetter
} from './grades';

describe('grades', () => {
  describe('letterToValue', () => {
    it('maps A through G to 0 through 6', () => {
      expect(GRADE_LETTERS.map((l) => letterToValue(l))).toEqual([0, 1, 2, 3, 4, 5, 6]);
    });

    it('is case-insensitive', () => {
      expect(letterToValue('a')).toBe(0);
      expect(letterToValue('A')).toBe(0);
      expect(letterToValue('g')).toBe(6);
    });

    it('falls back to 0 for unknown codes', () => {
      expect(letterToValue('Z')).toBe(0);
      expect(letterToValue('')).toBe(0);
      expect(letterToValue('AB')).toBe(0);
    });

    it('throws for unknown codes in strict mode', () => {
      expect(() => letterToValue('Z', { strict: true })).toThrow(InvalidGradeCodeError);
      expect(() => letterToValue('Z', { strict: true })).toThrow('Invalid grade: Z');
      expect(letterToValue('f', { strict: true })).toBe(5);
    });
  });

  describe('valueToLetter', () => {
    it('maps the ends of the range', () => {
      expect(valueToLetter(0)).toBe('A');
      expect(valueToLetter(6)).toBe('G');
    });

    it('rounds to the nearest grade', () => {
      expect(valueToLetter(2.4)).toBe('C');
      expect(valueToLetter(2.6)).toBe('D');
      expect(valueToLetter(5.9)).toBe('G');
    });

    it('rounds halves away from zero', () => {
      expect(valueToLetter(3.5)).toBe('E');
      expect(valueToLetter(0.5)).toBe('B');
      expect(valueToLetter(2.5)).toBe('D');
    });

    it('falls back to A outside the range', () => {
      expect(valueToLetter(7)).toBe('A');
      expect(valueToLetter(-0.1)).toBe('A');
      expect(valueToLetter(Number.NaN)).toBe('A');
    });

    it('throws outside the range in strict mode', () => {
      expect(() => valueToLetter(7, { strict: true })).toThrow(InvalidGradeCodeError);
      expect(() => valueToLetter(Number.NaN, { strict: true })).toThrow('Invalid grade: NaN');
      expect(valueToLetter(1, { strict: true })).toBe('B');
    });

    it('carries the rejected input on the error', () => {
      let caught: unknown;
      try {
        valueToLetter(9, { strict: true });
      } catch (e) {
        caught = e;
      }
      expect(caught).toBeInstanceOf(InvalidGradeCodeError);
      expect(caught instanceof InvalidGradeCodeError && caught.input).toBe(9);
    });
  });

  describe('isGradeLetter', () => {
    it('accepts only upper-case A-G', () => {
      expect(isGradeLetter('C')).toBe(true);
      expect(isGradeLetter('c')).toBe(false);
      expect(isGradeLetter('H')).toBe(false);
    });
  });
});
