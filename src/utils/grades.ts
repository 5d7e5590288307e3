export const GRADE_LETTERS = ['A', 'B', 'C', 'D', 'E', 'F', 'G'] as const;

export type GradeLetter = (typeof GRADE_LETTERS)[number];

const MIN_GRADE_VALUE = 0;
const MAX_GRADE_VALUE = GRADE_LETTERS.length - 1;

export interface GradeOptions {
  // Throw instead of falling back to the lowest grade
  strict?: boolean;
}

export class InvalidGradeCodeError extends Error {
  readonly input: string | number;

  constructor(input: string | number) {
    super(`Invalid grade: ${String(input)}`);
    this.name = 'InvalidGradeCodeError';
    this.input = input;
  }
}

export const isGradeLetter = (value: string): value is GradeLetter =>
  GRADE_LETTERS.some((letter) => letter === value);

/**
 * Ordinal value of a grade letter (A -> 0 ... G -> 6), case-insensitive.
 * Unknown codes score 0 unless `strict` is set.
 */
export const letterToValue = (code: string, options: GradeOptions = {}): number => {
  const letter = code.toUpperCase();
  if (isGradeLetter(letter)) return GRADE_LETTERS.indexOf(letter);
  if (options.strict) throw new InvalidGradeCodeError(code);
  return MIN_GRADE_VALUE;
};

/**
 * Letter for a (possibly fractional) score, rounding halves up: 3.5 -> E.
 * Scores outside 0..6 map to A unless `strict` is set.
 */
export const valueToLetter = (value: number, options: GradeOptions = {}): GradeLetter => {
  if (!(value >= MIN_GRADE_VALUE && value <= MAX_GRADE_VALUE)) {
    if (options.strict) throw new InvalidGradeCodeError(value);
    return GRADE_LETTERS[0];
  }
  // Non-negative here, so Math.round's half-up is half-away-from-zero
  return GRADE_LETTERS[Math.round(value)];
};
