import { describe, it, expect } from 'vitest';
import type { FillInBlankContent, MultipleChoiceContent } from '@shared/types';
import {
  checkAnswer,
  gradeFromAnswer,
  optionLetter,
  parseBlankAnswers,
  parseChoiceAnswer,
} from '../answers';
import { twoSided } from './fixtures';

const blanks = (overrides: Partial<FillInBlankContent> = {}): FillInBlankContent => ({
  card_type: 'fill_in_blank',
  text_with_blanks: 'Ich {blank} nach {blank}.',
  answers: ['fahre', 'Berlin'],
  case_sensitive: false,
  ...overrides,
});

const choice = (overrides: Partial<MultipleChoiceContent> = {}): MultipleChoiceContent => ({
  card_type: 'multiple_choice',
  question: 'Which are primary colours?',
  options: ['red', 'green', 'blue', 'purple'],
  correct_indices: [0, 2],
  allow_multiple: true,
  ...overrides,
});

describe('parseBlankAnswers', () => {
  it('splits on the first separator present', () => {
    expect(parseBlankAnswers('fahre, Berlin', 2)).toEqual(['fahre', 'Berlin']);
    expect(parseBlankAnswers('fahre; Berlin', 2)).toEqual(['fahre', 'Berlin']);
    expect(parseBlankAnswers('fahre | Berlin', 2)).toEqual(['fahre', 'Berlin']);
    expect(parseBlankAnswers('fahre\nBerlin', 2)).toEqual(['fahre', 'Berlin']);
  });

  it('pads missing answers and drops extras', () => {
    expect(parseBlankAnswers('fahre', 2)).toEqual(['fahre', '']);
    expect(parseBlankAnswers('a,b,c', 2)).toEqual(['a', 'b']);
  });
});

describe('parseChoiceAnswer', () => {
  it('reads letters in any case', () => {
    expect(parseChoiceAnswer('c a', 4)).toEqual([0, 2]);
    expect(parseChoiceAnswer('B', 4)).toEqual([1]);
  });

  it('falls back to 1-based digits', () => {
    expect(parseChoiceAnswer('3, 1', 4)).toEqual([0, 2]);
  });

  it('ignores options that do not exist', () => {
    expect(parseChoiceAnswer('Z', 4)).toEqual([]);
    expect(parseChoiceAnswer('9', 4)).toEqual([]);
  });

  it('maps indices back to letters', () => {
    expect(optionLetter(0)).toBe('A');
    expect(optionLetter(3)).toBe('D');
  });
});

describe('checkAnswer', () => {
  it('compares two-sided answers ignoring case and surrounding space', () => {
    expect(checkAnswer(twoSided('hello', 'World'), ' world ')).toEqual({ correct: true, expected: ['World'] });
    expect(checkAnswer(twoSided('hello', 'World'), 'word').correct).toBe(false);
  });

  it('checks every blank', () => {
    expect(checkAnswer(blanks(), 'FAHRE, berlin').correct).toBe(true);
    expect(checkAnswer(blanks(), 'fahre').correct).toBe(false);
    expect(checkAnswer(blanks(), 'fahre, Berlin').expected).toEqual(['fahre', 'Berlin']);
  });

  it('respects case sensitivity on blanks', () => {
    const strict = blanks({ case_sensitive: true });
    expect(checkAnswer(strict, 'fahre, berlin').correct).toBe(false);
    expect(checkAnswer(strict, 'fahre, Berlin').correct).toBe(true);
  });

  it('requires the exact set of correct options', () => {
    expect(checkAnswer(choice(), 'a c')).toEqual({ correct: true, expected: ['A', 'C'] });
    expect(checkAnswer(choice(), 'a').correct).toBe(false);
    expect(checkAnswer(choice(), 'a b c').correct).toBe(false);
    expect(checkAnswer(choice({ correct_indices: [1], allow_multiple: false }), '2').correct).toBe(true);
  });
});

describe('gradeFromAnswer', () => {
  it('maps pass/fail onto good and again', () => {
    expect(gradeFromAnswer({ correct: true, expected: [] })).toBe('good');
    expect(gradeFromAnswer({ correct: false, expected: [] })).toBe('again');
  });
});
