import type {
  CardContent,
  FillInBlankContent,
  Grade,
  MultipleChoiceContent,
  TwoSidedContent,
} from '@shared/types';

export interface AnswerCheck {
  correct: boolean;
  expected: string[];   // the accepted answer(s), in display form
}

// Normalize for comparison
const normalize = (s: string) => s.trim().toLowerCase();

const BLANK_SEPARATORS = [',', ';', '|', '\n'];

/**
 * Split a typed answer into one entry per blank. The first separator found
 * wins; missing entries are padded with empty strings.
 */
export function parseBlankAnswers(input: string, expectedCount: number): string[] {
  let answers = [input.trim()];
  for (const separator of BLANK_SEPARATORS) {
    if (input.includes(separator)) {
      answers = input.split(separator).map(a => a.trim());
      break;
    }
  }

  while (answers.length < expectedCount) {
    answers.push('');
  }
  return answers.slice(0, expectedCount);
}

/**
 * Parse option picks such as "A", "a c" or "1, 3" into sorted 0-based indices.
 * Letters take precedence over digits.
 */
export function parseChoiceAnswer(input: string, optionCount: number): number[] {
  const upper = input.toUpperCase().trim();
  const picked = new Set<number>();

  for (const char of upper) {
    if (char >= 'A' && char <= 'Z') {
      const index = char.charCodeAt(0) - 'A'.charCodeAt(0);
      if (index < optionCount) picked.add(index);
    }
  }

  if (picked.size === 0) {
    for (const char of upper) {
      if (char >= '1' && char <= '9') {
        const index = Number(char) - 1;
        if (index < optionCount) picked.add(index);
      }
    }
  }

  return [...picked].sort((a, b) => a - b);
}

export function optionLetter(index: number): string {
  return String.fromCharCode('A'.charCodeAt(0) + index);
}

function checkTwoSided(card: TwoSidedContent, input: string): AnswerCheck {
  return {
    correct: normalize(input) === normalize(card.back),
    expected: [card.back],
  };
}

function checkFillInBlank(card: FillInBlankContent, input: string): AnswerCheck {
  const given = parseBlankAnswers(input, card.answers.length);
  const same = (a: string, b: string) =>
    card.case_sensitive ? a.trim() === b.trim() : normalize(a) === normalize(b);

  return {
    correct: card.answers.every((answer, i) => same(given[i] ?? '', answer)),
    expected: [...card.answers],
  };
}

function checkMultipleChoice(card: MultipleChoiceContent, input: string): AnswerCheck {
  const picked = parseChoiceAnswer(input, card.options.length);
  const correctIndices = [...card.correct_indices].sort((a, b) => a - b);

  return {
    correct: picked.length === correctIndices.length && picked.every((index, i) => index === correctIndices[i]),
    expected: correctIndices.map(optionLetter),
  };
}

/**
 * Check a typed answer against a card's content.
 */
export function checkAnswer(card: CardContent, input: string): AnswerCheck {
  switch (card.card_type) {
    case 'two_sided':
      return checkTwoSided(card, input);
    case 'fill_in_blank':
      return checkFillInBlank(card, input);
    case 'multiple_choice':
      return checkMultipleChoice(card, input);
  }
}

/**
 * Typed answers are pass/fail, so they map onto the two ends of the grade scale.
 */
export function gradeFromAnswer(check: AnswerCheck): Grade {
  return check.correct ? 'good' : 'again';
}
