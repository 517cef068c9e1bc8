import { randomUUID } from 'node:crypto';
import { DEFAULT_SCHEDULER_SETTINGS, type SchedulerSettings } from '@shared/scheduler';
import { InvalidArgumentError } from '@shared/errors';
import type { CardContent, Flashcard } from '@shared/types';

/**
 * Generate a unique ID using crypto
 */
export function generateId(): string {
  return randomUUID();
}

export interface NewCardInput {
  content: CardContent;
  title?: string | null;
  tags?: string[];
}

/**
 * Create a card record. New cards are due immediately.
 */
export function createFlashcard(
  ownerId: string,
  input: NewCardInput,
  now: Date,
  settings: SchedulerSettings = DEFAULT_SCHEDULER_SETTINGS
): Flashcard {
  const createdAt = now.toISOString();
  return {
    id: generateId(),
    owner_id: ownerId,
    title: input.title ?? null,
    tags: input.tags ?? [],
    created_at: createdAt,
    updated_at: createdAt,
    // Scheduling defaults
    ease_factor: settings.default_ease,
    interval_days: 0,
    repetitions: 0,
    due_at: createdAt,
    last_reviewed_at: null,
    lapses: 0,
    ...input.content,
  };
}

/**
 * Swap a card's content while keeping its identity and schedule
 */
export function replaceContent(card: Flashcard, content: CardContent, now: Date): Flashcard {
  return {
    id: card.id,
    owner_id: card.owner_id,
    title: card.title,
    tags: card.tags,
    created_at: card.created_at,
    updated_at: now.toISOString(),
    ease_factor: card.ease_factor,
    interval_days: card.interval_days,
    repetitions: card.repetitions,
    due_at: card.due_at,
    last_reviewed_at: card.last_reviewed_at,
    lapses: card.lapses,
    ...content,
  };
}

/**
 * Get the prompt text shown for a card
 */
export function getQuestion(card: CardContent): string {
  switch (card.card_type) {
    case 'two_sided':
      return card.front;
    case 'fill_in_blank':
      return card.text_with_blanks.split('{blank}').join('_____');
    case 'multiple_choice':
      return card.question;
  }
}

/**
 * Reject content a learner could never answer
 */
export function validateContent(content: CardContent): void {
  const blank = (s: string) => s.trim() === '';

  switch (content.card_type) {
    case 'two_sided':
      if (blank(content.front) || blank(content.back)) {
        throw new InvalidArgumentError('Two-sided cards need both a front and a back');
      }
      return;
    case 'fill_in_blank':
      if (blank(content.text_with_blanks) || content.answers.length === 0) {
        throw new InvalidArgumentError("Fill-in-blank cards need 'text_with_blanks' and 'answers'");
      }
      {
        const blanks = content.text_with_blanks.split('{blank}').length - 1;
        if (blanks !== content.answers.length) {
          throw new InvalidArgumentError(
            `Fill-in-blank text has ${blanks} {blank} markers but ${content.answers.length} answers`
          );
        }
      }
      return;
    case 'multiple_choice': {
      if (blank(content.question) || content.options.length < 2) {
        throw new InvalidArgumentError('Multiple choice cards need a question and at least two options');
      }
      const outOfRange = content.correct_indices.some(i => !Number.isInteger(i) || i < 0 || i >= content.options.length);
      if (content.correct_indices.length === 0 || outOfRange) {
        throw new InvalidArgumentError('correct_indices must point at existing options');
      }
      if (new Set(content.correct_indices).size !== content.correct_indices.length) {
        throw new InvalidArgumentError('correct_indices must not repeat an option');
      }
      if (!content.allow_multiple && content.correct_indices.length > 1) {
        throw new InvalidArgumentError('Only one correct option allowed unless allow_multiple is set');
      }
      return;
    }
  }
}
