import type { CardContent, CardRecord, Flashcard } from '@shared/types';

export const T0 = new Date('2024-01-15T10:00:00.000Z');

export const minutesAfter = (base: Date, minutes: number) => new Date(base.getTime() + minutes * 60 * 1000);

export const twoSided = (front = 'hello', back = 'world'): CardContent => ({
  card_type: 'two_sided',
  front,
  back,
});

export function createTestCard(overrides: Partial<CardRecord> = {}, content: CardContent = twoSided()): Flashcard {
  const createdAt = '2024-01-01T00:00:00.000Z';
  return {
    id: 'card-1',
    owner_id: 'owner-1',
    title: null,
    tags: [],
    created_at: createdAt,
    updated_at: createdAt,
    ease_factor: 2.5,
    interval_days: 0,
    repetitions: 0,
    due_at: createdAt,
    last_reviewed_at: null,
    lapses: 0,
    ...overrides,
    ...content,
  };
}
