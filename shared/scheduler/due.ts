import type { CardSchedule } from '../types';

type DueCandidate = Pick<CardSchedule, 'due_at'> & { id: string };

/**
 * A card is due once its scheduled time has passed.
 */
export function isDue(card: Pick<CardSchedule, 'due_at'>, now: Date): boolean {
  return Date.parse(card.due_at) <= now.getTime();
}

/**
 * Order the cards that are due at `now`: most overdue first, ties by id so
 * the result never depends on input order.
 *
 * The store may hand over more than is due (clock skew, coarse indexes), so
 * this is the precise filter.
 */
export function nextDue(cards: readonly DueCandidate[], now: Date): string[] {
  const seen = new Set<string>();
  return cards
    .filter(card => {
      if (seen.has(card.id) || !isDue(card, now)) return false;
      seen.add(card.id);
      return true;
    })
    .map(card => ({ id: card.id, due: Date.parse(card.due_at) }))
    .sort((a, b) => {
      if (a.due !== b.due) return a.due - b.due;
      if (a.id < b.id) return -1;
      if (a.id > b.id) return 1;
      return 0;
    })
    .map(card => card.id);
}
