import type { CardType, Flashcard } from '../types';
import { isDue } from './due';

const MS_PER_DAY = 24 * 60 * 60 * 1000;

// Below this ease a card counts as difficult
const DIFFICULT_EASE = 2.0;

// A card is mastered once both hold
const MASTERED_EASE = 2.5;
const MASTERED_INTERVAL_DAYS = 30;

// Window for "due this week" and recent activity
const RECENT_DAYS = 7;

export interface CollectionStats {
  total: number;
  due_now: number;
  overdue: number;       // due for a day or more
  new: number;           // never reviewed
  difficult: number;
  average_ease: number;
  by_type: Record<CardType, number>;
}

type StatsCard = Pick<
  Flashcard,
  'card_type' | 'due_at' | 'ease_factor' | 'repetitions' | 'lapses' | 'last_reviewed_at'
>;

/**
 * Summarise a learner's collection for session planning.
 */
export function getCollectionStats(cards: readonly StatsCard[], now: Date): CollectionStats {
  const stats: CollectionStats = {
    total: cards.length,
    due_now: 0,
    overdue: 0,
    new: 0,
    difficult: 0,
    average_ease: 0,
    by_type: { two_sided: 0, fill_in_blank: 0, multiple_choice: 0 },
  };

  if (cards.length === 0) {
    return stats;
  }

  let easeSum = 0;
  for (const card of cards) {
    if (isDue(card, now)) {
      stats.due_now++;
      if (now.getTime() - Date.parse(card.due_at) >= MS_PER_DAY) {
        stats.overdue++;
      }
    }
    if (card.last_reviewed_at === null) {
      stats.new++;
    }
    if (card.ease_factor < DIFFICULT_EASE || card.lapses > card.repetitions) {
      stats.difficult++;
    }
    easeSum += card.ease_factor;
    stats.by_type[card.card_type]++;
  }

  stats.average_ease = Math.round((easeSum / cards.length) * 100) / 100;
  return stats;
}

export interface DashboardStats {
  total: number;
  due_today: number;     // due before the end of the current UTC day
  due_this_week: number;
  new: number;
  mastered: number;
  recent_additions: number;
  recent_reviews: number;
  /** Share of cards reviewed at least once, in percent */
  progress_percentage: number;
  /** Share of cards due today, in percent */
  workload_percentage: number;
}

type DashboardCard = Pick<Flashcard, 'due_at' | 'ease_factor' | 'interval_days' | 'created_at' | 'last_reviewed_at'>;

function percentage(part: number, total: number): number {
  return total === 0 ? 0 : Math.round((part / total) * 1000) / 10;
}

/**
 * Progress and workload overview for a learner's dashboard.
 */
export function getDashboardStats(cards: readonly DashboardCard[], now: Date): DashboardStats {
  const todayEnd = Date.UTC(now.getUTCFullYear(), now.getUTCMonth(), now.getUTCDate(), 23, 59, 59, 999);
  const weekEnd = now.getTime() + RECENT_DAYS * MS_PER_DAY;
  const cutoff = now.getTime() - RECENT_DAYS * MS_PER_DAY;

  let dueToday = 0;
  let dueThisWeek = 0;
  let fresh = 0;
  let mastered = 0;
  let recentAdditions = 0;
  let recentReviews = 0;

  for (const card of cards) {
    const due = Date.parse(card.due_at);
    if (due <= todayEnd) dueToday++;
    if (due <= weekEnd) dueThisWeek++;
    if (card.last_reviewed_at === null) {
      fresh++;
    } else if (Date.parse(card.last_reviewed_at) >= cutoff) {
      recentReviews++;
    }
    if (card.ease_factor >= MASTERED_EASE && card.interval_days >= MASTERED_INTERVAL_DAYS) {
      mastered++;
    }
    if (Date.parse(card.created_at) >= cutoff) recentAdditions++;
  }

  return {
    total: cards.length,
    due_today: dueToday,
    due_this_week: dueThisWeek,
    new: fresh,
    mastered,
    recent_additions: recentAdditions,
    recent_reviews: recentReviews,
    progress_percentage: percentage(cards.length - fresh, cards.length),
    workload_percentage: percentage(dueToday, cards.length),
  };
}

/**
 * Every tag used in the collection, sorted and without repeats.
 */
export function collectTags(cards: readonly Pick<Flashcard, 'tags'>[]): string[] {
  return [...new Set(cards.flatMap(card => card.tags))].sort();
}
