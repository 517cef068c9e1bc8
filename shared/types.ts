// Review grades, worst to best
export type Grade = 'again' | 'hard' | 'good' | 'easy';

export const GRADES: readonly Grade[] = ['again', 'hard', 'good', 'easy'];

// Numeric rating accepted at the transport boundary (0=again, 1=hard, 2=good, 3=easy)
export type Rating = 0 | 1 | 2 | 3;

export function ratingToGrade(rating: Rating): Grade {
  return GRADES[rating];
}

// ============ Card content ============

export interface TwoSidedContent {
  card_type: 'two_sided';
  front: string;
  back: string;
}

export interface FillInBlankContent {
  card_type: 'fill_in_blank';
  text_with_blanks: string; // uses {blank} placeholders
  answers: string[];
  case_sensitive: boolean;
}

export interface MultipleChoiceContent {
  card_type: 'multiple_choice';
  question: string;
  options: string[];
  correct_indices: number[]; // 0-based
  allow_multiple: boolean;
}

export type CardContent = TwoSidedContent | FillInBlankContent | MultipleChoiceContent;

export type CardType = CardContent['card_type'];

// ============ Cards ============

/**
 * Scheduling state carried by every card. This is all the scheduler reads.
 */
export interface CardSchedule {
  ease_factor: number;
  interval_days: number;         // 0 = never successfully reviewed
  repetitions: number;           // consecutive successes since the last lapse
  due_at: string;                // ISO timestamp
  last_reviewed_at: string | null;
  lapses: number;
}

export interface CardRecord extends CardSchedule {
  id: string;
  owner_id: string;
  title: string | null;
  tags: string[];
  created_at: string;
  updated_at: string;
}

export type Flashcard = CardRecord & CardContent;

// ============ Reviews ============

export interface ReviewRecord {
  id: string;
  owner_id: string;
  card_id: string;
  grade: Grade;
  submission_token: string | null;
  reviewed_at: string;
  // Card state after the review
  ease_factor: number;
  interval_days: number;
  due_at: string;
}

// ============ Sessions ============

export type SessionMode = 'idle' | 'reviewing' | 'editing';

export type ResumableMode = Exclude<SessionMode, 'editing'>;

export type SessionStats = Record<Grade, number>;

export interface SessionSummary {
  owner_id: string;
  started_at: string | null;
  finished_at: string;
  reviewed: number;
  stats: SessionStats;
  reason: 'completed' | 'cancelled';
}

export interface Session {
  owner_id: string;
  mode: SessionMode;
  active_card_id: string | null;
  queue: string[];               // card ids still to present after the active one
  prior_mode: ResumableMode | null;   // set only while editing
  editing_card_id: string | null;     // set only while editing
  started_at: string | null;
  updated_at: string;
  stats: SessionStats;
  last_summary: SessionSummary | null;
}

export function emptyStats(): SessionStats {
  return { again: 0, hard: 0, good: 0, easy: 0 };
}

export function idleSession(ownerId: string, now: Date): Session {
  return {
    owner_id: ownerId,
    mode: 'idle',
    active_card_id: null,
    queue: [],
    prior_mode: null,
    editing_card_id: null,
    started_at: null,
    updated_at: now.toISOString(),
    stats: emptyStats(),
    last_summary: null,
  };
}
