import type { Flashcard, ReviewRecord, Session } from '@shared/types';

/**
 * Everything persisted when one review outcome is accepted.
 */
export interface OutcomeCommit {
  card: Flashcard;
  session: Session;
  review: ReviewRecord;
}

/**
 * Persistence for sessions, cards and review records.
 *
 * Absent documents come back as null. Any call may reject with
 * StoreUnavailableError; callers decide whether to retry.
 */
export interface SessionStore {
  loadSession(ownerId: string): Promise<Session | null>;
  /** Full overwrite, last writer wins per owner */
  saveSession(session: Session): Promise<void>;

  loadCard(cardId: string): Promise<Flashcard | null>;
  saveCard(card: Flashcard): Promise<void>;
  listCards(ownerId: string): Promise<Flashcard[]>;
  /** Removes the card and its review records; a missing card is a no-op */
  deleteCard(cardId: string): Promise<void>;
  /**
   * Cards of this owner that may be due at `now`. May return a superset;
   * the scheduler filters precisely.
   */
  queryDue(ownerId: string, now: Date): Promise<Flashcard[]>;

  findReview(cardId: string, submissionToken: string): Promise<ReviewRecord | null>;
  listReviews(cardId: string): Promise<ReviewRecord[]>;
  /** Writes card, session and review together, or none of them */
  commitOutcome(commit: OutcomeCommit): Promise<void>;
}
