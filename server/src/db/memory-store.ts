import { isDue } from '@shared/scheduler';
import { StoreUnavailableError } from '@shared/errors';
import type { Flashcard, ReviewRecord, Session } from '@shared/types';
import type { OutcomeCommit, SessionStore } from './store';

/**
 * Process-local store. Documents are copied on the way in and out so callers
 * can never mutate stored state by holding a reference.
 */
export class MemorySessionStore implements SessionStore {
  private sessions = new Map<string, Session>();
  private cards = new Map<string, Flashcard>();
  private reviews = new Map<string, ReviewRecord>();

  async loadSession(ownerId: string): Promise<Session | null> {
    const session = this.sessions.get(ownerId);
    return session ? structuredClone(session) : null;
  }

  async saveSession(session: Session): Promise<void> {
    this.sessions.set(session.owner_id, structuredClone(session));
  }

  async loadCard(cardId: string): Promise<Flashcard | null> {
    const card = this.cards.get(cardId);
    return card ? structuredClone(card) : null;
  }

  async saveCard(card: Flashcard): Promise<void> {
    this.cards.set(card.id, structuredClone(card));
  }

  async listCards(ownerId: string): Promise<Flashcard[]> {
    return [...this.cards.values()]
      .filter(card => card.owner_id === ownerId)
      .map(card => structuredClone(card));
  }

  async deleteCard(cardId: string): Promise<void> {
    this.cards.delete(cardId);
    for (const [id, review] of this.reviews) {
      if (review.card_id === cardId) {
        this.reviews.delete(id);
      }
    }
  }

  async queryDue(ownerId: string, now: Date): Promise<Flashcard[]> {
    return [...this.cards.values()]
      .filter(card => card.owner_id === ownerId && isDue(card, now))
      .map(card => structuredClone(card));
  }

  async findReview(cardId: string, submissionToken: string): Promise<ReviewRecord | null> {
    for (const review of this.reviews.values()) {
      if (review.card_id === cardId && review.submission_token === submissionToken) {
        return structuredClone(review);
      }
    }
    return null;
  }

  async listReviews(cardId: string): Promise<ReviewRecord[]> {
    return [...this.reviews.values()]
      .filter(review => review.card_id === cardId)
      .map(review => structuredClone(review));
  }

  async commitOutcome({ card, session, review }: OutcomeCommit): Promise<void> {
    if (this.reviews.has(review.id)) {
      throw new StoreUnavailableError(`Review ${review.id} already recorded`);
    }

    // Clone everything first so a failure cannot leave a partial write
    const storedCard = structuredClone(card);
    const storedSession = structuredClone(session);
    const storedReview = structuredClone(review);

    this.cards.set(storedCard.id, storedCard);
    this.sessions.set(storedSession.owner_id, storedSession);
    this.reviews.set(storedReview.id, storedReview);
  }
}
