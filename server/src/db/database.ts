import Dexie, { type DexieOptions, type Table } from 'dexie';
import { isSrsError, StoreUnavailableError } from '@shared/errors';
import type { Flashcard, ReviewRecord, Session } from '@shared/types';
import { createLogger } from '../logger';
import type { OutcomeCommit, SessionStore } from './store';

const log = createLogger('Store');

// Dexie database class
export class FlashcardDB extends Dexie {
  cards!: Table<Flashcard, string>;
  sessions!: Table<Session, string>;
  reviews!: Table<ReviewRecord, string>;

  constructor(name = 'FlashcardSRS', options?: DexieOptions) {
    super(name, options);

    this.version(1).stores({
      cards: 'id, owner_id, [owner_id+due_at]',
      sessions: 'owner_id',
      reviews: 'id, card_id, [card_id+submission_token]',
    });
  }
}

/**
 * SessionStore backed by IndexedDB through Dexie. Outside a browser, pass an
 * IndexedDB implementation in `options` (e.g. fake-indexeddb).
 */
export class DexieSessionStore implements SessionStore {
  constructor(private readonly db: FlashcardDB) {}

  private async guard<T>(operation: string, run: () => Promise<T>): Promise<T> {
    try {
      return await run();
    } catch (error) {
      if (isSrsError(error)) {
        throw error;
      }
      log.error(`${operation} failed`, error);
      throw new StoreUnavailableError(`Store ${operation} failed`, error);
    }
  }

  loadSession(ownerId: string): Promise<Session | null> {
    return this.guard('loadSession', async () => (await this.db.sessions.get(ownerId)) ?? null);
  }

  saveSession(session: Session): Promise<void> {
    return this.guard('saveSession', async () => {
      await this.db.sessions.put(session);
    });
  }

  loadCard(cardId: string): Promise<Flashcard | null> {
    return this.guard('loadCard', async () => (await this.db.cards.get(cardId)) ?? null);
  }

  saveCard(card: Flashcard): Promise<void> {
    return this.guard('saveCard', async () => {
      await this.db.cards.put(card);
    });
  }

  listCards(ownerId: string): Promise<Flashcard[]> {
    return this.guard('listCards', () => this.db.cards.where('owner_id').equals(ownerId).toArray());
  }

  deleteCard(cardId: string): Promise<void> {
    return this.guard('deleteCard', () =>
      this.db.transaction('rw', [this.db.cards, this.db.reviews], async () => {
        await this.db.cards.delete(cardId);
        await this.db.reviews.where('card_id').equals(cardId).delete();
      })
    );
  }

  queryDue(ownerId: string, now: Date): Promise<Flashcard[]> {
    return this.guard('queryDue', () =>
      this.db.cards
        .where('[owner_id+due_at]')
        .between([ownerId, Dexie.minKey], [ownerId, now.toISOString()], true, true)
        .toArray()
    );
  }

  findReview(cardId: string, submissionToken: string): Promise<ReviewRecord | null> {
    return this.guard('findReview', async () =>
      (await this.db.reviews.where('[card_id+submission_token]').equals([cardId, submissionToken]).first()) ?? null
    );
  }

  listReviews(cardId: string): Promise<ReviewRecord[]> {
    return this.guard('listReviews', () => this.db.reviews.where('card_id').equals(cardId).toArray());
  }

  commitOutcome({ card, session, review }: OutcomeCommit): Promise<void> {
    return this.guard('commitOutcome', () =>
      this.db.transaction('rw', [this.db.cards, this.db.sessions, this.db.reviews], async () => {
        await this.db.cards.put(card);
        await this.db.sessions.put(session);
        // add, not put: a review record is never overwritten
        await this.db.reviews.add(review);
      })
    );
  }
}
