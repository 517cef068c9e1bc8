import {
  InvalidArgumentError,
  InvalidStateError,
  isSrsError,
  NotFoundError,
  StoreUnavailableError,
} from '@shared/errors';
import {
  applyOutcome,
  DEFAULT_SCHEDULER_SETTINGS,
  collectTags,
  getCollectionStats,
  getDashboardStats,
  getIntervalPreviews,
  nextDue,
  type CollectionStats,
  type DashboardStats,
  type IntervalPreview,
  type SchedulerSettings,
} from '@shared/scheduler';
import {
  emptyStats,
  GRADES,
  idleSession,
  type CardContent,
  type CardType,
  type Flashcard,
  type Grade,
  type ReviewRecord,
  type Session,
  type SessionSummary,
} from '@shared/types';
import { DEFAULT_SESSION_OPTIONS, type SessionOptions } from '../config';
import type { SessionStore } from '../db/store';
import { createLogger } from '../logger';
import { checkAnswer, gradeFromAnswer, type AnswerCheck } from './answers';
import {
  createFlashcard,
  generateId,
  getQuestion,
  replaceContent,
  validateContent,
  type NewCardInput,
} from './cards';

const log = createLogger('StudySession');

export type ReviewStep =
  | { status: 'active'; card: Flashcard; prompt: string; remaining: number; resumed: boolean }
  | { status: 'nothing_due' }
  | { status: 'completed'; summary: SessionSummary };

export type OutcomeStep = ReviewStep & { duplicate: boolean };

export type AnswerStep = OutcomeStep & { check: AnswerCheck };

export interface OutcomeOptions {
  /** Caller-chosen id for this delivery; a repeat with the same token is ignored */
  submissionToken?: string;
}

export interface EditState {
  session: Session;
  /** Card being edited on start, the restored active card on finish */
  card: Flashcard | null;
}

export interface CardFilter {
  card_type?: CardType;
  /** Cards carrying any of these tags */
  tags?: string[];
}

export interface CardDetails {
  card: Flashcard;
  previews: IntervalPreview[];
  reviews: ReviewRecord[];
}

function withTimeout<T>(promise: Promise<T>, ms: number, message: string): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const timer = setTimeout(() => reject(new StoreUnavailableError(message)), ms);
    promise.then(
      value => {
        clearTimeout(timer);
        resolve(value);
      },
      error => {
        clearTimeout(timer);
        reject(error);
      }
    );
  });
}

function activeStep(card: Flashcard, remaining: number, resumed: boolean): ReviewStep {
  return { status: 'active', card, prompt: getQuestion(card), remaining, resumed };
}

function requireId(value: string, name: string): void {
  if (value.trim() === '') {
    throw new InvalidArgumentError(`${name} must not be empty`);
  }
}

function countReviewed(session: Session): number {
  return GRADES.reduce((sum, grade) => sum + session.stats[grade], 0);
}

function summarize(session: Session, now: Date, reason: SessionSummary['reason']): SessionSummary {
  return {
    owner_id: session.owner_id,
    started_at: session.started_at,
    finished_at: now.toISOString(),
    reviewed: countReviewed(session),
    stats: { ...session.stats },
    reason,
  };
}

function archive(session: Session, now: Date, summary: SessionSummary | null): Session {
  return {
    ...idleSession(session.owner_id, now),
    last_summary: summary ?? session.last_summary,
  };
}

/**
 * Per-owner review session state machine: idle, reviewing and editing.
 *
 * Holds no state between calls; everything lives in the injected store.
 * Calls for the same owner must not overlap (see OwnerLock).
 */
export class StudySessionService {
  private readonly settings: SchedulerSettings;
  private readonly options: SessionOptions;

  constructor(
    private readonly store: SessionStore,
    settings: SchedulerSettings = DEFAULT_SCHEDULER_SETTINGS,
    options: Partial<SessionOptions> = {}
  ) {
    this.settings = settings;
    this.options = { ...DEFAULT_SESSION_OPTIONS, ...options };
  }

  // ============ Store access ============

  /**
   * Run a store call under the configured timeout. Anything other than an
   * SrsError is reported as StoreUnavailable.
   */
  private async call<T>(operation: string, run: () => Promise<T>): Promise<T> {
    const timeoutMs = this.options.store_timeout_ms;
    try {
      if (timeoutMs <= 0) {
        return await run();
      }
      return await withTimeout(run(), timeoutMs, `Store ${operation} timed out after ${timeoutMs}ms`);
    } catch (error) {
      if (isSrsError(error)) {
        throw error;
      }
      throw new StoreUnavailableError(`Store ${operation} failed`, error);
    }
  }

  private async loadSession(ownerId: string, now: Date): Promise<Session> {
    const session = await this.call('loadSession', () => this.store.loadSession(ownerId));
    return session ?? idleSession(ownerId, now);
  }

  private async loadOwnedCard(ownerId: string, cardId: string): Promise<Flashcard> {
    const card = await this.call('loadCard', () => this.store.loadCard(cardId));
    if (!card || card.owner_id !== ownerId) {
      throw new NotFoundError(`Card ${cardId} not found`);
    }
    return card;
  }

  /**
   * Pop queued ids until one still resolves to a card of this owner.
   */
  private async nextQueued(ownerId: string, queue: string[]): Promise<{ card: Flashcard | null; queue: string[] }> {
    let rest = queue;
    while (rest.length > 0) {
      const [id, ...tail] = rest;
      rest = tail;
      const card = await this.call('loadCard', () => this.store.loadCard(id));
      if (card && card.owner_id === ownerId) {
        return { card, queue: rest };
      }
      log.warn(`Skipping queued card ${id}: no longer exists`);
    }
    return { card: null, queue: [] };
  }

  /**
   * Where the owner currently stands, without changing anything.
   */
  private async currentStep(session: Session): Promise<ReviewStep> {
    if (session.active_card_id) {
      const activeId = session.active_card_id;
      const card = await this.call('loadCard', () => this.store.loadCard(activeId));
      if (card) {
        return activeStep(card, session.queue.length, true);
      }
    }
    if (session.last_summary) {
      return { status: 'completed', summary: session.last_summary };
    }
    return { status: 'nothing_due' };
  }

  // ============ Review ============

  /**
   * Begin a review session, or resume the one in progress.
   */
  async startReview(ownerId: string, now: Date): Promise<ReviewStep> {
    requireId(ownerId, 'ownerId');
    const session = await this.loadSession(ownerId, now);

    if (session.mode === 'editing') {
      throw new InvalidStateError('Finish editing before starting a review');
    }

    if (session.mode === 'reviewing' && session.active_card_id) {
      const activeId = session.active_card_id;
      const active = await this.call('loadCard', () => this.store.loadCard(activeId));
      if (active) {
        log.debug(`Resuming review for ${ownerId} at card ${active.id}`);
        return activeStep(active, session.queue.length, true);
      }

      // Active card was deleted underneath us
      const { card: nextCard, queue: nextQueue } = await this.nextQueued(ownerId, session.queue);
      if (nextCard) {
        const advanced: Session = {
          ...session,
          active_card_id: nextCard.id,
          queue: nextQueue,
          updated_at: now.toISOString(),
        };
        await this.call('saveSession', () => this.store.saveSession(advanced));
        return activeStep(nextCard, nextQueue.length, true);
      }
      const summary = summarize(session, now, 'completed');
      await this.call('saveSession', () => this.store.saveSession(archive(session, now, summary)));
      return { status: 'completed', summary };
    }

    const candidates = (await this.call('queryDue', () => this.store.queryDue(ownerId, now))).filter(
      card => card.owner_id === ownerId
    );
    const ordered = nextDue(candidates, now).slice(0, this.options.cards_per_session);
    const [firstId, ...queue] = ordered;
    const first = candidates.find(card => card.id === firstId);

    if (!first) {
      log.info(`Nothing due for ${ownerId}`);
      return { status: 'nothing_due' };
    }

    const started: Session = {
      ...session,
      mode: 'reviewing',
      active_card_id: first.id,
      queue,
      prior_mode: null,
      editing_card_id: null,
      started_at: now.toISOString(),
      updated_at: now.toISOString(),
      stats: emptyStats(),
    };
    await this.call('saveSession', () => this.store.saveSession(started));

    log.info(`Review started for ${ownerId}: ${ordered.length} cards`);
    return activeStep(first, queue.length, false);
  }

  /**
   * Apply a grade to the active card and advance the session.
   */
  async reportOutcome(
    ownerId: string,
    cardId: string,
    grade: Grade,
    now: Date,
    options: OutcomeOptions = {}
  ): Promise<OutcomeStep> {
    requireId(ownerId, 'ownerId');
    requireId(cardId, 'cardId');
    if (!GRADES.includes(grade)) {
      throw new InvalidArgumentError(`Unknown grade: ${String(grade)}`);
    }

    const token = options.submissionToken;
    const session = await this.loadSession(ownerId, now);

    if (token !== undefined) {
      const seen = await this.call('findReview', () => this.store.findReview(cardId, token));
      if (seen) {
        log.info(`Duplicate submission ${token} for card ${cardId} ignored`);
        return { ...(await this.currentStep(session)), duplicate: true };
      }
    }

    if (session.mode !== 'reviewing') {
      throw new InvalidStateError(`Cannot report an outcome while ${session.mode}`);
    }
    if (session.active_card_id !== cardId) {
      throw new InvalidStateError(`Card ${cardId} is not the active card`);
    }

    const card = await this.loadOwnedCard(ownerId, cardId);
    const updated = applyOutcome(card, grade, now, this.settings);
    const stats = { ...session.stats, [grade]: session.stats[grade] + 1 };

    const review: ReviewRecord = {
      id: generateId(),
      owner_id: ownerId,
      card_id: cardId,
      grade,
      submission_token: token ?? null,
      reviewed_at: now.toISOString(),
      ease_factor: updated.ease_factor,
      interval_days: updated.interval_days,
      due_at: updated.due_at,
    };

    const next = await this.nextQueued(ownerId, session.queue);

    if (next.card) {
      const advanced: Session = {
        ...session,
        active_card_id: next.card.id,
        queue: next.queue,
        stats,
        updated_at: now.toISOString(),
      };
      await this.call('commitOutcome', () => this.store.commitOutcome({ card: updated, session: advanced, review }));

      log.debug(`Card ${cardId} graded ${grade}, next due ${updated.due_at}`);
      return { ...activeStep(next.card, next.queue.length, false), duplicate: false };
    }

    const summary = summarize({ ...session, stats }, now, 'completed');
    await this.call('commitOutcome', () =>
      this.store.commitOutcome({ card: updated, session: archive(session, now, summary), review })
    );

    log.info(`Review completed for ${ownerId}: ${summary.reviewed} cards`);
    return { status: 'completed', summary, duplicate: false };
  }

  /**
   * Check a typed answer for the active card and grade it pass/fail.
   */
  async submitAnswer(
    ownerId: string,
    cardId: string,
    answer: string,
    now: Date,
    options: OutcomeOptions = {}
  ): Promise<AnswerStep> {
    requireId(ownerId, 'ownerId');
    requireId(cardId, 'cardId');
    const card = await this.loadOwnedCard(ownerId, cardId);
    const check = checkAnswer(card, answer);
    const step = await this.reportOutcome(ownerId, cardId, gradeFromAnswer(check), now, options);
    return { ...step, check };
  }

  // ============ Editing ============

  async startEdit(ownerId: string, cardId: string, now: Date): Promise<EditState> {
    requireId(ownerId, 'ownerId');
    requireId(cardId, 'cardId');
    const session = await this.loadSession(ownerId, now);

    if (session.mode === 'editing') {
      throw new InvalidStateError('Already editing a card');
    }

    const card = await this.loadOwnedCard(ownerId, cardId);
    const editing: Session = {
      ...session,
      mode: 'editing',
      prior_mode: session.mode,
      editing_card_id: card.id,
      updated_at: now.toISOString(),
    };
    await this.call('saveSession', () => this.store.saveSession(editing));

    log.debug(`Editing card ${cardId} for ${ownerId}`);
    return { session: editing, card };
  }

  /**
   * Leave editing and return to whatever the owner was doing before.
   */
  async finishEdit(ownerId: string, now: Date): Promise<EditState> {
    requireId(ownerId, 'ownerId');
    const session = await this.loadSession(ownerId, now);

    if (session.mode !== 'editing') {
      throw new InvalidStateError('Not editing');
    }

    const restored: Session = {
      ...session,
      mode: session.prior_mode ?? 'idle',
      prior_mode: null,
      editing_card_id: null,
      updated_at: now.toISOString(),
    };
    await this.call('saveSession', () => this.store.saveSession(restored));

    const activeId = restored.active_card_id;
    const card = activeId ? await this.call('loadCard', () => this.store.loadCard(activeId)) : null;
    return { session: restored, card };
  }

  /**
   * Replace the content of the card being edited. Scheduling is untouched.
   */
  async updateCardContent(ownerId: string, cardId: string, content: CardContent, now: Date): Promise<Flashcard> {
    requireId(ownerId, 'ownerId');
    const session = await this.loadSession(ownerId, now);

    if (session.mode !== 'editing' || session.editing_card_id !== cardId) {
      throw new InvalidStateError(`Card ${cardId} is not being edited`);
    }

    validateContent(content);
    const card = await this.loadOwnedCard(ownerId, cardId);
    const updated = replaceContent(card, content, now);
    await this.call('saveCard', () => this.store.saveCard(updated));

    log.info(`Card ${cardId} content updated`);
    return updated;
  }

  // ============ Other ============

  /**
   * Drop back to idle from any state. Outcomes already reported stay applied.
   */
  async cancel(ownerId: string, now: Date): Promise<Session> {
    requireId(ownerId, 'ownerId');
    const session = await this.loadSession(ownerId, now);

    if (session.mode === 'idle') {
      return session;
    }

    const live = session.mode === 'reviewing' || session.prior_mode === 'reviewing';
    const summary = live ? summarize(session, now, 'cancelled') : null;
    const cancelled = archive(session, now, summary);
    await this.call('saveSession', () => this.store.saveSession(cancelled));

    log.info(`Session cancelled for ${ownerId}`);
    return cancelled;
  }

  async getSessionState(ownerId: string, now: Date): Promise<Session> {
    requireId(ownerId, 'ownerId');
    return this.loadSession(ownerId, now);
  }

  async createCard(ownerId: string, input: NewCardInput, now: Date): Promise<Flashcard> {
    requireId(ownerId, 'ownerId');
    validateContent(input.content);
    const card = createFlashcard(ownerId, input, now, this.settings);
    await this.call('saveCard', () => this.store.saveCard(card));

    log.info(`Created ${card.card_type} card ${card.id} for ${ownerId}`);
    return card;
  }

  async listCards(ownerId: string, filter: CardFilter = {}): Promise<Flashcard[]> {
    requireId(ownerId, 'ownerId');
    const cards = await this.call('listCards', () => this.store.listCards(ownerId));
    const { card_type, tags } = filter;
    return cards.filter(
      card =>
        (card_type === undefined || card.card_type === card_type) &&
        (tags === undefined || tags.length === 0 || card.tags.some(tag => tags.includes(tag)))
    );
  }

  async listTags(ownerId: string): Promise<string[]> {
    return collectTags(await this.listCards(ownerId));
  }

  /**
   * Delete a card and its review history. A session that still references it
   * skips it when it next advances or resumes.
   */
  async deleteCard(ownerId: string, cardId: string, now: Date): Promise<void> {
    requireId(ownerId, 'ownerId');
    requireId(cardId, 'cardId');
    const card = await this.loadOwnedCard(ownerId, cardId);
    const session = await this.loadSession(ownerId, now);

    if (session.mode === 'editing' && session.editing_card_id === card.id) {
      throw new InvalidStateError(`Card ${cardId} is being edited`);
    }

    await this.call('deleteCard', () => this.store.deleteCard(card.id));
    log.info(`Deleted card ${cardId} for ${ownerId}`);
  }

  async getCard(ownerId: string, cardId: string, now: Date): Promise<CardDetails> {
    requireId(ownerId, 'ownerId');
    requireId(cardId, 'cardId');
    const card = await this.loadOwnedCard(ownerId, cardId);
    const reviews = await this.call('listReviews', () => this.store.listReviews(cardId));
    reviews.sort((a, b) => (a.reviewed_at < b.reviewed_at ? -1 : a.reviewed_at > b.reviewed_at ? 1 : 0));
    return {
      card,
      previews: getIntervalPreviews(card, now, this.settings),
      reviews,
    };
  }

  async getStats(ownerId: string, now: Date): Promise<CollectionStats> {
    const cards = await this.listCards(ownerId);
    return getCollectionStats(cards, now);
  }

  async getDashboard(ownerId: string, now: Date): Promise<DashboardStats> {
    const cards = await this.listCards(ownerId);
    return getDashboardStats(cards, now);
  }
}
