import { describe, it, expect, beforeEach, vi } from 'vitest';
import { DEFAULT_SCHEDULER_SETTINGS } from '@shared/scheduler';
import { MemorySessionStore } from '../db/memory-store';
import { createApp } from '../index';
import { StudySessionService } from '../services/study-session';
import { createTestCard, T0 } from '../services/__tests__/fixtures';

const BASE = '/api/owners/owner-1';

function post(body?: unknown): RequestInit {
  return {
    method: 'POST',
    headers: { 'Content-Type': 'application/json' },
    body: body === undefined ? undefined : JSON.stringify(body),
  };
}

describe('HTTP API', () => {
  let store: MemorySessionStore;
  let app: ReturnType<typeof createApp>;

  beforeEach(async () => {
    store = new MemorySessionStore();
    const service = new StudySessionService(store, DEFAULT_SCHEDULER_SETTINGS, { store_timeout_ms: 0 });
    app = createApp({ service, clock: () => T0 });

    await store.saveCard(createTestCard({ id: 'card-a', due_at: '2024-01-10T00:00:00.000Z' }));
    await store.saveCard(createTestCard({ id: 'card-b', due_at: '2024-01-11T00:00:00.000Z' }));
  });

  it('GET /api/health', async () => {
    const res = await app.request('/api/health');

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ status: 'ok' });
  });

  it('runs a review from start to completion', async () => {
    const start = await app.request(`${BASE}/review/start`, post());
    expect(start.status).toBe(200);
    expect(await start.json()).toMatchObject({ status: 'active', card: { id: 'card-a' }, remaining: 1 });

    const first = await app.request(`${BASE}/review/outcome`, post({ card_id: 'card-a', grade: 'good' }));
    expect(await first.json()).toMatchObject({ status: 'active', card: { id: 'card-b' }, duplicate: false });

    const last = await app.request(`${BASE}/review/outcome`, post({ card_id: 'card-b', rating: 0 }));
    const body = await last.json();
    expect(body).toMatchObject({
      status: 'completed',
      summary: { reviewed: 2, stats: { again: 1, hard: 0, good: 1, easy: 0 }, reason: 'completed' },
    });

    const session = await app.request(`${BASE}/session`);
    expect(await session.json()).toMatchObject({ mode: 'idle', active_card_id: null, queue: [] });
  });

  it('returns 409 for an outcome on a card that is not active', async () => {
    await app.request(`${BASE}/review/start`, post());

    const res = await app.request(`${BASE}/review/outcome`, post({ card_id: 'card-b', grade: 'good' }));

    expect(res.status).toBe(409);
    expect(await res.json()).toEqual({
      error: { code: 'INVALID_STATE', message: 'Card card-b is not the active card' },
    });
  });

  it('returns 400 for a malformed body', async () => {
    await app.request(`${BASE}/review/start`, post());

    const noGrade = await app.request(`${BASE}/review/outcome`, post({ card_id: 'card-a' }));
    expect(noGrade.status).toBe(400);
    expect(await noGrade.json()).toEqual({
      error: { code: 'INVALID_ARGUMENT', message: 'Either grade or rating is required' },
    });

    const badJson = await app.request(`${BASE}/review/outcome`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: '{ not json',
    });
    expect(badJson.status).toBe(400);
    expect(await badJson.json()).toEqual({
      error: { code: 'INVALID_ARGUMENT', message: 'Request body must be valid JSON' },
    });

    const badRating = await app.request(`${BASE}/review/outcome`, post({ card_id: 'card-a', rating: 7 }));
    expect(badRating.status).toBe(400);
  });

  it('returns 404 for unknown cards and routes', async () => {
    const card = await app.request(`${BASE}/cards/card-missing`);
    expect(card.status).toBe(404);
    expect(await card.json()).toEqual({ error: { code: 'NOT_FOUND', message: 'Card card-missing not found' } });

    const route = await app.request('/api/nowhere');
    expect(route.status).toBe(404);
  });

  it('returns 503 when the store fails', async () => {
    vi.spyOn(store, 'queryDue').mockRejectedValueOnce(new Error('connection reset'));

    const res = await app.request(`${BASE}/review/start`, post());

    expect(res.status).toBe(503);
    expect(await res.json()).toEqual({ error: { code: 'STORE_UNAVAILABLE', message: 'Store queryDue failed' } });
  });

  it('returns 500 without internals for unexpected errors', async () => {
    const service = new StudySessionService(store);
    vi.spyOn(service, 'getStats').mockRejectedValueOnce(new TypeError('x is undefined'));
    const broken = createApp({ service, clock: () => T0 });

    const res = await broken.request(`${BASE}/stats`);

    expect(res.status).toBe(500);
    expect(await res.json()).toEqual({
      error: { code: 'INTERNAL_ERROR', message: 'An unexpected error occurred. Please try again later.' },
    });
  });

  it('creates, edits and inspects cards', async () => {
    const created = await app.request(
      `${BASE}/cards`,
      post({ content: { card_type: 'fill_in_blank', text_with_blanks: 'Das ist {blank}', answers: ['gut'] } })
    );
    expect(created.status).toBe(201);
    const card = await created.json();
    expect(card).toMatchObject({ owner_id: 'owner-1', case_sensitive: false, due_at: T0.toISOString() });

    const notEditing = await app.request(`${BASE}/cards/${card.id}`, {
      method: 'PUT',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify({ card_type: 'two_sided', front: 'a', back: 'b' }),
    });
    expect(notEditing.status).toBe(409);

    const edit = await app.request(`${BASE}/edit/start`, post({ card_id: card.id }));
    expect(await edit.json()).toMatchObject({ session: { mode: 'editing', prior_mode: 'idle' } });

    const put = await app.request(`${BASE}/cards/${card.id}`, {
      method: 'PUT',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify({ card_type: 'two_sided', front: 'a', back: 'b' }),
    });
    expect(put.status).toBe(200);
    expect(await put.json()).toMatchObject({ id: card.id, card_type: 'two_sided', front: 'a', back: 'b' });

    const finish = await app.request(`${BASE}/edit/finish`, post());
    expect(await finish.json()).toMatchObject({ session: { mode: 'idle' }, card: null });

    const details = await app.request(`${BASE}/cards/${card.id}`);
    const detailsBody = await details.json();
    expect(detailsBody.previews).toHaveLength(4);
    expect(detailsBody.reviews).toEqual([]);

    const list = await app.request(`${BASE}/cards`);
    expect((await list.json()).cards).toHaveLength(3);
  });

  it('grades typed answers', async () => {
    await app.request(`${BASE}/review/start`, post());

    const res = await app.request(`${BASE}/review/answer`, post({ card_id: 'card-a', answer: 'World' }));

    expect(await res.json()).toMatchObject({
      status: 'active',
      card: { id: 'card-b' },
      check: { correct: true, expected: ['world'] },
    });
  });

  it('cancels a review and reports stats', async () => {
    await app.request(`${BASE}/review/start`, post());

    const cancel = await app.request(`${BASE}/review/cancel`, post());
    expect(await cancel.json()).toMatchObject({ mode: 'idle', last_summary: { reason: 'cancelled', reviewed: 0 } });

    const stats = await app.request(`${BASE}/stats`);
    expect(await stats.json()).toMatchObject({ total: 2, due_now: 2, new: 2 });
  });

  it('deletes cards', async () => {
    const res = await app.request(`${BASE}/cards/card-b`, { method: 'DELETE' });
    expect(res.status).toBe(204);

    expect((await app.request(`${BASE}/cards/card-b`)).status).toBe(404);
    expect((await app.request(`${BASE}/cards/card-b`, { method: 'DELETE' })).status).toBe(404);

    const start = await app.request(`${BASE}/review/start`, post());
    expect(await start.json()).toMatchObject({ status: 'active', card: { id: 'card-a' }, remaining: 0 });
  });

  it('filters cards by type and tag and lists tags', async () => {
    await app.request(
      `${BASE}/cards`,
      post({
        content: { card_type: 'multiple_choice', question: 'Pick', options: ['x', 'y'], correct_indices: [1] },
        tags: ['verbs'],
      })
    );

    const byType = await app.request(`${BASE}/cards?type=multiple_choice`);
    expect((await byType.json()).cards).toHaveLength(1);

    const byTag = await app.request(`${BASE}/cards?tag=verbs&tag=unused`);
    expect((await byTag.json()).cards).toMatchObject([{ card_type: 'multiple_choice', tags: ['verbs'] }]);

    const tags = await app.request(`${BASE}/tags`);
    expect(await tags.json()).toEqual({ tags: ['verbs'] });

    const badType = await app.request(`${BASE}/cards?type=essay`);
    expect(badType.status).toBe(400);
  });

  it('rejects a card that repeats a correct option', async () => {
    const res = await app.request(
      `${BASE}/cards`,
      post({ content: { card_type: 'multiple_choice', question: 'Pick', options: ['A', 'B'], correct_indices: [0, 0] } })
    );

    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({
      error: { code: 'INVALID_ARGUMENT', message: 'correct_indices must not repeat an option' },
    });
  });

  it('reports dashboard stats', async () => {
    const res = await app.request(`${BASE}/dashboard`);

    expect(await res.json()).toEqual({
      total: 2,
      due_today: 2,
      due_this_week: 2,
      new: 2,
      mastered: 0,
      recent_additions: 0,
      recent_reviews: 0,
      progress_percentage: 0,
      workload_percentage: 100,
    });
  });
});
