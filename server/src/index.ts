import { Hono, type Context } from 'hono';
import { cors } from 'hono/cors';
import { z } from 'zod';
import { InvalidArgumentError } from '@shared/errors';
import { ratingToGrade, type Grade } from '@shared/types';
import { createLogger } from './logger';
import { jsonError, restErrorHandler } from './middleware/error-handler';
import { OwnerLock } from './services/owner-lock';
import type { StudySessionService } from './services/study-session';

const log = createLogger('Http');

// ============ Request bodies ============

const TwoSidedSchema = z.object({
  card_type: z.literal('two_sided'),
  front: z.string(),
  back: z.string(),
});

const FillInBlankSchema = z.object({
  card_type: z.literal('fill_in_blank'),
  text_with_blanks: z.string(),
  answers: z.array(z.string()),
  case_sensitive: z.boolean().default(false),
});

const MultipleChoiceSchema = z.object({
  card_type: z.literal('multiple_choice'),
  question: z.string(),
  options: z.array(z.string()),
  correct_indices: z.array(z.number().int()),
  allow_multiple: z.boolean().default(false),
});

export const CardContentSchema = z.discriminatedUnion('card_type', [
  TwoSidedSchema,
  FillInBlankSchema,
  MultipleChoiceSchema,
]);

const CreateCardSchema = z.object({
  content: CardContentSchema,
  title: z.string().nullable().optional(),
  tags: z.array(z.string()).optional(),
});

const CardQuerySchema = z.object({
  type: z.enum(['two_sided', 'fill_in_blank', 'multiple_choice']).optional(),
  tag: z.array(z.string().min(1)).optional(),
});

const OutcomeSchema = z.object({
  card_id: z.string().min(1),
  grade: z.enum(['again', 'hard', 'good', 'easy']).optional(),
  rating: z.union([z.literal(0), z.literal(1), z.literal(2), z.literal(3)]).optional(),
  submission_token: z.string().min(1).optional(),
});

const AnswerSchema = z.object({
  card_id: z.string().min(1),
  answer: z.string(),
  submission_token: z.string().min(1).optional(),
});

const EditStartSchema = z.object({
  card_id: z.string().min(1),
});

/**
 * Parse and validate a JSON body. An empty body is treated as `{}`.
 */
async function readBody<T extends z.ZodTypeAny>(c: Context, schema: T): Promise<z.infer<T>> {
  const text = await c.req.text();
  let raw: unknown = {};
  if (text.trim() !== '') {
    try {
      raw = JSON.parse(text);
    } catch (error) {
      log.debug('Rejected malformed JSON body', error);
      throw new InvalidArgumentError('Request body must be valid JSON');
    }
  }

  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const field = issue?.path.join('.') || 'body';
    throw new InvalidArgumentError(`Invalid ${field}: ${issue?.message ?? 'invalid value'}`);
  }
  return parsed.data;
}

function resolveGrade(body: z.infer<typeof OutcomeSchema>): Grade {
  if (body.grade !== undefined) {
    return body.grade;
  }
  if (body.rating !== undefined) {
    return ratingToGrade(body.rating);
  }
  throw new InvalidArgumentError('Either grade or rating is required');
}

// ============ App ============

export interface AppDependencies {
  service: StudySessionService;
  lock?: OwnerLock;
  clock?: () => Date;
}

export function createApp({ service, lock = new OwnerLock(), clock = () => new Date() }: AppDependencies) {
  const app = new Hono();

  app.use('/api/*', cors());

  app.use('/api/*', async (c, next) => {
    await next();
    log.debug(`${c.req.method} ${c.req.path} ${c.res.status}`);
  });

  app.onError(restErrorHandler);
  app.notFound((c) => jsonError(c, 404, 'NOT_FOUND', `No route for ${c.req.method} ${c.req.path}`));

  // Health check
  app.get('/api/health', (c) => c.json({ status: 'ok' }));

  // Every owner-scoped call runs under that owner's lock
  const owned = <T>(ownerId: string, task: () => Promise<T>) => lock.run(ownerId, task);

  // ============ Cards ============

  app.post('/api/owners/:ownerId/cards', async (c) => {
    const ownerId = c.req.param('ownerId');
    const body = await readBody(c, CreateCardSchema);
    const card = await owned(ownerId, () => service.createCard(ownerId, body, clock()));
    return c.json(card, 201);
  });

  app.get('/api/owners/:ownerId/cards', async (c) => {
    const ownerId = c.req.param('ownerId');
    const query = CardQuerySchema.safeParse({ type: c.req.query('type'), tag: c.req.queries('tag') });
    if (!query.success) {
      throw new InvalidArgumentError(`Invalid query: ${query.error.issues[0]?.message ?? 'invalid value'}`);
    }
    const filter = { card_type: query.data.type, tags: query.data.tag };
    const cards = await owned(ownerId, () => service.listCards(ownerId, filter));
    return c.json({ cards });
  });

  app.get('/api/owners/:ownerId/tags', async (c) => {
    const ownerId = c.req.param('ownerId');
    const tags = await owned(ownerId, () => service.listTags(ownerId));
    return c.json({ tags });
  });

  app.get('/api/owners/:ownerId/cards/:cardId', async (c) => {
    const ownerId = c.req.param('ownerId');
    const cardId = c.req.param('cardId');
    const details = await owned(ownerId, () => service.getCard(ownerId, cardId, clock()));
    return c.json(details);
  });

  app.put('/api/owners/:ownerId/cards/:cardId', async (c) => {
    const ownerId = c.req.param('ownerId');
    const cardId = c.req.param('cardId');
    const content = await readBody(c, CardContentSchema);
    const card = await owned(ownerId, () => service.updateCardContent(ownerId, cardId, content, clock()));
    return c.json(card);
  });

  app.delete('/api/owners/:ownerId/cards/:cardId', async (c) => {
    const ownerId = c.req.param('ownerId');
    const cardId = c.req.param('cardId');
    await owned(ownerId, () => service.deleteCard(ownerId, cardId, clock()));
    return c.body(null, 204);
  });

  app.get('/api/owners/:ownerId/stats', async (c) => {
    const ownerId = c.req.param('ownerId');
    const stats = await owned(ownerId, () => service.getStats(ownerId, clock()));
    return c.json(stats);
  });

  app.get('/api/owners/:ownerId/dashboard', async (c) => {
    const ownerId = c.req.param('ownerId');
    const dashboard = await owned(ownerId, () => service.getDashboard(ownerId, clock()));
    return c.json(dashboard);
  });

  // ============ Session ============

  app.get('/api/owners/:ownerId/session', async (c) => {
    const ownerId = c.req.param('ownerId');
    const session = await owned(ownerId, () => service.getSessionState(ownerId, clock()));
    return c.json(session);
  });

  app.post('/api/owners/:ownerId/review/start', async (c) => {
    const ownerId = c.req.param('ownerId');
    const step = await owned(ownerId, () => service.startReview(ownerId, clock()));
    return c.json(step);
  });

  app.post('/api/owners/:ownerId/review/outcome', async (c) => {
    const ownerId = c.req.param('ownerId');
    const body = await readBody(c, OutcomeSchema);
    const grade = resolveGrade(body);
    const step = await owned(ownerId, () =>
      service.reportOutcome(ownerId, body.card_id, grade, clock(), { submissionToken: body.submission_token })
    );
    return c.json(step);
  });

  app.post('/api/owners/:ownerId/review/answer', async (c) => {
    const ownerId = c.req.param('ownerId');
    const body = await readBody(c, AnswerSchema);
    const step = await owned(ownerId, () =>
      service.submitAnswer(ownerId, body.card_id, body.answer, clock(), { submissionToken: body.submission_token })
    );
    return c.json(step);
  });

  app.post('/api/owners/:ownerId/review/cancel', async (c) => {
    const ownerId = c.req.param('ownerId');
    const session = await owned(ownerId, () => service.cancel(ownerId, clock()));
    return c.json(session);
  });

  app.post('/api/owners/:ownerId/edit/start', async (c) => {
    const ownerId = c.req.param('ownerId');
    const body = await readBody(c, EditStartSchema);
    const state = await owned(ownerId, () => service.startEdit(ownerId, body.card_id, clock()));
    return c.json(state);
  });

  app.post('/api/owners/:ownerId/edit/finish', async (c) => {
    const ownerId = c.req.param('ownerId');
    const state = await owned(ownerId, () => service.finishEdit(ownerId, clock()));
    return c.json(state);
  });

  return app;
}
