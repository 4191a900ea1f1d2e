import { Hono } from 'hono';
import type { Context } from 'hono';
import { cors } from 'hono/cors';
import { z } from 'zod';
import { Quality } from '@recall-scheduler/shared/scheduler';
import { CardStore } from './db/store';
import { WorkerConfig } from './types';
import {
  addCard,
  addCards,
  deleteCard,
  deleteCards,
  getCardHistory,
  getCardPreviews,
  resetAllCards,
  resetCardProgress,
  updateCardContent,
} from './services/cards';
import { getDueQueue, getQueueCounts, submitReview } from './services/study';
import { getOverview, getStudyPlan, getTopicWeakAreas } from './services/stats';

export interface AppOptions {
  store: CardStore;
  config: WorkerConfig;
  clock?: () => Date;
}

// ============ Request Schemas ============

const createCardSchema = z.object({
  id: z.string().min(1).optional(),
  front: z.string().min(1, 'front is required'),
  back: z.string().min(1, 'back is required'),
  topic: z.string().min(1).nullable().optional(),
  source_page: z.number().int().nonnegative().nullable().optional(),
});

const bulkCreateSchema = z.object({
  cards: z.array(createCardSchema).min(1, 'cards must not be empty'),
});

const updateCardSchema = createCardSchema
  .omit({ id: true })
  .partial()
  .refine(patch => Object.keys(patch).length > 0, 'No fields to update');

const bulkDeleteSchema = z.object({
  ids: z.array(z.string().min(1)).min(1, 'ids must not be empty'),
});

const reviewSchema = z.object({
  card_id: z.string().min(1, 'card_id is required'),
  quality: z.nativeEnum(Quality),
  response_time_seconds: z.number().nonnegative().optional(),
});

const limitSchema = z.coerce.number().int().nonnegative();
const windowSchema = z.coerce.number().int().positive();

async function readJson(c: Context): Promise<unknown> {
  try {
    return await c.req.json();
  } catch (err) {
    console.log('[Request] Unparseable JSON body:', err instanceof Error ? err.message : err);
    return undefined;
  }
}

function issues(error: z.ZodError): string[] {
  return error.issues.map(issue => (issue.path.length ? `${issue.path.join('.')}: ${issue.message}` : issue.message));
}

export function createApp({ store, config, clock = () => new Date() }: AppOptions) {
  const app = new Hono();

  app.use('/api/*', cors());

  app.onError((err, c) => {
    console.error('[Error]', c.req.method, c.req.path, err);
    return c.json({ error: 'Internal server error' }, 500);
  });

  // Health check
  app.get('/api/health', (c) => c.json({ status: 'ok' }));

  // ============ Cards ============

  app.get('/api/cards', async (c) => {
    const cards = await store.listCards({ topic: c.req.query('topic') });
    return c.json(cards);
  });

  app.post('/api/cards', async (c) => {
    const parsed = createCardSchema.safeParse(await readJson(c));
    if (!parsed.success) {
      return c.json({ error: 'Invalid card', details: issues(parsed.error) }, 400);
    }

    const card = await addCard(store, parsed.data, clock());
    if (!card) {
      return c.json({ error: 'Card already exists' }, 409);
    }
    return c.json(card, 201);
  });

  app.delete('/api/cards', async (c) => {
    const parsed = bulkDeleteSchema.safeParse(await readJson(c));
    if (!parsed.success) {
      return c.json({ error: 'Invalid request', details: issues(parsed.error) }, 400);
    }

    const deleted = await deleteCards(store, parsed.data.ids);
    return c.json({ deleted });
  });

  // Static routes must come before :id
  app.post('/api/cards/bulk', async (c) => {
    const parsed = bulkCreateSchema.safeParse(await readJson(c));
    if (!parsed.success) {
      return c.json({ error: 'Invalid cards', details: issues(parsed.error) }, 400);
    }

    const cards = await addCards(store, parsed.data.cards, clock());
    return c.json({ cards, skipped: parsed.data.cards.length - cards.length }, 201);
  });

  app.post('/api/cards/reset', async (c) => {
    const reset = await resetAllCards(store, c.req.query('topic'), clock());
    return c.json({ reset });
  });

  app.get('/api/cards/due', async (c) => {
    const parsed = limitSchema.safeParse(c.req.query('limit') ?? config.queue_limit);
    if (!parsed.success) {
      return c.json({ error: 'Invalid limit', details: issues(parsed.error) }, 400);
    }

    const cards = await getDueQueue(store, parsed.data, clock(), c.req.query('topic'));
    return c.json(cards);
  });

  app.get('/api/cards/counts', async (c) => {
    const counts = await getQueueCounts(store, clock(), c.req.query('topic'));
    return c.json(counts);
  });

  app.get('/api/cards/:id', async (c) => {
    const card = await store.getCard(c.req.param('id'));
    if (!card) {
      return c.json({ error: 'Card not found' }, 404);
    }
    return c.json(card);
  });

  app.patch('/api/cards/:id', async (c) => {
    const parsed = updateCardSchema.safeParse(await readJson(c));
    if (!parsed.success) {
      return c.json({ error: 'Invalid card', details: issues(parsed.error) }, 400);
    }

    const card = await updateCardContent(store, c.req.param('id'), parsed.data, clock());
    if (!card) {
      return c.json({ error: 'Card not found' }, 404);
    }
    return c.json(card);
  });

  app.delete('/api/cards/:id', async (c) => {
    const deleted = await deleteCard(store, c.req.param('id'));
    if (!deleted) {
      return c.json({ error: 'Card not found' }, 404);
    }
    return c.json({ success: true });
  });

  app.get('/api/cards/:id/previews', async (c) => {
    const previews = await getCardPreviews(store, c.req.param('id'), config.scheduler, clock());
    if (!previews) {
      return c.json({ error: 'Card not found' }, 404);
    }
    return c.json(previews);
  });

  app.get('/api/cards/:id/history', async (c) => {
    const history = await getCardHistory(store, c.req.param('id'));
    if (!history) {
      return c.json({ error: 'Card not found' }, 404);
    }
    return c.json(history);
  });

  app.post('/api/cards/:id/reset', async (c) => {
    const card = await resetCardProgress(store, c.req.param('id'), clock());
    if (!card) {
      return c.json({ error: 'Card not found' }, 404);
    }
    return c.json(card);
  });

  // ============ Study ============

  app.post('/api/study/review', async (c) => {
    const parsed = reviewSchema.safeParse(await readJson(c));
    if (!parsed.success) {
      return c.json({ error: 'Invalid review', details: issues(parsed.error) }, 400);
    }

    const result = await submitReview(store, config.scheduler, parsed.data, clock);
    if (!result) {
      return c.json({ error: 'Card not found' }, 404);
    }

    const counts = await getQueueCounts(store, clock());
    return c.json({ ...result, counts }, 201);
  });

  // ============ Stats ============

  app.get('/api/stats/overview', async (c) => {
    const overview = await getOverview(store, config.weak_area_window_days, clock());
    return c.json(overview);
  });

  app.get('/api/stats/weak-areas', async (c) => {
    const parsed = windowSchema.safeParse(c.req.query('window_days') ?? config.weak_area_window_days);
    if (!parsed.success) {
      return c.json({ error: 'Invalid window_days', details: issues(parsed.error) }, 400);
    }

    const areas = await getTopicWeakAreas(store, parsed.data, clock());
    return c.json(areas);
  });

  app.get('/api/stats/plan', async (c) => {
    const plan = await getStudyPlan(store, config.weak_area_window_days, clock());
    return c.json(plan);
  });

  return app;
}
