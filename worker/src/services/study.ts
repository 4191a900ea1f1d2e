import {
  Card,
  CardCounts,
  Quality,
  SchedulerConfig,
  applyOutcome,
  computeOutcome,
  createReviewLogEntry,
  getCardCounts,
  selectDueCards,
} from '@recall-scheduler/shared/scheduler';
import { CardStore } from '../db/store';
import { ReviewResult } from '../types';

export interface ReviewInput {
  card_id: string;
  quality: Quality;
  response_time_seconds?: number;
}

// Reviews of the same card in the same store run one after another
const pendingByStore = new WeakMap<CardStore, Map<string, Promise<unknown>>>();

async function serializeByCard<T>(store: CardStore, cardId: string, task: () => Promise<T>): Promise<T> {
  let pendingReviews = pendingByStore.get(store);
  if (!pendingReviews) {
    pendingReviews = new Map();
    pendingByStore.set(store, pendingReviews);
  }

  const previous = pendingReviews.get(cardId) ?? Promise.resolve();
  const run = previous.then(task, task);
  const settled = run.then(() => undefined, () => undefined);
  pendingReviews.set(cardId, settled);

  try {
    return await run;
  } finally {
    if (pendingReviews.get(cardId) === settled) {
      pendingReviews.delete(cardId);
    }
  }
}

/**
 * Rate a card: compute the outcome, store the updated card and append the
 * review log. Returns null when the card does not exist.
 */
export async function submitReview(
  store: CardStore,
  config: SchedulerConfig,
  input: ReviewInput,
  clock: () => Date = () => new Date()
): Promise<ReviewResult | null> {
  return serializeByCard(store, input.card_id, async () => {
    const card = await store.getCard(input.card_id);
    if (!card) {
      return null;
    }

    const now = clock();
    const outcome = computeOutcome(card, input.quality, config, now);
    const updated = applyOutcome(card, outcome, now);
    const entry = createReviewLogEntry(card, outcome, input.quality, now, input.response_time_seconds);
    const review = await store.saveReview(updated, entry);

    console.log('[Review] Card reviewed', {
      card_id: card.id,
      quality: Quality[input.quality],
      from: card.state,
      to: outcome.state,
      interval: `${outcome.interval} ${outcome.interval_unit}`,
    });

    return { card: updated, outcome, review };
  });
}

/**
 * Cards to study now, most time-sensitive first
 */
export async function getDueQueue(
  store: CardStore,
  limit: number,
  now: Date = new Date(),
  topic?: string
): Promise<Card[]> {
  const cards = await store.listCards({ topic });
  return selectDueCards(cards, now, limit);
}

export async function getQueueCounts(
  store: CardStore,
  now: Date = new Date(),
  topic?: string
): Promise<CardCounts> {
  const cards = await store.listCards({ topic });
  return getCardCounts(cards, now);
}
