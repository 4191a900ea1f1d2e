import { randomUUID } from 'node:crypto';
import {
  Card,
  CardContent,
  IntervalPreviews,
  SchedulerConfig,
  createCard,
  getIntervalPreviews,
  resetCard,
} from '@recall-scheduler/shared/scheduler';
import { CardStore } from '../db/store';
import { StoredReviewLog } from '../types';

/**
 * Generate a unique card ID
 */
export function generateId(): string {
  return randomUUID();
}

/**
 * Create a NEW card. Returns null when `id` is already taken.
 */
export async function addCard(
  store: CardStore,
  content: CardContent & { id?: string },
  now: Date = new Date()
): Promise<Card | null> {
  const id = content.id ?? generateId();
  if (await store.getCard(id)) {
    console.log('[Cards] Duplicate card id:', id);
    return null;
  }

  const card = await store.insertCard(createCard(id, content, now));
  console.log('[Cards] Created card', { id: card.id, topic: card.topic });
  return card;
}

/**
 * Create several cards at once. Ids already taken are skipped.
 */
export async function addCards(
  store: CardStore,
  contents: (CardContent & { id?: string })[],
  now: Date = new Date()
): Promise<Card[]> {
  const created: Card[] = [];
  for (const content of contents) {
    const card = await addCard(store, content, now);
    if (card) {
      created.push(card);
    }
  }
  return created;
}

/**
 * Edit a card's content. Scheduling fields are left alone.
 */
export async function updateCardContent(
  store: CardStore,
  cardId: string,
  patch: Partial<CardContent>,
  now: Date = new Date()
): Promise<Card | null> {
  const card = await store.getCard(cardId);
  if (!card) {
    return null;
  }

  const updated = await store.updateCard({
    ...card,
    front: patch.front ?? card.front,
    back: patch.back ?? card.back,
    topic: patch.topic === undefined ? card.topic : patch.topic,
    source_page: patch.source_page === undefined ? card.source_page : patch.source_page,
    updated_at: now.toISOString(),
  });
  console.log('[Cards] Updated card', { id: cardId, fields: Object.keys(patch) });
  return updated;
}

export async function deleteCard(store: CardStore, cardId: string): Promise<boolean> {
  const deleted = await store.deleteCard(cardId);
  if (deleted) {
    console.log('[Cards] Deleted card', { id: cardId });
  }
  return deleted;
}

/**
 * Delete several cards. Returns how many existed.
 */
export async function deleteCards(store: CardStore, cardIds: string[]): Promise<number> {
  let deleted = 0;
  for (const id of new Set(cardIds)) {
    if (await deleteCard(store, id)) {
      deleted++;
    }
  }
  return deleted;
}

/**
 * Forget a card's progress. Its review history is kept.
 */
export async function resetCardProgress(
  store: CardStore,
  cardId: string,
  now: Date = new Date()
): Promise<Card | null> {
  const card = await store.getCard(cardId);
  if (!card) {
    return null;
  }

  const updated = await store.updateCard(resetCard(card, now));
  console.log('[Cards] Reset card', { id: cardId, previous_state: card.state });
  return updated;
}

/**
 * Reset every card, or every card in `topic`. Returns how many were reset.
 */
export async function resetAllCards(
  store: CardStore,
  topic?: string,
  now: Date = new Date()
): Promise<number> {
  const cards = await store.listCards({ topic });
  let reset = 0;
  for (const card of cards) {
    if (await store.updateCard(resetCard(card, now))) {
      reset++;
    }
  }

  console.log('[Cards] Reset all cards', { topic: topic ?? null, count: reset });
  return reset;
}

export async function getCardPreviews(
  store: CardStore,
  cardId: string,
  config: SchedulerConfig,
  now: Date = new Date()
): Promise<IntervalPreviews | null> {
  const card = await store.getCard(cardId);
  return card ? getIntervalPreviews(card, config, now) : null;
}

/**
 * Review history for a card, newest first
 */
export async function getCardHistory(
  store: CardStore,
  cardId: string,
  limit: number = 50
): Promise<StoredReviewLog[] | null> {
  const card = await store.getCard(cardId);
  if (!card) {
    return null;
  }

  const logs = await store.listReviewLogs({ cardId });
  return logs
    .sort((a, b) => Date.parse(b.reviewed_at) - Date.parse(a.reviewed_at))
    .slice(0, limit);
}
