import { randomUUID } from 'node:crypto';
import type { Card, ReviewLogEntry } from '@recall-scheduler/shared/scheduler';
import { StoredReviewLog } from '../types';

/**
 * Record store for cards and their review history.
 *
 * The scheduler only needs the six scheduling fields of a card to round-trip
 * exactly; any backend that does so can implement this.
 */
export interface CardStore {
  getCard(id: string): Promise<Card | null>;
  listCards(filter?: { topic?: string }): Promise<Card[]>;
  insertCard(card: Card): Promise<Card>;
  updateCard(card: Card): Promise<Card | null>;
  // False when there was no such card. Its review history is kept
  deleteCard(id: string): Promise<boolean>;
  // Write the updated card and append its log entry as one operation
  saveReview(card: Card, entry: ReviewLogEntry): Promise<StoredReviewLog>;
  listReviewLogs(filter?: { cardId?: string; since?: Date }): Promise<StoredReviewLog[]>;
}

/**
 * In-process store. Cards and log entries are copied on the way in and out so
 * callers never share a reference with the store.
 */
export function createMemoryStore(initial: { cards?: Card[]; logs?: StoredReviewLog[] } = {}): CardStore {
  const cards = new Map<string, Card>();
  const logs: StoredReviewLog[] = [];

  for (const card of initial.cards ?? []) {
    cards.set(card.id, { ...card });
  }
  for (const log of initial.logs ?? []) {
    logs.push({ ...log });
  }

  return {
    async getCard(id) {
      const card = cards.get(id);
      return card ? { ...card } : null;
    },

    async listCards(filter = {}) {
      const result: Card[] = [];
      for (const card of cards.values()) {
        if (filter.topic !== undefined && card.topic !== filter.topic) continue;
        result.push({ ...card });
      }
      return result;
    },

    async insertCard(card) {
      if (cards.has(card.id)) {
        throw new Error(`Card already exists: ${card.id}`);
      }
      cards.set(card.id, { ...card });
      return { ...card };
    },

    async updateCard(card) {
      if (!cards.has(card.id)) {
        return null;
      }
      cards.set(card.id, { ...card });
      return { ...card };
    },

    async deleteCard(id) {
      return cards.delete(id);
    },

    async saveReview(card, entry) {
      const stored: StoredReviewLog = { id: randomUUID(), ...entry };
      cards.set(card.id, { ...card });
      logs.push(stored);
      return { ...stored };
    },

    async listReviewLogs(filter = {}) {
      const since = filter.since?.getTime();
      return logs
        .filter(log =>
          (filter.cardId === undefined || log.card_id === filter.cardId) &&
          (since === undefined || Date.parse(log.reviewed_at) >= since)
        )
        .map(log => ({ ...log }));
    },
  };
}
