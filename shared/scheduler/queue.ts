import { CardCounts, CardSchedule, CardState } from './types';
import { isDueAt, toTime } from './time';

export const DEFAULT_QUEUE_LIMIT = 20;

// Lower tier is studied first
function priorityTier(state: CardState): number {
  switch (state) {
    case CardState.LEARNING:
    case CardState.RELEARNING:
      return 0; // Time-sensitive, short intervals
    case CardState.NEW:
      return 1;
    case CardState.REVIEW:
      return 2;
  }
}

/**
 * Select the cards due at `now`, ordered for a review session:
 * learning/relearning first, then new, then review; ties by earliest due date,
 * then input order. Input cards are not mutated.
 */
export function selectDueCards<T extends CardSchedule>(
  cards: readonly T[],
  now: Date = new Date(),
  limit: number = DEFAULT_QUEUE_LIMIT
): T[] {
  const max = Number.isFinite(limit) ? Math.max(0, Math.floor(limit)) : DEFAULT_QUEUE_LIMIT;

  return cards
    .map((card, index) => ({ card, index, tier: priorityTier(card.state), due: toTime(card.due_at) }))
    .filter(entry => entry.due <= now.getTime())
    .sort((a, b) => a.tier - b.tier || a.due - b.due || a.index - b.index)
    .slice(0, max)
    .map(entry => entry.card);
}

/**
 * Count new, learning-due and review-due cards in one pass.
 * Cards matching none (e.g. review cards not yet due) are not counted.
 */
export function getCardCounts(cards: readonly CardSchedule[], now: Date = new Date()): CardCounts {
  const counts: CardCounts = { new: 0, learning: 0, due: 0 };

  for (const card of cards) {
    if (card.state === CardState.NEW) {
      if (card.repetitions === 0) {
        counts.new++;
      }
    } else if (card.state === CardState.LEARNING || card.state === CardState.RELEARNING) {
      if (isDueAt(card.due_at, now)) {
        counts.learning++;
      }
    } else if (isDueAt(card.due_at, now)) {
      counts.due++;
    }
  }

  return counts;
}
