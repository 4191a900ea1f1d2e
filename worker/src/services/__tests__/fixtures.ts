import { Card, CardState, Quality } from '@recall-scheduler/shared/scheduler';
import { StoredReviewLog } from '../../types';

let logCounter = 0;

export function createTestCard(overrides: Partial<Card> = {}): Card {
  return {
    id: 'card-1',
    front: 'Front',
    back: 'Back',
    topic: null,
    source_page: null,
    state: CardState.NEW,
    learning_step: 0,
    interval: 0,
    ease_factor: 2.5,
    repetitions: 0,
    due_at: '2024-01-15T10:00:00.000Z',
    created_at: '2024-01-01T00:00:00.000Z',
    updated_at: '2024-01-01T00:00:00.000Z',
    ...overrides,
  };
}

export function createTestLog(overrides: Partial<StoredReviewLog> = {}): StoredReviewLog {
  return {
    id: `log-${++logCounter}`,
    card_id: 'card-1',
    reviewed_at: '2024-01-15T09:00:00.000Z',
    quality: Quality.GOOD,
    previous_interval: 1,
    new_interval: 3,
    previous_ease_factor: 2.5,
    new_ease_factor: 2.5,
    response_time_seconds: null,
    ...overrides,
  };
}
