/**
 * Tests for the SM-2 scheduler.
 *
 * `now` is always injected, so every due date below is exact.
 */

import { describe, it, expect } from 'vitest';
import {
  computeOutcome,
  createCard,
  applyOutcome,
  resetCard,
  getMasteryLevel,
  intervalUnit,
  initialSchedule,
} from './schedule';
import { parseSchedulerConfig, DEFAULT_SCHEDULER_CONFIG, MAXIMUM_INTERVAL } from './config';
import { ALL_QUALITIES, CardSchedule, CardState, Quality } from './types';

const NOW = new Date('2024-01-15T10:00:00.000Z');

const schedule = (overrides: Partial<CardSchedule> = {}): CardSchedule => ({
  ...initialSchedule(NOW),
  ...overrides,
});

const reviewCard = schedule({
  state: CardState.REVIEW,
  interval: 10,
  ease_factor: 2.5,
  repetitions: 3,
});

describe('computeOutcome - NEW and LEARNING cards', () => {
  it('Good on a new card advances to the second learning step', () => {
    const outcome = computeOutcome(schedule(), Quality.GOOD, DEFAULT_SCHEDULER_CONFIG, NOW);

    expect(outcome.state).toBe(CardState.LEARNING);
    expect(outcome.learning_step).toBe(1);
    expect(outcome.interval).toBe(10);
    expect(outcome.interval_unit).toBe('minutes');
    expect(outcome.repetitions).toBe(0);
    expect(outcome.ease_factor).toBe(2.5);
    expect(outcome.due_at).toBe('2024-01-15T10:10:00.000Z');
  });

  it('Good on the last learning step graduates to REVIEW', () => {
    const outcome = computeOutcome(
      schedule({ state: CardState.LEARNING, learning_step: 1, interval: 10 }),
      Quality.GOOD,
      DEFAULT_SCHEDULER_CONFIG,
      NOW
    );

    expect(outcome.state).toBe(CardState.REVIEW);
    expect(outcome.interval).toBe(1);
    expect(outcome.interval_unit).toBe('days');
    expect(outcome.repetitions).toBe(1);
    expect(outcome.due_at).toBe('2024-01-16T10:00:00.000Z');
  });

  it('Easy on step 0 graduates immediately with the easy interval', () => {
    const outcome = computeOutcome(schedule(), Quality.EASY, DEFAULT_SCHEDULER_CONFIG, NOW);

    expect(outcome.state).toBe(CardState.REVIEW);
    expect(outcome.interval).toBe(4);
    expect(outcome.repetitions).toBe(1);
    expect(outcome.ease_factor).toBe(2.5);
    expect(outcome.due_at).toBe('2024-01-19T10:00:00.000Z');
  });

  it('Again resets to the first step', () => {
    const outcome = computeOutcome(
      schedule({ state: CardState.LEARNING, learning_step: 1, interval: 10 }),
      Quality.AGAIN,
      DEFAULT_SCHEDULER_CONFIG,
      NOW
    );

    expect(outcome.state).toBe(CardState.LEARNING);
    expect(outcome.learning_step).toBe(0);
    expect(outcome.interval).toBe(1);
    expect(outcome.due_at).toBe('2024-01-15T10:01:00.000Z');
  });

  it('Hard repeats the current step', () => {
    const outcome = computeOutcome(
      schedule({ state: CardState.LEARNING, learning_step: 1, interval: 10 }),
      Quality.HARD,
      DEFAULT_SCHEDULER_CONFIG,
      NOW
    );

    expect(outcome.state).toBe(CardState.LEARNING);
    expect(outcome.learning_step).toBe(1);
    expect(outcome.interval).toBe(10);
  });

  it('clamps a step beyond the step table instead of failing', () => {
    const hard = computeOutcome(
      schedule({ state: CardState.LEARNING, learning_step: 5 }),
      Quality.HARD,
      DEFAULT_SCHEDULER_CONFIG,
      NOW
    );
    expect(hard.learning_step).toBe(1);
    expect(hard.interval).toBe(10);

    const good = computeOutcome(
      schedule({ state: CardState.LEARNING, learning_step: 7 }),
      Quality.GOOD,
      DEFAULT_SCHEDULER_CONFIG,
      NOW
    );
    expect(good.state).toBe(CardState.REVIEW);
    expect(good.interval).toBe(1);
    expect(good.repetitions).toBe(1);
  });

  it('clamps a negative step to the first step', () => {
    const outcome = computeOutcome(
      schedule({ state: CardState.LEARNING, learning_step: -3 }),
      Quality.HARD,
      DEFAULT_SCHEDULER_CONFIG,
      NOW
    );

    expect(outcome.learning_step).toBe(0);
    expect(outcome.interval).toBe(1);
  });
});

describe('computeOutcome - REVIEW cards', () => {
  it('Again lapses into RELEARNING without touching repetitions', () => {
    const outcome = computeOutcome(reviewCard, Quality.AGAIN, DEFAULT_SCHEDULER_CONFIG, NOW);

    expect(outcome.state).toBe(CardState.RELEARNING);
    expect(outcome.learning_step).toBe(0);
    expect(outcome.interval).toBe(10);
    expect(outcome.interval_unit).toBe('minutes');
    expect(outcome.ease_factor).toBeCloseTo(2.3, 10);
    expect(outcome.repetitions).toBe(3);
    expect(outcome.due_at).toBe('2024-01-15T10:10:00.000Z');
  });

  it('Hard multiplies the interval by 1.2 regardless of ease', () => {
    const outcome = computeOutcome(reviewCard, Quality.HARD, DEFAULT_SCHEDULER_CONFIG, NOW);

    expect(outcome.state).toBe(CardState.REVIEW);
    expect(outcome.interval).toBe(12);
    expect(outcome.ease_factor).toBeCloseTo(2.35, 10);
    expect(outcome.repetitions).toBe(4);
    expect(outcome.due_at).toBe('2024-01-27T10:00:00.000Z');
  });

  it('Good multiplies the interval by the ease factor', () => {
    const outcome = computeOutcome(reviewCard, Quality.GOOD, DEFAULT_SCHEDULER_CONFIG, NOW);

    expect(outcome.interval).toBe(25);
    expect(outcome.ease_factor).toBe(2.5);
    expect(outcome.repetitions).toBe(4);
  });

  it('Easy grows with the raised ease and the bonus, then caps the ease', () => {
    // floor(10 * 2.65 * 1.3) = floor(34.45)
    const outcome = computeOutcome(reviewCard, Quality.EASY, DEFAULT_SCHEDULER_CONFIG, NOW);

    expect(outcome.interval).toBe(34);
    expect(outcome.ease_factor).toBe(2.5);
  });

  it('applies the interval modifier to review growth', () => {
    const outcome = computeOutcome(reviewCard, Quality.GOOD, { interval_modifier: 2 }, NOW);
    expect(outcome.interval).toBe(50);
  });

  it('does not apply the interval modifier to learning steps', () => {
    const outcome = computeOutcome(schedule(), Quality.GOOD, { interval_modifier: 2 }, NOW);
    expect(outcome.interval).toBe(10);
  });

  it('falls back to the default modifier when given a non-finite one', () => {
    const outcome = computeOutcome(reviewCard, Quality.GOOD, { interval_modifier: Number.NaN }, NOW);
    expect(outcome.interval).toBe(25);
  });

  it('caps review intervals at the maximum', () => {
    const outcome = computeOutcome(
      { ...reviewCard, interval: 300 },
      Quality.GOOD,
      DEFAULT_SCHEDULER_CONFIG,
      NOW
    );
    expect(outcome.interval).toBe(MAXIMUM_INTERVAL);
  });

  it('keeps the ease factor at its floor', () => {
    const outcome = computeOutcome(
      { ...reviewCard, ease_factor: 1.3 },
      Quality.AGAIN,
      DEFAULT_SCHEDULER_CONFIG,
      NOW
    );
    expect(outcome.ease_factor).toBe(1.3);
  });

  it('gives a zero-interval review card at least one day', () => {
    const outcome = computeOutcome(
      { ...reviewCard, interval: 0 },
      Quality.HARD,
      DEFAULT_SCHEDULER_CONFIG,
      NOW
    );
    expect(outcome.interval).toBe(1);
  });
});

describe('computeOutcome - RELEARNING cards', () => {
  const relearning = schedule({
    state: CardState.RELEARNING,
    interval: 10,
    ease_factor: 2.3,
    repetitions: 3,
  });

  it('Again stays on the relearning step', () => {
    const outcome = computeOutcome(relearning, Quality.AGAIN, DEFAULT_SCHEDULER_CONFIG, NOW);

    expect(outcome.state).toBe(CardState.RELEARNING);
    expect(outcome.interval).toBe(10);
    expect(outcome.due_at).toBe('2024-01-15T10:10:00.000Z');
  });

  it('Hard doubles the relearning step', () => {
    const outcome = computeOutcome(relearning, Quality.HARD, DEFAULT_SCHEDULER_CONFIG, NOW);

    expect(outcome.state).toBe(CardState.RELEARNING);
    expect(outcome.interval).toBe(20);
    expect(outcome.due_at).toBe('2024-01-15T10:20:00.000Z');
  });

  it.each([Quality.GOOD, Quality.EASY])('rating %i returns to REVIEW at half the interval', (quality) => {
    const outcome = computeOutcome(relearning, quality, DEFAULT_SCHEDULER_CONFIG, NOW);

    expect(outcome.state).toBe(CardState.REVIEW);
    expect(outcome.interval).toBe(5);
    expect(outcome.interval_unit).toBe('days');
    expect(outcome.repetitions).toBe(3);
    expect(outcome.ease_factor).toBe(2.3);
    expect(outcome.due_at).toBe('2024-01-20T10:00:00.000Z');
  });

  it('returns at least one day', () => {
    const outcome = computeOutcome({ ...relearning, interval: 1 }, Quality.GOOD, DEFAULT_SCHEDULER_CONFIG, NOW);
    expect(outcome.interval).toBe(1);
  });
});

describe('computeOutcome - invariants', () => {
  const states = [CardState.NEW, CardState.LEARNING, CardState.REVIEW, CardState.RELEARNING];
  const eases = [1.3, 1.45, 2.0, 2.5];
  const intervals = [0, 1, 10, 200, 365];

  it('keeps ease in bounds, caps review intervals and switches units by state', () => {
    for (const state of states) {
      for (const ease_factor of eases) {
        for (const interval of intervals) {
          for (const quality of ALL_QUALITIES) {
            const outcome = computeOutcome(
              schedule({ state, ease_factor, interval, learning_step: 1 }),
              quality,
              { interval_modifier: 1.5 },
              NOW
            );
            const diffMs = new Date(outcome.due_at).getTime() - NOW.getTime();

            expect(outcome.ease_factor).toBeGreaterThanOrEqual(1.3);
            expect(outcome.ease_factor).toBeLessThanOrEqual(2.5);

            if (outcome.state === CardState.REVIEW) {
              expect(outcome.interval).toBeLessThanOrEqual(365);
              expect(diffMs / (24 * 60 * 60 * 1000)).toBe(outcome.interval);
            } else {
              expect(diffMs / (60 * 1000)).toBe(outcome.interval);
            }
          }
        }
      }
    }
  });

  it('does not mutate the input card', () => {
    const card = { ...reviewCard };
    computeOutcome(card, Quality.AGAIN, DEFAULT_SCHEDULER_CONFIG, NOW);
    expect(card).toEqual(reviewCard);
  });

  it('treats a non-finite review interval as zero', () => {
    const outcome = computeOutcome({ ...reviewCard, interval: NaN }, Quality.GOOD, DEFAULT_SCHEDULER_CONFIG, NOW);

    expect(outcome.interval).toBe(1);
    expect(outcome.due_at).toBe('2024-01-16T10:00:00.000Z');
  });

  it('treats a negative review interval as zero', () => {
    const outcome = computeOutcome({ ...reviewCard, interval: -5 }, Quality.HARD, DEFAULT_SCHEDULER_CONFIG, NOW);

    expect(outcome.interval).toBe(1);
  });

  it('replaces a non-finite ease with the starting ease', () => {
    const outcome = computeOutcome({ ...reviewCard, ease_factor: NaN }, Quality.GOOD, DEFAULT_SCHEDULER_CONFIG, NOW);

    expect(outcome.ease_factor).toBe(2.5);
    expect(outcome.interval).toBe(25);
  });

  it('recovers a relearning card with a non-finite interval', () => {
    const card = schedule({ state: CardState.RELEARNING, interval: Infinity });
    const outcome = computeOutcome(card, Quality.GOOD, DEFAULT_SCHEDULER_CONFIG, NOW);

    expect(outcome.state).toBe(CardState.REVIEW);
    expect(outcome.interval).toBe(1);
  });

  it('restarts a non-finite repetition count', () => {
    const outcome = computeOutcome({ ...reviewCard, repetitions: NaN }, Quality.GOOD, DEFAULT_SCHEDULER_CONFIG, NOW);

    expect(outcome.repetitions).toBe(1);
  });

  it('keeps every invariant for malformed stored values', () => {
    const malformed = [NaN, Infinity, -Infinity, -3];
    for (const state of states) {
      for (const value of malformed) {
        for (const quality of ALL_QUALITIES) {
          const outcome = computeOutcome(
            schedule({ state, interval: value, ease_factor: value, learning_step: value }),
            quality,
            DEFAULT_SCHEDULER_CONFIG,
            NOW
          );

          expect(Number.isFinite(outcome.interval)).toBe(true);
          expect(outcome.ease_factor).toBeGreaterThanOrEqual(1.3);
          expect(outcome.ease_factor).toBeLessThanOrEqual(2.5);
          expect(Number.isNaN(Date.parse(outcome.due_at))).toBe(false);
        }
      }
    }
  });
});

describe('review scenario', () => {
  it('new → learning → review → longer review', () => {
    let card = createCard('card-1', { front: 'Q', back: 'A' }, NOW);

    card = applyOutcome(card, computeOutcome(card, Quality.GOOD, DEFAULT_SCHEDULER_CONFIG, NOW), NOW);
    expect(card.state).toBe(CardState.LEARNING);
    expect(card.learning_step).toBe(1);
    expect(card.interval).toBe(10);

    card = applyOutcome(card, computeOutcome(card, Quality.GOOD, DEFAULT_SCHEDULER_CONFIG, NOW), NOW);
    expect(card.state).toBe(CardState.REVIEW);
    expect(card.interval).toBe(1);
    expect(card.repetitions).toBe(1);

    card = applyOutcome(card, computeOutcome(card, Quality.GOOD, DEFAULT_SCHEDULER_CONFIG, NOW), NOW);
    expect(card.state).toBe(CardState.REVIEW);
    expect(card.interval).toBe(2);
    expect(card.repetitions).toBe(2);
    expect(card.due_at).toBe('2024-01-17T10:00:00.000Z');
  });
});

describe('card lifecycle', () => {
  it('creates cards in the NEW state, due now', () => {
    const card = createCard('card-1', { front: 'Q', back: 'A', topic: 'Biology' }, NOW);

    expect(card).toEqual({
      id: 'card-1',
      front: 'Q',
      back: 'A',
      topic: 'Biology',
      source_page: null,
      created_at: '2024-01-15T10:00:00.000Z',
      updated_at: '2024-01-15T10:00:00.000Z',
      state: CardState.NEW,
      learning_step: 0,
      interval: 0,
      ease_factor: 2.5,
      repetitions: 0,
      due_at: '2024-01-15T10:00:00.000Z',
    });
  });

  it('applyOutcome returns a new card and stamps updated_at', () => {
    const card = createCard('card-1', { front: 'Q', back: 'A' }, NOW);
    const later = new Date('2024-01-15T11:00:00.000Z');
    const next = applyOutcome(card, computeOutcome(card, Quality.EASY, DEFAULT_SCHEDULER_CONFIG, later), later);

    expect(next).not.toBe(card);
    expect(card.state).toBe(CardState.NEW);
    expect(next.state).toBe(CardState.REVIEW);
    expect(next.updated_at).toBe('2024-01-15T11:00:00.000Z');
    expect(next.created_at).toBe('2024-01-15T10:00:00.000Z');
  });

  it('resetCard restores the NEW state but keeps content', () => {
    const card = { ...createCard('card-1', { front: 'Q', back: 'A', topic: 'T' }, NOW), ...reviewCard };
    const later = new Date('2024-02-01T00:00:00.000Z');
    const reset = resetCard(card, later);

    expect(reset.state).toBe(CardState.NEW);
    expect(reset.repetitions).toBe(0);
    expect(reset.interval).toBe(0);
    expect(reset.ease_factor).toBe(2.5);
    expect(reset.due_at).toBe('2024-02-01T00:00:00.000Z');
    expect(reset.front).toBe('Q');
    expect(reset.topic).toBe('T');
  });

  it('reports interval units by state', () => {
    expect(intervalUnit(CardState.LEARNING)).toBe('minutes');
    expect(intervalUnit(CardState.RELEARNING)).toBe('minutes');
    expect(intervalUnit(CardState.REVIEW)).toBe('days');
    expect(intervalUnit(CardState.NEW)).toBe('days');
  });

  it('derives mastery from state and repetitions', () => {
    expect(getMasteryLevel(schedule())).toBe('new');
    expect(getMasteryLevel(schedule({ state: CardState.RELEARNING }))).toBe('learning');
    expect(getMasteryLevel({ ...reviewCard, repetitions: 2 })).toBe('learning');
    expect(getMasteryLevel({ ...reviewCard, repetitions: 3 })).toBe('reviewing');
    expect(getMasteryLevel({ ...reviewCard, repetitions: 6 })).toBe('mastered');
  });
});

describe('parseSchedulerConfig', () => {
  it('fills in the default modifier', () => {
    expect(parseSchedulerConfig({})).toEqual({ interval_modifier: 1 });
    expect(parseSchedulerConfig(undefined)).toEqual({ interval_modifier: 1 });
  });

  it('accepts a custom modifier', () => {
    expect(parseSchedulerConfig({ interval_modifier: 0.8 })).toEqual({ interval_modifier: 0.8 });
  });

  it('rejects non-positive modifiers', () => {
    expect(() => parseSchedulerConfig({ interval_modifier: 0 })).toThrow();
    expect(() => parseSchedulerConfig({ interval_modifier: -1 })).toThrow();
  });
});
