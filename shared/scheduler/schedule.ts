/**
 * SM-2 Scheduler with Learning Steps
 *
 * Pure, deterministic scheduling: the same card, rating, config and `now`
 * always produce the same outcome. Nothing here reads or writes shared state,
 * so independent cards can be scheduled concurrently.
 *
 * NEW and LEARNING cards walk the learning steps (minutes) until they
 * graduate to REVIEW (days). A failed REVIEW card lapses into RELEARNING.
 */

import {
  Card,
  CardContent,
  CardSchedule,
  CardState,
  IntervalUnit,
  MasteryLevel,
  Quality,
  ReviewOutcome,
  SchedulerConfig,
} from './types';
import {
  DEFAULT_SCHEDULER_CONFIG,
  EASY_BONUS,
  EASY_INTERVAL,
  GRADUATING_INTERVAL,
  HARD_MULTIPLIER,
  LEARNING_STEPS,
  MAXIMUM_EASE,
  MAXIMUM_INTERVAL,
  MINIMUM_EASE,
  RELEARNING_STEPS,
  STARTING_EASE,
} from './config';
import { addDays, addMinutes } from './time';

interface Transition {
  state: CardState;
  interval: number;
  step: number;
}

// ============ Helpers ============

/**
 * Unit of `interval` for a card in the given state.
 */
export function intervalUnit(state: CardState): IntervalUnit {
  return state === CardState.LEARNING || state === CardState.RELEARNING ? 'minutes' : 'days';
}

/**
 * Clamp a stored step index into the step table. Steps persisted under an
 * older, longer table are valid input.
 */
function clampStep(step: number, steps: readonly number[]): number {
  if (!Number.isFinite(step) || step < 0) {
    return 0;
  }
  return Math.min(Math.floor(step), steps.length - 1);
}

function clampEase(easeFactor: number): number {
  return Math.max(MINIMUM_EASE, Math.min(MAXIMUM_EASE, easeFactor));
}

// Values no transition can use are replaced, never rejected
function sanitizeSchedule(card: CardSchedule): CardSchedule {
  return {
    ...card,
    interval: Number.isFinite(card.interval) && card.interval >= 0 ? card.interval : 0,
    ease_factor: Number.isFinite(card.ease_factor) ? card.ease_factor : STARTING_EASE,
    repetitions: Number.isFinite(card.repetitions) && card.repetitions >= 0 ? card.repetitions : 0,
  };
}

function effectiveModifier(config: SchedulerConfig): number {
  const modifier = config.interval_modifier;
  return Number.isFinite(modifier) && modifier > 0 ? modifier : DEFAULT_SCHEDULER_CONFIG.interval_modifier;
}

// ============ Per-state Transitions ============

function scheduleLearning(currentStep: number, quality: Quality): Transition & { graduated: boolean } {
  const step = clampStep(currentStep, LEARNING_STEPS);
  const lastStep = LEARNING_STEPS.length - 1;

  switch (quality) {
    case Quality.AGAIN: // Back to the first step
      return { state: CardState.LEARNING, interval: LEARNING_STEPS[0], step: 0, graduated: false };

    case Quality.HARD: // Repeat the current step
      return { state: CardState.LEARNING, interval: LEARNING_STEPS[step], step, graduated: false };

    case Quality.GOOD:
      if (step >= lastStep) {
        return { state: CardState.REVIEW, interval: GRADUATING_INTERVAL, step, graduated: true };
      }
      return { state: CardState.LEARNING, interval: LEARNING_STEPS[step + 1], step: step + 1, graduated: false };

    case Quality.EASY: // Skip the remaining steps
      return { state: CardState.REVIEW, interval: EASY_INTERVAL, step, graduated: true };
  }
}

const REVIEW_EASE_DELTA: Record<Quality, number> = {
  [Quality.AGAIN]: -0.2,
  [Quality.HARD]: -0.15,
  [Quality.GOOD]: 0,
  [Quality.EASY]: 0.15,
};

function scheduleReview(
  currentInterval: number,
  easeFactor: number,
  quality: Quality,
  modifier: number
): Omit<Transition, 'step'> & { easeFactor: number } {
  // Floored only: an Easy on a card at the ceiling grows with the raised ease,
  // the result is clamped afterwards
  const newEase = Math.max(MINIMUM_EASE, easeFactor + REVIEW_EASE_DELTA[quality]);

  switch (quality) {
    case Quality.AGAIN: // Lapse
      return { state: CardState.RELEARNING, interval: RELEARNING_STEPS[0], easeFactor: newEase };

    case Quality.HARD:
      return {
        state: CardState.REVIEW,
        interval: Math.max(1, Math.floor(currentInterval * HARD_MULTIPLIER * modifier)),
        easeFactor: newEase,
      };

    case Quality.GOOD:
      return {
        state: CardState.REVIEW,
        interval: Math.max(1, Math.floor(currentInterval * newEase * modifier)),
        easeFactor: newEase,
      };

    case Quality.EASY:
      return {
        state: CardState.REVIEW,
        interval: Math.max(1, Math.floor(currentInterval * newEase * EASY_BONUS * modifier)),
        easeFactor: newEase,
      };
  }
}

function scheduleRelearning(previousInterval: number, quality: Quality): Transition {
  switch (quality) {
    case Quality.AGAIN:
      return { state: CardState.RELEARNING, interval: RELEARNING_STEPS[0], step: 0 };

    case Quality.HARD:
      return { state: CardState.RELEARNING, interval: RELEARNING_STEPS[0] * 2, step: 0 };

    case Quality.GOOD:
    case Quality.EASY:
      // Back to review at half the stored interval
      return { state: CardState.REVIEW, interval: Math.max(1, Math.floor(previousInterval / 2)), step: 0 };
  }
}

// ============ Main Scheduling Function ============

type RawOutcome = Omit<ReviewOutcome, 'interval_unit' | 'due_at'>;

function transition(card: CardSchedule, quality: Quality, config: SchedulerConfig): RawOutcome {
  switch (card.state) {
    case CardState.NEW:
    case CardState.LEARNING: {
      const result = scheduleLearning(card.learning_step, quality);
      return {
        state: result.state,
        learning_step: result.step,
        interval: result.interval,
        ease_factor: card.ease_factor,
        repetitions: result.graduated ? 1 : card.repetitions,
      };
    }

    case CardState.REVIEW: {
      const result = scheduleReview(card.interval, card.ease_factor, quality, effectiveModifier(config));
      return {
        state: result.state,
        learning_step: result.state === CardState.RELEARNING ? 0 : card.learning_step,
        interval: result.interval,
        ease_factor: result.easeFactor,
        // A lapse keeps the count; it is not reset either
        repetitions: quality === Quality.AGAIN ? card.repetitions : card.repetitions + 1,
      };
    }

    case CardState.RELEARNING: {
      const result = scheduleRelearning(card.interval, quality);
      return {
        state: result.state,
        learning_step: result.step,
        interval: result.interval,
        ease_factor: card.ease_factor,
        repetitions: card.repetitions,
      };
    }
  }
}

/**
 * Compute the next scheduling state for a card rated with `quality`.
 *
 * Total over every state and rating: malformed stored values are clamped,
 * never rejected. LEARNING/RELEARNING intervals are added to `now` as
 * minutes, REVIEW intervals as days.
 */
export function computeOutcome(
  card: CardSchedule,
  quality: Quality,
  config: SchedulerConfig = DEFAULT_SCHEDULER_CONFIG,
  now: Date = new Date()
): ReviewOutcome {
  const raw = transition(sanitizeSchedule(card), quality, config);
  const interval = raw.state === CardState.REVIEW ? Math.min(raw.interval, MAXIMUM_INTERVAL) : raw.interval;
  const unit = intervalUnit(raw.state);
  const dueAt = unit === 'minutes' ? addMinutes(now, interval) : addDays(now, interval);

  return {
    ...raw,
    interval,
    interval_unit: unit,
    ease_factor: clampEase(raw.ease_factor),
    due_at: dueAt.toISOString(),
  };
}

// ============ Card Lifecycle ============

/**
 * Scheduling fields of a card that has never been reviewed.
 */
export function initialSchedule(now: Date = new Date()): CardSchedule {
  return {
    state: CardState.NEW,
    learning_step: 0,
    interval: 0,
    ease_factor: STARTING_EASE,
    repetitions: 0,
    due_at: now.toISOString(),
  };
}

export function createCard(id: string, content: CardContent, now: Date = new Date()): Card {
  const timestamp = now.toISOString();
  return {
    id,
    front: content.front,
    back: content.back,
    topic: content.topic ?? null,
    source_page: content.source_page ?? null,
    created_at: timestamp,
    updated_at: timestamp,
    ...initialSchedule(now),
  };
}

/**
 * Apply an outcome to a card. Returns a new card; the input is untouched.
 */
export function applyOutcome(card: Card, outcome: ReviewOutcome, now: Date = new Date()): Card {
  return {
    ...card,
    state: outcome.state,
    learning_step: outcome.learning_step,
    interval: outcome.interval,
    ease_factor: outcome.ease_factor,
    repetitions: outcome.repetitions,
    due_at: outcome.due_at,
    updated_at: now.toISOString(),
  };
}

/**
 * Forget all progress, keeping the card's content.
 */
export function resetCard(card: Card, now: Date = new Date()): Card {
  return {
    ...card,
    ...initialSchedule(now),
    updated_at: now.toISOString(),
  };
}

export function getMasteryLevel(card: CardSchedule): MasteryLevel {
  switch (card.state) {
    case CardState.NEW:
      return 'new';
    case CardState.LEARNING:
    case CardState.RELEARNING:
      return 'learning';
    case CardState.REVIEW:
      if (card.repetitions >= 6) return 'mastered';
      if (card.repetitions >= 3) return 'reviewing';
      return 'learning';
  }
}
