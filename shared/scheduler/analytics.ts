/**
 * Weak-area detection and study recommendations.
 *
 * Read-only views recomputed from cards and review logs on demand. Nothing
 * here is authoritative scheduling state.
 */

import {
  Card,
  CardRecommendation,
  FocusArea,
  ReviewLogEntry,
  ReviewPriority,
  Severity,
  StudyPlan,
  WeakArea,
} from './types';
import { isFailure, logsSince } from './review-log';
import { addDays, dayKey, toTime } from './time';

export const DEFAULT_WEAK_AREA_WINDOW_DAYS = 30;
export const RECENT_PERFORMANCE_DAYS = 7;
export const DEFAULT_RECOMMENDATION_LIMIT = 30;

const WEAK_FAILURE_RATE = 0.2;
const WEAK_FAILURE_COUNT = 3;
const STRUGGLING_FAILURE_RATE = 0.3;
const EXTRA_PRACTICE_FAILURE_RATE = 0.5;

const MAX_FOCUS_AREAS = 5;
const SECONDS_PER_CARD = 30;

type CardTopic = Pick<Card, 'id' | 'topic'>;

// ============ Weak Areas ============

export function severityFor(failureRate: number): Severity {
  if (failureRate >= 0.5) return 'high';
  if (failureRate >= 0.3) return 'medium';
  return 'low';
}

interface TopicPerformance {
  failures: number;
  total: number;
  responseTimes: number[];
  cardIds: Set<string>;
  lastReview: number | null;
}

/**
 * Group the last `windowDays` of reviews by card topic and keep the topics
 * that fail more than 20% of the time, or at least three times.
 * Sorted by failure rate, highest first.
 *
 * Reviews of unknown cards, or of cards without a topic, are skipped.
 */
export function getWeakAreas(
  logs: readonly ReviewLogEntry[],
  cards: readonly CardTopic[],
  windowDays: number = DEFAULT_WEAK_AREA_WINDOW_DAYS,
  now: Date = new Date()
): WeakArea[] {
  const topicByCard = new Map<string, string>();
  for (const card of cards) {
    if (card.topic) {
      topicByCard.set(card.id, card.topic);
    }
  }

  const performance = new Map<string, TopicPerformance>();

  for (const log of logsSince(logs, addDays(now, -windowDays))) {
    const topic = topicByCard.get(log.card_id);
    if (!topic) continue;

    let current = performance.get(topic);
    if (!current) {
      current = { failures: 0, total: 0, responseTimes: [], cardIds: new Set(), lastReview: null };
      performance.set(topic, current);
    }

    const reviewedAt = toTime(log.reviewed_at);
    current.total += 1;
    if (isFailure(log.quality)) {
      current.failures += 1;
    }
    if (log.response_time_seconds !== null) {
      current.responseTimes.push(log.response_time_seconds);
    }
    current.cardIds.add(log.card_id);
    if (current.lastReview === null || reviewedAt > current.lastReview) {
      current.lastReview = reviewedAt;
    }
  }

  const weakAreas: WeakArea[] = [];

  for (const [topic, perf] of performance) {
    const failureRate = perf.failures / perf.total;
    if (!(failureRate > WEAK_FAILURE_RATE || perf.failures >= WEAK_FAILURE_COUNT)) continue;

    const averageResponseTime = perf.responseTimes.length === 0
      ? 0
      : perf.responseTimes.reduce((sum, t) => sum + t, 0) / perf.responseTimes.length;

    weakAreas.push({
      topic,
      failure_rate: failureRate,
      average_response_time: averageResponseTime,
      review_count: perf.total,
      card_count: perf.cardIds.size,
      last_review_date: perf.lastReview === null ? null : new Date(perf.lastReview).toISOString(),
      severity: severityFor(failureRate),
    });
  }

  return weakAreas.sort((a, b) => b.failure_rate - a.failure_rate);
}

// ============ Card Recommendations ============

/**
 * Recommend a single card, or return null when it needs no attention.
 * `reviews` are that card's reviews; only the last week counts.
 */
export function recommendCard(
  card: Pick<Card, 'id' | 'topic' | 'due_at'>,
  reviews: readonly ReviewLogEntry[],
  now: Date = new Date()
): CardRecommendation | null {
  const due = toTime(card.due_at);
  const isDue = due <= now.getTime();
  const isOverdue = due < addDays(now, -1).getTime();

  // Strictly inside the last week
  const cutoff = addDays(now, -RECENT_PERFORMANCE_DAYS).getTime();
  const recent = reviews.filter(log => toTime(log.reviewed_at) > cutoff);
  const failureRate = recent.length === 0
    ? 0
    : recent.filter(log => isFailure(log.quality)).length / recent.length;

  let priority: ReviewPriority;
  let reason: string;

  if (isOverdue && failureRate > STRUGGLING_FAILURE_RATE) {
    priority = ReviewPriority.CRITICAL;
    reason = 'Overdue with low retention - needs immediate review';
  } else if (isOverdue) {
    priority = ReviewPriority.HIGH;
    reason = 'Overdue - schedule was missed';
  } else if (isDue && failureRate > STRUGGLING_FAILURE_RATE) {
    priority = ReviewPriority.HIGH;
    reason = 'Due today with recent struggles';
  } else if (isDue) {
    priority = ReviewPriority.NORMAL;
    reason = 'Scheduled for review today';
  } else if (failureRate > EXTRA_PRACTICE_FAILURE_RATE) {
    priority = ReviewPriority.OPTIONAL;
    reason = 'Consider extra practice - challenging material';
  } else {
    return null;
  }

  return { card_id: card.id, priority, reason, topic: card.topic };
}

/**
 * Recommendations for every card that needs attention, most urgent first.
 */
export function recommendCards(
  cards: readonly Pick<Card, 'id' | 'topic' | 'due_at'>[],
  logs: readonly ReviewLogEntry[],
  now: Date = new Date(),
  limit: number = DEFAULT_RECOMMENDATION_LIMIT
): CardRecommendation[] {
  const reviewsByCard = new Map<string, ReviewLogEntry[]>();
  for (const log of logs) {
    const list = reviewsByCard.get(log.card_id);
    if (list) {
      list.push(log);
    } else {
      reviewsByCard.set(log.card_id, [log]);
    }
  }

  const recommendations: CardRecommendation[] = [];
  for (const card of cards) {
    const recommendation = recommendCard(card, reviewsByCard.get(card.id) ?? [], now);
    if (recommendation) {
      recommendations.push(recommendation);
    }
  }

  return recommendations
    .sort((a, b) => b.priority - a.priority)
    .slice(0, Math.max(0, limit));
}

// ============ Study Plan ============

export function getFocusAreas(weakAreas: readonly WeakArea[]): FocusArea[] {
  return weakAreas.slice(0, MAX_FOCUS_AREAS).map(area => ({
    topic: area.topic,
    retention_rate: 1 - area.failure_rate,
    reviews_needed: Math.max(3, Math.floor(area.failure_rate * 10)),
  }));
}

/**
 * Today's plan: recommended cards, weak areas and an estimated duration.
 */
export function buildStudyPlan(
  cards: readonly Card[],
  logs: readonly ReviewLogEntry[],
  now: Date = new Date(),
  windowDays: number = DEFAULT_WEAK_AREA_WINDOW_DAYS
): StudyPlan {
  const recommendations = recommendCards(cards, logs, now);
  const weakAreas = getWeakAreas(logs, cards, windowDays, now);
  const minutes = (recommendations.length * SECONDS_PER_CARD) / 60;

  return {
    date: dayKey(now),
    recommendations,
    weak_areas: weakAreas,
    focus_areas: getFocusAreas(weakAreas),
    estimated_minutes: Math.ceil(minutes),
  };
}
