import {
  MasteryLevel,
  StudyPlan,
  WeakArea,
  addDays,
  buildStudyPlan,
  countReviewsOnDay,
  getCardCounts,
  getMasteryLevel,
  getWeakAreas,
  retentionRate,
} from '@recall-scheduler/shared/scheduler';
import { CardStore } from '../db/store';
import { StatsOverview } from '../types';

function windowStart(now: Date, days: number): Date {
  return addDays(now, -days);
}

/**
 * Collection-wide numbers for a dashboard. Retention covers the window.
 */
export async function getOverview(
  store: CardStore,
  windowDays: number,
  now: Date = new Date()
): Promise<StatsOverview> {
  const cards = await store.listCards();
  const logs = await store.listReviewLogs({ since: windowStart(now, windowDays) });

  const mastery: Record<MasteryLevel, number> = { new: 0, learning: 0, reviewing: 0, mastered: 0 };
  for (const card of cards) {
    mastery[getMasteryLevel(card)]++;
  }

  return {
    total_cards: cards.length,
    counts: getCardCounts(cards, now),
    mastery,
    retention_rate: retentionRate(logs),
    reviews_today: countReviewsOnDay(logs, now),
  };
}

export async function getTopicWeakAreas(
  store: CardStore,
  windowDays: number,
  now: Date = new Date()
): Promise<WeakArea[]> {
  const cards = await store.listCards();
  const logs = await store.listReviewLogs({ since: windowStart(now, windowDays) });
  return getWeakAreas(logs, cards, windowDays, now);
}

export async function getStudyPlan(
  store: CardStore,
  windowDays: number,
  now: Date = new Date()
): Promise<StudyPlan> {
  const cards = await store.listCards();
  const logs = await store.listReviewLogs({ since: windowStart(now, windowDays) });
  const plan = buildStudyPlan(cards, logs, now, windowDays);

  console.log('[Stats] Built study plan', {
    date: plan.date,
    recommendations: plan.recommendations.length,
    weak_areas: plan.weak_areas.length,
  });

  return plan;
}
