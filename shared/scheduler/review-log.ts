import { CardSchedule, Quality, ReviewLogEntry, ReviewOutcome } from './types';
import { dayKey, toTime } from './time';

/**
 * Build the log entry for a review. The caller appends it alongside the
 * outcome; entries are never updated afterwards.
 */
export function createReviewLogEntry(
  card: CardSchedule & { id: string },
  outcome: ReviewOutcome,
  quality: Quality,
  reviewedAt: Date = new Date(),
  responseTimeSeconds?: number
): ReviewLogEntry {
  return Object.freeze({
    card_id: card.id,
    reviewed_at: reviewedAt.toISOString(),
    quality,
    previous_interval: card.interval,
    new_interval: outcome.interval,
    previous_ease_factor: card.ease_factor,
    new_ease_factor: outcome.ease_factor,
    response_time_seconds: responseTimeSeconds ?? null,
  });
}

// Again and Hard count as failed recalls
export function isFailure(quality: Quality): boolean {
  return quality < Quality.GOOD;
}

/**
 * Share of reviews rated Good or Easy. 0 when there are none.
 */
export function retentionRate(logs: readonly ReviewLogEntry[]): number {
  if (logs.length === 0) {
    return 0;
  }
  const successful = logs.filter(log => !isFailure(log.quality)).length;
  return successful / logs.length;
}

/**
 * Entries reviewed at or after `since`.
 */
export function logsSince(logs: readonly ReviewLogEntry[], since: Date): ReviewLogEntry[] {
  const cutoff = since.getTime();
  return logs.filter(log => toTime(log.reviewed_at) >= cutoff);
}

// Reviews on the same UTC calendar day as `day`
export function countReviewsOnDay(logs: readonly ReviewLogEntry[], day: Date = new Date()): number {
  const key = dayKey(day);
  return logs.filter(log => dayKey(new Date(toTime(log.reviewed_at))) === key).length;
}
