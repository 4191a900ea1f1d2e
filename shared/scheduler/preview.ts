import { ALL_QUALITIES, CardSchedule, IntervalPreviews, IntervalUnit, Quality, SchedulerConfig } from './types';
import { DEFAULT_SCHEDULER_CONFIG } from './config';
import { computeOutcome } from './schedule';

/**
 * Format an interval for display on a rating button.
 * Whole units only: 90 minutes shows as "1h", 59 days as "1mo".
 */
export function formatInterval(interval: number, unit: IntervalUnit): string {
  if (unit === 'minutes') {
    if (interval < 60) {
      return `${interval}m`;
    }
    return `${Math.floor(interval / 60)}h`;
  }

  if (interval === 1) {
    return '1d';
  }
  if (interval < 30) {
    return `${interval}d`;
  }
  if (interval < 365) {
    return `${Math.floor(interval / 30)}mo`;
  }
  return `${Math.floor(interval / 365)}y`;
}

/**
 * Preview the next interval for every rating without changing the card.
 */
export function getIntervalPreviews(
  card: CardSchedule,
  config: SchedulerConfig = DEFAULT_SCHEDULER_CONFIG,
  now: Date = new Date()
): IntervalPreviews {
  const previews: IntervalPreviews = {
    [Quality.AGAIN]: '',
    [Quality.HARD]: '',
    [Quality.GOOD]: '',
    [Quality.EASY]: '',
  };

  for (const quality of ALL_QUALITIES) {
    const outcome = computeOutcome(card, quality, config, now);
    previews[quality] = formatInterval(outcome.interval, outcome.interval_unit);
  }

  return previews;
}
