import type {
  Card,
  CardCounts,
  MasteryLevel,
  ReviewLogEntry,
  ReviewOutcome,
  SchedulerConfig,
} from '@recall-scheduler/shared/scheduler';

// Worker settings, read from the environment at start-up
export interface WorkerConfig {
  port: number;
  scheduler: SchedulerConfig;
  queue_limit: number;
  weak_area_window_days: number;
}

// Review log entry as persisted
export interface StoredReviewLog extends ReviewLogEntry {
  id: string;
}

export interface ReviewResult {
  card: Card;
  outcome: ReviewOutcome;
  review: StoredReviewLog;
}

export interface StatsOverview {
  total_cards: number;
  counts: CardCounts;
  mastery: Record<MasteryLevel, number>;
  retention_rate: number;
  reviews_today: number;
}
