/**
 * Shared Scheduler Module - SM-2 with Learning Steps
 *
 * Pure scheduling core: card state transitions, review queue ordering,
 * interval previews, review-log helpers and weak-area analytics.
 * Performs no I/O; persistence and presentation belong to the caller.
 */

export {
  // Types
  CardState,
  Quality,
  ReviewPriority,
  ALL_QUALITIES,
  type Card,
  type CardContent,
  type CardSchedule,
  type CardCounts,
  type CardRecommendation,
  type FocusArea,
  type IntervalPreviews,
  type IntervalUnit,
  type MasteryLevel,
  type ReviewLogEntry,
  type ReviewOutcome,
  type SchedulerConfig,
  type Severity,
  type StudyPlan,
  type WeakArea,
} from './types';

export {
  // Constants & configuration
  LEARNING_STEPS,
  RELEARNING_STEPS,
  GRADUATING_INTERVAL,
  EASY_INTERVAL,
  STARTING_EASE,
  MINIMUM_EASE,
  MAXIMUM_EASE,
  MAXIMUM_INTERVAL,
  DEFAULT_SCHEDULER_CONFIG,
  schedulerConfigSchema,
  parseSchedulerConfig,
} from './config';

export {
  // Core scheduling
  computeOutcome,
  intervalUnit,
  initialSchedule,
  createCard,
  applyOutcome,
  resetCard,
  getMasteryLevel,
} from './schedule';

export {
  // Queue
  DEFAULT_QUEUE_LIMIT,
  selectDueCards,
  getCardCounts,
} from './queue';

export {
  // Previews
  formatInterval,
  getIntervalPreviews,
} from './preview';

export {
  // Review log
  createReviewLogEntry,
  isFailure,
  retentionRate,
  logsSince,
  countReviewsOnDay,
} from './review-log';

export {
  // Time
  addDays,
  addMinutes,
  MS_PER_DAY,
} from './time';

export {
  // Analytics
  DEFAULT_WEAK_AREA_WINDOW_DAYS,
  DEFAULT_RECOMMENDATION_LIMIT,
  severityFor,
  getWeakAreas,
  recommendCard,
  recommendCards,
  getFocusAreas,
  buildStudyPlan,
} from './analytics';
