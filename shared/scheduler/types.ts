// ============ Types ============

// Card state - a card is in exactly one of these at a time
export enum CardState {
  NEW = 'new',
  LEARNING = 'learning',
  REVIEW = 'review',
  RELEARNING = 'relearning',
}

// Recall rating supplied by the user
export enum Quality {
  AGAIN = 0,
  HARD = 1,
  GOOD = 2,
  EASY = 3,
}

export const ALL_QUALITIES: readonly Quality[] = [
  Quality.AGAIN,
  Quality.HARD,
  Quality.GOOD,
  Quality.EASY,
];

export type IntervalUnit = 'minutes' | 'days';

/**
 * The six persisted scheduling fields of a card.
 *
 * `interval` is in minutes while the card is LEARNING or RELEARNING and in
 * days while it is REVIEW. Use `intervalUnit()` rather than guessing.
 */
export interface CardSchedule {
  state: CardState;
  learning_step: number;
  interval: number;
  ease_factor: number;
  repetitions: number;
  due_at: string; // ISO timestamp
}

export interface Card extends CardSchedule {
  id: string;
  front: string;
  back: string;
  topic: string | null;         // Source material (book, chapter, ...)
  source_page: number | null;
  created_at: string;
  updated_at: string;
}

export interface CardContent {
  front: string;
  back: string;
  topic?: string | null;
  source_page?: number | null;
}

export interface SchedulerConfig {
  interval_modifier: number;    // Multiplier on REVIEW interval growth, default 1.0
}

export interface ReviewOutcome {
  state: CardState;
  learning_step: number;
  interval: number;
  interval_unit: IntervalUnit;
  ease_factor: number;
  repetitions: number;
  due_at: string;
}

/**
 * Immutable record of one review. Append-only.
 */
export interface ReviewLogEntry {
  card_id: string;
  reviewed_at: string;
  quality: Quality;
  previous_interval: number;
  new_interval: number;
  previous_ease_factor: number;
  new_ease_factor: number;
  response_time_seconds: number | null;
}

export interface CardCounts {
  new: number;
  learning: number;
  due: number;
}

export type IntervalPreviews = Record<Quality, string>;

export type MasteryLevel = 'new' | 'learning' | 'reviewing' | 'mastered';

export type Severity = 'low' | 'medium' | 'high';

export interface WeakArea {
  topic: string;
  failure_rate: number;
  average_response_time: number; // seconds, 0 when no samples
  review_count: number;
  card_count: number;            // distinct cards reviewed in the window
  last_review_date: string | null;
  severity: Severity;
}

export enum ReviewPriority {
  OPTIONAL = 0,   // Not due, but good to review
  NORMAL = 1,     // Due today
  HIGH = 2,       // Due with recent struggles, or overdue
  CRITICAL = 3,   // Overdue with low retention
}

export interface CardRecommendation {
  card_id: string;
  priority: ReviewPriority;
  reason: string;
  topic: string | null;
}

export interface FocusArea {
  topic: string;
  retention_rate: number;
  reviews_needed: number;
}

export interface StudyPlan {
  date: string;
  recommendations: CardRecommendation[];
  weak_areas: WeakArea[];
  focus_areas: FocusArea[];
  estimated_minutes: number;
}
