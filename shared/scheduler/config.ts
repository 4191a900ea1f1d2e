import { z } from 'zod';
import type { SchedulerConfig } from './types';

// ============ Scheduler Constants ============

export const LEARNING_STEPS: readonly number[] = [1, 10];   // minutes
export const RELEARNING_STEPS: readonly number[] = [10];    // minutes
export const GRADUATING_INTERVAL = 1;                       // days
export const EASY_INTERVAL = 4;                             // days

export const STARTING_EASE = 2.5;
export const MINIMUM_EASE = 1.3;
export const MAXIMUM_EASE = 2.5;

export const MAXIMUM_INTERVAL = 365;                        // days

export const HARD_MULTIPLIER = 1.2;
export const EASY_BONUS = 1.3;

export const DEFAULT_SCHEDULER_CONFIG: SchedulerConfig = {
  interval_modifier: 1.0,
};

// ============ Validation ============

export const schedulerConfigSchema = z.object({
  interval_modifier: z.number().finite().positive().default(DEFAULT_SCHEDULER_CONFIG.interval_modifier),
});

/**
 * Validate user-supplied scheduler settings, filling in defaults.
 * Throws a ZodError when a value is out of range.
 */
export function parseSchedulerConfig(input: unknown): SchedulerConfig {
  return schedulerConfigSchema.parse(input ?? {});
}
