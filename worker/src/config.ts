import { z } from 'zod';
import {
  DEFAULT_QUEUE_LIMIT,
  DEFAULT_SCHEDULER_CONFIG,
  DEFAULT_WEAK_AREA_WINDOW_DAYS,
} from '@recall-scheduler/shared/scheduler';
import { WorkerConfig } from './types';

const envSchema = z.object({
  PORT: z.coerce.number().int().positive().default(8787),
  INTERVAL_MODIFIER: z.coerce.number().finite().positive().default(DEFAULT_SCHEDULER_CONFIG.interval_modifier),
  QUEUE_LIMIT: z.coerce.number().int().positive().default(DEFAULT_QUEUE_LIMIT),
  WEAK_AREA_WINDOW_DAYS: z.coerce.number().int().positive().default(DEFAULT_WEAK_AREA_WINDOW_DAYS),
});

export const DEFAULT_WORKER_CONFIG: WorkerConfig = {
  port: 8787,
  scheduler: DEFAULT_SCHEDULER_CONFIG,
  queue_limit: DEFAULT_QUEUE_LIMIT,
  weak_area_window_days: DEFAULT_WEAK_AREA_WINDOW_DAYS,
};

/**
 * Read worker settings from environment variables.
 * Throws when a variable is set to an invalid value.
 */
export function loadConfig(env: Record<string, string | undefined> = process.env): WorkerConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const problems = parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`);
    throw new Error(`Invalid configuration - ${problems.join('; ')}`);
  }

  return {
    port: parsed.data.PORT,
    scheduler: { interval_modifier: parsed.data.INTERVAL_MODIFIER },
    queue_limit: parsed.data.QUEUE_LIMIT,
    weak_area_window_days: parsed.data.WEAK_AREA_WINDOW_DAYS,
  };
}
