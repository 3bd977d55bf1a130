import dotenv from 'dotenv';
import { z } from 'zod';

dotenv.config();

export type UnknownAvailabilityPolicy = 'available' | 'conflict';

export interface WorkingHours {
  /** `HH:mm` */
  start: string;
  /** `HH:mm` */
  end: string;
}

export interface SchedulingConfig {
  workingHours: WorkingHours;
  slotIncrementMinutes: number;
  /** How an `unknown` participant status counts during slot acceptance */
  unknownAvailability: UnknownAvailabilityPolicy;
  conflictHorizonDays: number;
  changeTimeHorizonDays: number;
  defaultDurationMinutes: number;
}

const clockTime = z
  .string()
  .regex(/^([01]\d|2[0-3]):[0-5]\d$/, 'must be HH:mm (24h)');

const positiveInt = z.coerce.number().int().positive();

const EnvSchema = z
  .object({
    WORKDAY_START: clockTime.default('09:00'),
    WORKDAY_END: clockTime.default('17:00'),
    SLOT_INCREMENT_MINUTES: positiveInt.default(30),
    UNKNOWN_AVAILABILITY: z.enum(['available', 'conflict']).default('available'),
    CONFLICT_HORIZON_DAYS: positiveInt.default(2),
    CHANGE_TIME_HORIZON_DAYS: positiveInt.default(3),
    DEFAULT_DURATION_MINUTES: positiveInt.default(60),
  })
  .refine(env => env.WORKDAY_START < env.WORKDAY_END, {
    message: 'WORKDAY_START must be earlier than WORKDAY_END',
    path: ['WORKDAY_END'],
  });

/**
 * Build the scheduling config from environment variables.
 * Throws on invalid values so misconfiguration fails at startup.
 */
export function loadSchedulingConfig(
  env: Record<string, string | undefined> = process.env
): SchedulingConfig {
  const result = EnvSchema.safeParse(env);

  if (!result.success) {
    const issues = result.error.issues
      .map(issue => `${issue.path.join('.') || 'env'}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid scheduling configuration: ${issues}`);
  }

  const parsed = result.data;
  return {
    workingHours: { start: parsed.WORKDAY_START, end: parsed.WORKDAY_END },
    slotIncrementMinutes: parsed.SLOT_INCREMENT_MINUTES,
    unknownAvailability: parsed.UNKNOWN_AVAILABILITY,
    conflictHorizonDays: parsed.CONFLICT_HORIZON_DAYS,
    changeTimeHorizonDays: parsed.CHANGE_TIME_HORIZON_DAYS,
    defaultDurationMinutes: parsed.DEFAULT_DURATION_MINUTES,
  };
}

export const DEFAULT_SCHEDULING_CONFIG: SchedulingConfig = loadSchedulingConfig({});
