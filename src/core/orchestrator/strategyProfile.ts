import { z } from 'zod';
import { AppError } from '../../shared/errors/app-error';
import type { StrategyMode, StrategyProfile } from './agent-types';

/** Hard ceiling on plan length regardless of profile. */
export const MAX_PLAN_STEPS = 20;

const profileSchema = z.object({
  name: z.string().trim().min(1).max(64),
  mode: z.enum(['CONSERVATIVE', 'EXPLORATORY', 'FALLBACK']),
  maxSteps: z.number().int().min(1).max(MAX_PLAN_STEPS),
  maxRetriesPerStep: z.number().int().min(0).max(5),
  maxPlanRewrites: z.number().int().min(0).max(10),
  strategyTimeoutMs: z.number().int().min(1).max(120_000),
});

/**
 * Validate and freeze a custom strategy profile.
 *
 * @throws AppError CONFIG_INVALID when a limit is out of range.
 */
export function defineStrategyProfile(input: StrategyProfile): StrategyProfile {
  const parsed = profileSchema.safeParse(input);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new AppError('CONFIG_INVALID', `Invalid strategy profile "${input.name}": ${issues.join('; ')}`, parsed.error);
  }
  return Object.freeze({ ...parsed.data });
}

export const CONSERVATIVE_PROFILE = defineStrategyProfile({
  name: 'conservative',
  mode: 'CONSERVATIVE',
  maxSteps: 5,
  maxRetriesPerStep: 2,
  maxPlanRewrites: 1,
  strategyTimeoutMs: 20_000,
});

export const EXPLORATORY_PROFILE = defineStrategyProfile({
  name: 'exploratory',
  mode: 'EXPLORATORY',
  maxSteps: 15,
  maxRetriesPerStep: 3,
  maxPlanRewrites: 3,
  strategyTimeoutMs: 15_000,
});

export const FALLBACK_PROFILE = defineStrategyProfile({
  name: 'fallback',
  mode: 'FALLBACK',
  maxSteps: 10,
  maxRetriesPerStep: 4,
  maxPlanRewrites: 2,
  strategyTimeoutMs: 20_000,
});

const BUILT_IN_PROFILES: Record<StrategyMode, StrategyProfile> = {
  CONSERVATIVE: CONSERVATIVE_PROFILE,
  EXPLORATORY: EXPLORATORY_PROFILE,
  FALLBACK: FALLBACK_PROFILE,
};

const profileNameSchema = z.string().trim().toUpperCase().pipe(z.enum(['CONSERVATIVE', 'EXPLORATORY', 'FALLBACK']));

/**
 * Resolve a built-in profile by name, case-insensitively.
 *
 * @throws AppError CONFIG_INVALID for unknown names.
 */
export function resolveStrategyProfile(name: string): StrategyProfile {
  const parsed = profileNameSchema.safeParse(name);
  if (!parsed.success) {
    throw new AppError(
      'CONFIG_INVALID',
      `Unknown strategy profile "${name}". Expected one of: conservative, exploratory, fallback`,
    );
  }
  return BUILT_IN_PROFILES[parsed.data];
}
