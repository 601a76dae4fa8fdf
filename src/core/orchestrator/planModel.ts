import { randomUUID } from 'node:crypto';
import { AppError } from '../../shared/errors/app-error';
import type {
  DeepReadonly,
  PlanStep,
  PlanStepKind,
  PlanStepStatus,
  PlanVersion,
  StepResult,
  StrategyProfile,
} from './agent-types';
import { MAX_PLAN_STEPS } from './strategyProfile';

export const MIN_STEP_DESCRIPTION_LENGTH = 5;

export interface PlanStepInput {
  kind: PlanStepKind;
  description: string;
  toolName?: string;
  toolArgs?: Record<string, unknown>;
  expectedOutcome?: string;
  id?: string;
}

const ALLOWED_TRANSITIONS: Record<PlanStepStatus, PlanStepStatus[]> = {
  PENDING: ['RUNNING', 'ESCALATED'],
  RUNNING: ['SUCCEEDED', 'FAILED', 'ESCALATED'],
  FAILED: ['RUNNING'],
  SUCCEEDED: [],
  ESCALATED: [],
};

export function createPlanStep(input: PlanStepInput, index: number): PlanStep {
  return {
    id: input.id ?? randomUUID(),
    index,
    kind: input.kind,
    description: input.description.trim(),
    toolName: input.toolName,
    toolArgs: { ...(input.toolArgs ?? {}) },
    expectedOutcome: input.expectedOutcome,
    status: 'PENDING',
    retries: 0,
    notes: [],
  };
}

export function createPlanVersion(params: { steps: PlanStepInput[]; reason: string }): PlanVersion {
  return {
    id: randomUUID(),
    version: 1,
    reason: params.reason,
    steps: params.steps.map((step, index) => createPlanStep(step, index)),
    currentIndex: 0,
    status: 'ACTIVE',
    rewriteCount: 0,
    createdAt: new Date().toISOString(),
  };
}

function cloneStep(step: DeepReadonly<PlanStep>): PlanStep {
  return {
    ...step,
    toolArgs: { ...step.toolArgs },
    result: step.result ? { ...step.result } : undefined,
    notes: [...step.notes],
  };
}

/**
 * Build the successor of `plan`: steps before the current index are kept, the remainder
 * is replaced by `remaining`. Version and rewrite count both advance by one.
 */
export function deriveRewrittenPlan(
  plan: DeepReadonly<PlanVersion>,
  params: { reason: string; remaining: PlanStepInput[] },
): PlanVersion {
  const kept = plan.steps.slice(0, plan.currentIndex).map(cloneStep);
  const replaced = params.remaining.map((step, offset) => createPlanStep(step, kept.length + offset));

  return {
    id: randomUUID(),
    version: plan.version + 1,
    parentId: plan.id,
    reason: params.reason,
    steps: [...kept, ...replaced],
    currentIndex: kept.length,
    status: 'ACTIVE',
    rewriteCount: plan.rewriteCount + 1,
    createdAt: new Date().toISOString(),
  };
}

/**
 * Move a step to `next`, enforcing the step lifecycle. Re-entering RUNNING from FAILED
 * consumes one retry and is refused once the profile's retry budget is spent.
 *
 * @throws AppError INVALID_STATE_TRANSITION on an illegal move.
 */
export function transitionStep(
  step: PlanStep,
  next: PlanStepStatus,
  profile: Pick<StrategyProfile, 'maxRetriesPerStep'>,
): void {
  if (!ALLOWED_TRANSITIONS[step.status].includes(next)) {
    throw new AppError('INVALID_STATE_TRANSITION', `Step ${step.id} cannot move from ${step.status} to ${next}`, undefined, {
      stepId: step.id,
      from: step.status,
      to: next,
    });
  }

  if (step.status === 'FAILED' && next === 'RUNNING') {
    if (step.retries >= profile.maxRetriesPerStep) {
      throw new AppError('INVALID_STATE_TRANSITION', `Step ${step.id} has no retries left`, undefined, {
        stepId: step.id,
        retries: step.retries,
      });
    }
    step.retries += 1;
  }

  step.status = next;
}

/** Record a terminal result; a step's result is written once. */
export function setStepResult(step: PlanStep, result: StepResult): void {
  if (step.result && (step.status === 'SUCCEEDED' || step.status === 'ESCALATED')) {
    throw new AppError('INVALID_STATE_TRANSITION', `Step ${step.id} already has a terminal result`);
  }
  step.result = result;
}

export function currentStep(plan: PlanVersion): PlanStep | undefined {
  if (plan.status !== 'ACTIVE') return undefined;
  return plan.steps[plan.currentIndex];
}

/** Advance past the current step; the plan completes when no steps remain. */
export function advancePlan(plan: PlanVersion): void {
  if (plan.status !== 'ACTIVE') {
    throw new AppError('INVALID_STATE_TRANSITION', `Plan v${plan.version} is ${plan.status} and cannot advance`);
  }
  plan.currentIndex += 1;
  if (plan.currentIndex >= plan.steps.length) {
    plan.status = 'COMPLETED';
  }
}

export function completePlan(plan: PlanVersion): void {
  plan.currentIndex = plan.steps.length;
  plan.status = 'COMPLETED';
}

export function failPlan(plan: PlanVersion): void {
  plan.status = 'FAILED';
}

/** Freeze a value and everything reachable from it. */
export function deepFreeze(value: unknown): void {
  if (value === null || typeof value !== 'object' || Object.isFrozen(value)) return;
  Object.freeze(value);
  for (const nested of Object.values(value)) {
    deepFreeze(nested);
  }
}

/**
 * Check structural rules every plan version must satisfy.
 *
 * @returns One message per violated rule; empty when the plan is valid.
 */
export function validatePlanShape(
  plan: PlanVersion,
  profile: StrategyProfile,
  expected: { version: number; rewriteCount: number },
): string[] {
  const errors: string[] = [];
  const maxSteps = Math.min(MAX_PLAN_STEPS, profile.maxSteps);

  if (plan.version !== expected.version) {
    errors.push(`plan version must be ${expected.version}, got ${plan.version}`);
  }
  if (plan.rewriteCount !== expected.rewriteCount) {
    errors.push(`plan rewrite count must be ${expected.rewriteCount}, got ${plan.rewriteCount}`);
  }
  if (plan.rewriteCount > profile.maxPlanRewrites) {
    errors.push(`plan rewrite count ${plan.rewriteCount} exceeds limit ${profile.maxPlanRewrites}`);
  }
  if (plan.steps.length === 0) {
    errors.push('plan must contain at least one step');
  }
  if (plan.steps.length > maxSteps) {
    errors.push(`plan has ${plan.steps.length} steps; limit is ${maxSteps}`);
  }
  if (plan.currentIndex < 0 || plan.currentIndex > plan.steps.length) {
    errors.push(`current index ${plan.currentIndex} is out of range`);
  }

  const ids = new Set<string>();
  plan.steps.forEach((step, index) => {
    if (ids.has(step.id)) errors.push(`duplicate step id ${step.id}`);
    ids.add(step.id);
    if (step.index !== index) errors.push(`step ${step.id} has index ${step.index}, expected ${index}`);
    if (step.description.trim().length < MIN_STEP_DESCRIPTION_LENGTH) {
      errors.push(`step ${index} description must be at least ${MIN_STEP_DESCRIPTION_LENGTH} characters`);
    }
    if (step.kind === 'EXECUTE' && !step.toolName) {
      errors.push(`step ${index} executes without a tool name`);
    }
  });

  const last = plan.steps[plan.steps.length - 1];
  if (last && last.kind !== 'SUMMARIZE') {
    errors.push('plan must end with a SUMMARIZE step');
  }

  return errors;
}
