/**
 * Register tools with statically declared field constraints and validate calls against them.
 */
import { z } from 'zod';
import { AppError } from '../../shared/errors/app-error';
import type { SessionView } from './agent-types';
import { findDangerousPattern } from './dangerousPatterns';
import {
  DangerousPatternError,
  DuplicateToolError,
  OutputValidationError,
  SchemaValidationError,
  UnknownToolError,
} from './toolErrors';

const MAX_ARGS_SIZE = 10 * 1024;

export const TOOL_NAME_PATTERN = /^[A-Za-z_][A-Za-z0-9_]*$/;

export type FieldType = 'string' | 'number' | 'integer' | 'boolean' | 'array' | 'object';

/** Constraint for one named field of a tool's input or output. */
export interface FieldConstraint {
  type: FieldType;
  /** Defaults to true. */
  required?: boolean;
  minLength?: number;
  maxLength?: number;
  min?: number;
  max?: number;
  pattern?: RegExp;
  enum?: ReadonlyArray<string | number>;
  maxItems?: number;
  description?: string;
}

export type FieldConstraints = Record<string, FieldConstraint>;

export interface ToolSchema {
  name: string;
  description: string;
  input: FieldConstraints;
  /** Empty map accepts any payload. */
  output: FieldConstraints;
  /** Per-invocation deadline; falls back to the configured default. */
  timeoutMs?: number;
  /** Per-tool retry ceiling; the profile's limit still applies. */
  maxRetries?: number;
}

/** Carry immutable context passed into every tool invocation. */
export interface ToolInvocationContext {
  sessionId: string;
  stepId: string;
  /** 1-based attempt number. */
  attempt: number;
  /** Aborted when the deadline passes. Tools should check it or pass it on. */
  signal: AbortSignal;
  /** Wall-clock deadline (epoch ms) for this attempt. */
  deadlineAt: number;
  session: SessionView;
}

export type ToolExecutor = (args: Record<string, unknown>, ctx: ToolInvocationContext) => Promise<unknown>;

export interface RegisteredTool {
  schema: Readonly<ToolSchema>;
  executor: ToolExecutor;
}

export type Result<T, E> = { ok: true; value: T } | { ok: false; error: E };

const fieldConstraintSchema = z
  .object({
    type: z.enum(['string', 'number', 'integer', 'boolean', 'array', 'object']),
    required: z.boolean().optional(),
    minLength: z.number().int().min(0).optional(),
    maxLength: z.number().int().min(0).optional(),
    min: z.number().optional(),
    max: z.number().optional(),
    pattern: z
      .instanceof(RegExp)
      .refine((pattern) => !pattern.global && !pattern.sticky, 'pattern must not be global or sticky')
      .optional(),
    enum: z.array(z.union([z.string(), z.number()])).min(1).readonly().optional(),
    maxItems: z.number().int().min(0).optional(),
    description: z.string().optional(),
  })
  .strict()
  .refine((c) => c.minLength === undefined || c.maxLength === undefined || c.minLength <= c.maxLength, {
    message: 'minLength must not exceed maxLength',
  })
  .refine((c) => c.min === undefined || c.max === undefined || c.min <= c.max, {
    message: 'min must not exceed max',
  });

const toolSchemaSchema = z
  .object({
    name: z.string().regex(TOOL_NAME_PATTERN, 'must be an identifier').max(64),
    description: z.string().trim().min(1).max(500),
    input: z.record(fieldConstraintSchema),
    output: z.record(fieldConstraintSchema),
    timeoutMs: z.number().int().min(1_000).max(30_000).optional(),
    maxRetries: z.number().int().min(0).max(5).optional(),
  })
  .strict();

function freezeSchema(schema: ToolSchema): Readonly<ToolSchema> {
  const freezeConstraints = (constraints: FieldConstraints): FieldConstraints => {
    const copy: FieldConstraints = {};
    for (const [field, constraint] of Object.entries(constraints)) {
      copy[field] = Object.freeze({ ...constraint, enum: constraint.enum ? Object.freeze([...constraint.enum]) : undefined });
    }
    return Object.freeze(copy);
  };

  return Object.freeze({
    ...schema,
    input: freezeConstraints(schema.input),
    output: freezeConstraints(schema.output),
  });
}

function matchesType(value: unknown, type: FieldType): boolean {
  switch (type) {
    case 'string':
      return typeof value === 'string';
    case 'number':
      return typeof value === 'number' && Number.isFinite(value);
    case 'integer':
      return typeof value === 'number' && Number.isInteger(value);
    case 'boolean':
      return typeof value === 'boolean';
    case 'array':
      return Array.isArray(value);
    case 'object':
      return value !== null && typeof value === 'object' && !Array.isArray(value);
  }
}

function checkField(field: string, value: unknown, constraint: FieldConstraint): string | undefined {
  if (!matchesType(value, constraint.type)) {
    return `${field}: expected ${constraint.type}`;
  }

  if (typeof value === 'string') {
    if (constraint.minLength !== undefined && value.length < constraint.minLength) {
      return `${field}: must be at least ${constraint.minLength} characters`;
    }
    if (constraint.maxLength !== undefined && value.length > constraint.maxLength) {
      return `${field}: must be at most ${constraint.maxLength} characters`;
    }
    if (constraint.pattern && !constraint.pattern.test(value)) {
      return `${field}: does not match ${constraint.pattern}`;
    }
  }

  if (typeof value === 'number') {
    if (constraint.min !== undefined && value < constraint.min) {
      return `${field}: must be >= ${constraint.min}`;
    }
    if (constraint.max !== undefined && value > constraint.max) {
      return `${field}: must be <= ${constraint.max}`;
    }
  }

  if (Array.isArray(value) && constraint.maxItems !== undefined && value.length > constraint.maxItems) {
    return `${field}: must have at most ${constraint.maxItems} items`;
  }

  if (constraint.enum && (typeof value === 'string' || typeof value === 'number') && !constraint.enum.includes(value)) {
    return `${field}: must be one of ${constraint.enum.join(', ')}`;
  }

  return undefined;
}

/**
 * Check a record against field constraints, one rule at a time.
 *
 * @returns One issue per failing field; empty when valid.
 */
export function checkFields(
  values: Record<string, unknown>,
  constraints: FieldConstraints,
  options: { allowUnknown: boolean },
): string[] {
  const issues: string[] = [];

  for (const [field, constraint] of Object.entries(constraints)) {
    const value = values[field];
    if (value === undefined) {
      if (constraint.required !== false) issues.push(`${field}: is required`);
      continue;
    }
    const issue = checkField(field, value, constraint);
    if (issue) issues.push(issue);
  }

  if (!options.allowUnknown) {
    for (const field of Object.keys(values)) {
      if (!(field in constraints)) issues.push(`${field}: is not a declared field`);
    }
  }

  return issues;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

/**
 * Hold the tools a session may call. Populated during setup, then frozen and passed by
 * reference to the executors; there is no process-global instance.
 */
export class ToolRegistry {
  private readonly tools = new Map<string, RegisteredTool>();
  private frozen = false;

  /**
   * Register a tool.
   *
   * @throws DuplicateToolError when the name is taken; the first registration stays active.
   * @throws AppError CONFIG_INVALID for a malformed schema, REGISTRY_FROZEN after `freeze()`.
   */
  register(schema: ToolSchema, executor: ToolExecutor): void {
    if (this.frozen) {
      throw new AppError('REGISTRY_FROZEN', `Cannot register "${schema.name}": registry is frozen`);
    }
    if (this.tools.has(schema.name)) {
      throw new DuplicateToolError(schema.name);
    }

    const parsed = toolSchemaSchema.safeParse(schema);
    if (!parsed.success) {
      const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
      throw new AppError('CONFIG_INVALID', `Invalid schema for tool "${schema.name}": ${issues.join('; ')}`, parsed.error);
    }

    this.tools.set(schema.name, { schema: freezeSchema(schema), executor });
  }

  /** Seal the registry; later registrations fail. */
  freeze(): void {
    this.frozen = true;
  }

  get isFrozen(): boolean {
    return this.frozen;
  }

  lookup(name: string): Result<RegisteredTool, UnknownToolError> {
    const tool = this.tools.get(name);
    if (!tool) return { ok: false, error: new UnknownToolError(name, this.listNames()) };
    return { ok: true, value: tool };
  }

  has(name: string): boolean {
    return this.tools.has(name);
  }

  listNames(): string[] {
    return Array.from(this.tools.keys());
  }

  listTools(): Readonly<ToolSchema>[] {
    return Array.from(this.tools.values(), (tool) => tool.schema);
  }

  /**
   * Validate untrusted arguments: size, the dangerous-pattern scan, then declared fields.
   * The accepted value is a copy detached from `args`.
   */
  validateInput(
    name: string,
    args: unknown,
  ): Result<Record<string, unknown>, UnknownToolError | SchemaValidationError | DangerousPatternError> {
    const lookup = this.lookup(name);
    if (!lookup.ok) return lookup;

    if (!isRecord(args)) {
      return { ok: false, error: new SchemaValidationError(name, ['arguments must be an object']) };
    }

    let argsJson: string;
    let detached: Record<string, unknown>;
    try {
      argsJson = JSON.stringify(args);
      detached = structuredClone(args);
    } catch {
      return { ok: false, error: new SchemaValidationError(name, ['arguments must be JSON-serializable']) };
    }
    if (argsJson.length > MAX_ARGS_SIZE) {
      return {
        ok: false,
        error: new SchemaValidationError(name, [`arguments exceed maximum size (${argsJson.length} > ${MAX_ARGS_SIZE} bytes)`]),
      };
    }

    const match = findDangerousPattern(args);
    if (match) {
      return { ok: false, error: new DangerousPatternError(name, match.field, match.pattern) };
    }

    const issues = checkFields(args, lookup.value.schema.input, { allowUnknown: false });
    if (issues.length > 0) {
      return { ok: false, error: new SchemaValidationError(name, issues) };
    }

    return { ok: true, value: detached };
  }

  validateOutput(name: string, payload: unknown): Result<unknown, UnknownToolError | OutputValidationError> {
    const lookup = this.lookup(name);
    if (!lookup.ok) return lookup;

    const constraints = lookup.value.schema.output;
    if (Object.keys(constraints).length === 0) return { ok: true, value: payload };

    if (!isRecord(payload)) {
      return { ok: false, error: new OutputValidationError(name, ['output must be an object']) };
    }

    const issues = checkFields(payload, constraints, { allowUnknown: true });
    if (issues.length > 0) {
      return { ok: false, error: new OutputValidationError(name, issues) };
    }
    return { ok: true, value: payload };
  }
}
