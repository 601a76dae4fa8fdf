import dotenv from 'dotenv';
import { z } from 'zod';
import { AppError } from '../errors/app-error';

const isTestRuntime =
  process.env.NODE_ENV === 'test' ||
  process.env.VITEST === 'true' ||
  process.env.VITEST_WORKER_ID !== undefined;

if (!isTestRuntime) {
  dotenv.config();
}

const testDefaults: Record<string, string> = {
  NODE_ENV: 'test',
  LOG_LEVEL: 'warn',
  ORCHESTRATOR_PROFILE: 'conservative',
  TOOL_DEFAULT_TIMEOUT_MS: '4000',
  TOOL_RETRY_BASE_DELAY_MS: '1',
  TOOL_LOG_DIR: '',
  COLLABORATOR_TIMEOUT_MS: '30000',
  HIL_INTERACTIVE: 'false',
};

const booleanFlag = z
  .enum(['true', 'false', '1', '0'])
  .default('false')
  .transform((value) => value === 'true' || value === '1');

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),

  ORCHESTRATOR_PROFILE: z
    .string()
    .trim()
    .toLowerCase()
    .pipe(z.enum(['conservative', 'exploratory', 'fallback']))
    .default('conservative'),

  // Default per-invocation deadline when a tool schema declares none.
  TOOL_DEFAULT_TIMEOUT_MS: z.coerce.number().int().min(1).max(30_000).default(4_000),
  TOOL_RETRY_BASE_DELAY_MS: z.coerce.number().int().min(1).max(10_000).default(200),
  TOOL_LOG_DIR: z.string().trim().default(''),
  COLLABORATOR_TIMEOUT_MS: z.coerce.number().int().min(1).max(600_000).default(30_000),

  HIL_INTERACTIVE: booleanFlag,
});

export type RawEnv = Record<string, string | undefined>;

/**
 * Parse an environment record into the typed orchestrator configuration.
 *
 * @throws AppError with code CONFIG_INVALID listing every failing key.
 */
export function parseConfig(env: RawEnv) {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new AppError('CONFIG_INVALID', `Invalid environment configuration: ${issues.join('; ')}`, parsed.error, {
      issues,
    });
  }

  return {
    ...parsed.data,
    isDev: parsed.data.NODE_ENV === 'development',
    isProd: parsed.data.NODE_ENV === 'production',
  };
}

const mergedEnv: RawEnv = {
  ...(isTestRuntime ? testDefaults : {}),
  ...process.env,
};

export const config = parseConfig(mergedEnv);

export type AppConfig = ReturnType<typeof parseConfig>;
