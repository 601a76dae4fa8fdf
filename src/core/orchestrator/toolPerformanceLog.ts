import { mkdir, readFile, writeFile } from 'node:fs/promises';
import path from 'node:path';
import { z } from 'zod';
import { AppError } from '../../shared/errors/app-error';
import type { ToolPerformanceRecord } from './agent-types';

const recordSchema = z.object({
  toolName: z.string(),
  stepId: z.string(),
  timestamp: z.string(),
  latencyMs: z.number().min(0),
  success: z.boolean(),
  attempts: z.number().int().min(0),
  errorKind: z
    .enum([
      'unknown_tool',
      'duplicate_tool',
      'schema_validation',
      'dangerous_pattern',
      'tool_banned',
      'execution_timeout',
      'tool_execution',
      'retry_exhausted',
      'output_validation',
      'all_strategies_failed',
      'step_failure',
      'plan_failure',
      'collaborator_contract',
    ])
    .optional(),
});

const logFileSchema = z.object({
  sessionId: z.string(),
  records: z.array(recordSchema),
});

export type ToolPerformanceLogFile = z.infer<typeof logFileSchema>;

export interface ToolPerformanceSummary {
  toolName: string;
  successCount: number;
  failureCount: number;
  totalCalls: number;
  avgLatencyMs: number;
  successRate: number;
}

export function toolLogPath(directory: string, sessionId: string): string {
  return path.join(directory, `${sessionId}_tool_perf.json`);
}

/**
 * Write a session's records to `<directory>/<sessionId>_tool_perf.json`.
 *
 * @returns The written file path.
 */
export async function persistToolPerformanceLog(
  directory: string,
  sessionId: string,
  records: ReadonlyArray<ToolPerformanceRecord>,
): Promise<string> {
  const filePath = toolLogPath(directory, sessionId);
  const body: ToolPerformanceLogFile = { sessionId, records: records.map((record) => ({ ...record })) };
  await mkdir(directory, { recursive: true });
  await writeFile(filePath, `${JSON.stringify(body, null, 2)}\n`, 'utf8');
  return filePath;
}

/**
 * Read and validate a persisted log.
 *
 * @throws AppError PERSISTENCE_FAILED when the file is missing or malformed.
 */
export async function loadToolPerformanceLog(filePath: string): Promise<ToolPerformanceLogFile> {
  let raw: string;
  try {
    raw = await readFile(filePath, 'utf8');
  } catch (error) {
    throw new AppError('PERSISTENCE_FAILED', `Cannot read tool performance log ${filePath}`, error);
  }

  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (error) {
    throw new AppError('PERSISTENCE_FAILED', `Tool performance log ${filePath} is not valid JSON`, error);
  }

  const parsed = logFileSchema.safeParse(json);
  if (!parsed.success) {
    throw new AppError('PERSISTENCE_FAILED', `Tool performance log ${filePath} has an invalid shape`, parsed.error);
  }
  return parsed.data;
}

/** Aggregate records per tool, in order of first appearance. */
export function summarizeToolPerformance(records: ReadonlyArray<ToolPerformanceRecord>): ToolPerformanceSummary[] {
  const byTool = new Map<string, { success: number; failure: number; latency: number }>();

  for (const record of records) {
    const entry = byTool.get(record.toolName) ?? { success: 0, failure: 0, latency: 0 };
    if (record.success && !record.errorKind) entry.success += 1;
    else entry.failure += 1;
    entry.latency += record.latencyMs;
    byTool.set(record.toolName, entry);
  }

  return Array.from(byTool, ([toolName, entry]) => {
    const totalCalls = entry.success + entry.failure;
    return {
      toolName,
      successCount: entry.success,
      failureCount: entry.failure,
      totalCalls,
      avgLatencyMs: entry.latency / totalCalls,
      successRate: entry.success / totalCalls,
    };
  });
}
