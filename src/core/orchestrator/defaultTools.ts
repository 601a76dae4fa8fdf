import { ArithmeticError, evaluateArithmetic } from './arithmetic';
import { ToolExecutionError } from './toolErrors';
import type { ToolExecutor, ToolRegistry, ToolSchema } from './toolRegistry';

interface DefaultTool {
  schema: ToolSchema;
  executor: ToolExecutor;
}

export const ARITHMETIC_EXPRESSION_PATTERN = /^[0-9+\-*/%^().eE\s]+$/;

const calculatorTool: DefaultTool = {
  schema: {
    name: 'calculator',
    description: 'Evaluate an arithmetic expression with + - * / % ^ and parentheses.',
    input: {
      expression: { type: 'string', minLength: 1, maxLength: 200, pattern: ARITHMETIC_EXPRESSION_PATTERN },
    },
    output: {
      result: { type: 'number' },
      expression: { type: 'string' },
    },
    timeoutMs: 2_000,
    maxRetries: 1,
  },
  executor: async (args) => {
    const expression = String(args.expression);
    try {
      return { result: evaluateArithmetic(expression), expression };
    } catch (error) {
      if (error instanceof ArithmeticError) {
        // Same input fails the same way; retrying is pointless.
        throw new ToolExecutionError('calculator', error.message, { retryable: false, cause: error });
      }
      throw error;
    }
  },
};

const getCurrentDateTimeTool: DefaultTool = {
  schema: {
    name: 'get_current_datetime',
    description: 'Get the current date and time, optionally shifted by a UTC offset in minutes.',
    input: {
      utcOffsetMinutes: { type: 'integer', required: false, min: -720, max: 840 },
    },
    output: {
      isoUtc: { type: 'string' },
      unixMs: { type: 'integer' },
    },
  },
  executor: async (args) => {
    const now = new Date();
    const { utcOffsetMinutes } = args;
    if (typeof utcOffsetMinutes !== 'number') {
      return { text: now.toISOString(), isoUtc: now.toISOString(), unixMs: now.getTime() };
    }

    const shifted = new Date(now.getTime() + utcOffsetMinutes * 60_000);
    const offsetHours = Math.trunc(utcOffsetMinutes / 60);
    const offsetMinutes = Math.abs(utcOffsetMinutes % 60);
    const sign = utcOffsetMinutes >= 0 ? '+' : '-';
    const offsetLabel = `UTC${sign}${Math.abs(offsetHours).toString().padStart(2, '0')}:${offsetMinutes
      .toString()
      .padStart(2, '0')}`;

    return {
      text: `${shifted.toISOString().replace('Z', '')} ${offsetLabel}`,
      isoUtc: now.toISOString(),
      shiftedTimeIso: shifted.toISOString(),
      requestedOffsetLabel: offsetLabel,
      unixMs: now.getTime(),
    };
  },
};

const wordCountTool: DefaultTool = {
  schema: {
    name: 'word_count',
    description: 'Count words and characters in a piece of text.',
    input: {
      text: { type: 'string', minLength: 1, maxLength: 5_000 },
    },
    output: {
      words: { type: 'integer', min: 0 },
      characters: { type: 'integer', min: 0 },
    },
  },
  executor: async (args) => {
    const text = String(args.text);
    const words = text.trim().split(/\s+/).filter(Boolean).length;
    return { text: `${words} words, ${text.length} characters`, words, characters: text.length };
  },
};

const DEFAULT_TOOLS: readonly DefaultTool[] = [calculatorTool, getCurrentDateTimeTool, wordCountTool];

export function registerDefaultTools(registry: ToolRegistry): void {
  for (const tool of DEFAULT_TOOLS) {
    if (!registry.has(tool.schema.name)) {
      registry.register(tool.schema, tool.executor);
    }
  }
}
