import { readFileSync } from 'node:fs';
import path from 'node:path';
import { z } from 'zod';
import { AppError } from '../../shared/errors/app-error';
import { ToolExecutionError } from '../orchestrator/toolErrors';
import type { ToolRegistry } from '../orchestrator/toolRegistry';
import { extractKeywords } from './text';

export const DEFAULT_KNOWLEDGE_BASE_PATH = path.resolve(__dirname, '../../../data/knowledge-base.json');

const entrySchema = z.object({
  id: z.string().min(1),
  title: z.string().min(1),
  content: z.string().min(1),
  tags: z.array(z.string()).default([]),
});

const fileSchema = z.object({
  entries: z.array(entrySchema),
});

export type KnowledgeEntry = z.infer<typeof entrySchema>;

export interface KnowledgeMatch {
  entry: KnowledgeEntry;
  /** Share of the query's keywords found in the entry, in (0, 1]. */
  score: number;
}

/** In-memory keyword index over a small set of reference entries. */
export class KnowledgeBase {
  private readonly indexed: Array<{ entry: KnowledgeEntry; words: Set<string> }>;

  constructor(entries: readonly KnowledgeEntry[]) {
    this.indexed = entries.map((entry) => ({
      entry,
      words: new Set(extractKeywords(`${entry.title} ${entry.content} ${entry.tags.join(' ')}`)),
    }));
  }

  get size(): number {
    return this.indexed.length;
  }

  search(query: string, limit = 5): KnowledgeMatch[] {
    const keywords = Array.from(new Set(extractKeywords(query)));
    if (keywords.length === 0) return [];

    const matches: KnowledgeMatch[] = [];
    for (const { entry, words } of this.indexed) {
      const hits = keywords.filter((keyword) => words.has(keyword)).length;
      if (hits > 0) matches.push({ entry, score: hits / keywords.length });
    }

    return matches.sort((a, b) => b.score - a.score || a.entry.id.localeCompare(b.entry.id)).slice(0, limit);
  }
}

/**
 * Load and validate a knowledge base file.
 *
 * @throws AppError BOOTSTRAP_FAILED when the file is missing or malformed.
 */
export function loadKnowledgeBase(filePath: string = DEFAULT_KNOWLEDGE_BASE_PATH): KnowledgeBase {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(filePath, 'utf8'));
  } catch (error) {
    throw new AppError('BOOTSTRAP_FAILED', `Could not read knowledge base at ${filePath}`, error);
  }

  const parsed = fileSchema.safeParse(raw);
  if (!parsed.success) {
    throw new AppError('BOOTSTRAP_FAILED', `Knowledge base at ${filePath} is malformed`, parsed.error, {
      issues: parsed.error.issues,
    });
  }
  return new KnowledgeBase(parsed.data.entries);
}

export const KNOWLEDGE_LOOKUP_TOOL = 'knowledge_lookup';

/** Register `knowledge_lookup`, the tool the planner falls back to for open questions. */
export function registerKnowledgeLookupTool(registry: ToolRegistry, knowledgeBase: KnowledgeBase): void {
  if (registry.has(KNOWLEDGE_LOOKUP_TOOL)) return;

  registry.register(
    {
      name: KNOWLEDGE_LOOKUP_TOOL,
      description: 'Look up reference entries whose keywords match a query.',
      input: {
        query: { type: 'string', minLength: 3, maxLength: 500 },
      },
      output: {
        text: { type: 'string', minLength: 1 },
        matches: { type: 'integer', min: 1 },
      },
      maxRetries: 0,
    },
    async (args) => {
      const query = String(args.query);
      const matches = knowledgeBase.search(query, 3);
      if (matches.length === 0) {
        throw new ToolExecutionError(KNOWLEDGE_LOOKUP_TOOL, `No reference entry matches "${query}"`, {
          retryable: false,
        });
      }
      return {
        text: matches.map((match) => match.entry.content).join(' '),
        matches: matches.length,
      };
    },
  );
}
