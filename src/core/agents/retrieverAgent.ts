import type { RetrievalCapability } from '../orchestrator/capabilities';
import type { RetrievalBundle, RetrievedItem, SessionView } from '../orchestrator/agent-types';
import { MAX_RETRIEVED_ITEMS } from '../orchestrator/contracts';
import type { KnowledgeBase } from './knowledgeBase';
import { extractKeywords } from './text';

const MEMORY_RELEVANCE = 0.7;
const SUMMARY_ITEMS = 3;

export interface KnowledgeBaseRetrieverOptions {
  knowledgeBase: KnowledgeBase;
  /** Knowledge base matches to keep per query. */
  maxMatches?: number;
}

/**
 * Retrieve from the local knowledge base and from short-term memory items that share a
 * keyword with the query.
 */
export class KnowledgeBaseRetriever implements RetrievalCapability {
  private readonly maxMatches: number;

  constructor(private readonly options: KnowledgeBaseRetrieverOptions) {
    this.maxMatches = Math.min(options.maxMatches ?? 5, MAX_RETRIEVED_ITEMS);
  }

  async retrieve(query: string, session: SessionView): Promise<RetrievalBundle> {
    const items: RetrievedItem[] = this.options.knowledgeBase.search(query, this.maxMatches).map((match) => ({
      id: `kb:${match.entry.id}`,
      source: 'knowledge_base',
      content: match.entry.content,
      relevance: match.score,
    }));

    const keywords = new Set(extractKeywords(query));
    for (const memoryItem of session.memory.shortTerm) {
      if (items.length >= MAX_RETRIEVED_ITEMS) break;
      if (extractKeywords(memoryItem.value).some((word) => keywords.has(word))) {
        items.push({ id: `memory:${memoryItem.key}`, source: 'memory', content: memoryItem.value, relevance: MEMORY_RELEVANCE });
      }
    }

    items.sort((a, b) => b.relevance - a.relevance);

    const openQuestions: string[] = [];
    if (items.length === 0) openQuestions.push(`No stored knowledge about "${query}"`);
    const snapshot = session.perceptionSnapshots[session.perceptionSnapshots.length - 1];
    if (snapshot?.uncertainties.includes('clarity_uncertainty')) {
      openQuestions.push('The request is ambiguous; a clarification may help');
    }

    return {
      query,
      items,
      summary:
        items.length > 0
          ? items
              .slice(0, SUMMARY_ITEMS)
              .map((item) => item.content)
              .join(' | ')
          : undefined,
      openQuestions,
    };
  }
}
