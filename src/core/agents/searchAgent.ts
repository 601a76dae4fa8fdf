import type { SearchCapability } from '../orchestrator/capabilities';
import type { SearchResult, SessionView } from '../orchestrator/agent-types';
import { MAX_SEARCH_HITS } from '../orchestrator/contracts';
import type { KnowledgeBase } from './knowledgeBase';

const SNIPPET_LENGTH = 160;

function snippet(content: string): string {
  if (content.length <= SNIPPET_LENGTH) return content;
  return `${content.slice(0, SNIPPET_LENGTH - 3).trimEnd()}...`;
}

/** Offline search backend: ranks knowledge base entries and returns titled snippets. */
export class LocalSearchAgent implements SearchCapability {
  constructor(private readonly knowledgeBase: KnowledgeBase) {}

  async search(query: string, _session: SessionView): Promise<SearchResult> {
    return {
      query,
      hits: this.knowledgeBase.search(query, MAX_SEARCH_HITS).map((match) => ({
        title: match.entry.title,
        snippet: snippet(match.entry.content),
        source: `knowledge_base:${match.entry.id}`,
      })),
    };
  }
}
