export { HeuristicCritic, estimateHallucinationRisk, findSafetyFlags } from './criticAgent';
export {
  DEFAULT_KNOWLEDGE_BASE_PATH,
  KNOWLEDGE_LOOKUP_TOOL,
  KnowledgeBase,
  loadKnowledgeBase,
  registerKnowledgeLookupTool,
  type KnowledgeEntry,
  type KnowledgeMatch,
} from './knowledgeBase';
export { ShortTermMemoryAgent } from './memoryAgent';
export { RuleBasedPerceptionAgent, splitSubGoals } from './perceptionAgent';
export { HeuristicPlanner, extractArithmeticExpression, type HeuristicPlannerOptions } from './plannerAgent';
export { KnowledgeBaseRetriever, type KnowledgeBaseRetrieverOptions } from './retrieverAgent';
export { LocalSearchAgent } from './searchAgent';
