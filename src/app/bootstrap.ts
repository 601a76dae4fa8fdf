import { config } from '../shared/config/env';
import { AppError } from '../shared/errors/app-error';
import { logger } from '../shared/logging/logger';
import {
  HeuristicCritic,
  HeuristicPlanner,
  KnowledgeBaseRetriever,
  LocalSearchAgent,
  RuleBasedPerceptionAgent,
  ShortTermMemoryAgent,
  loadKnowledgeBase,
  registerKnowledgeLookupTool,
  type KnowledgeBase,
} from '../core/agents';
import type { AgentEvent } from '../core/orchestrator/agent-events';
import type { StrategyProfile } from '../core/orchestrator/agent-types';
import type { HumanInputCallback } from '../core/orchestrator/capabilities';
import { Coordinator } from '../core/orchestrator/coordinator';
import { registerDefaultTools } from '../core/orchestrator/defaultTools';
import {
  ParallelStrategyExecutor,
  createRetrievalStrategy,
  createSearchStrategy,
  createToolStrategy,
} from '../core/orchestrator/parallelStrategy';
import { SafeExecutor } from '../core/orchestrator/safeExecutor';
import { resolveStrategyProfile } from '../core/orchestrator/strategyProfile';
import { ToolRegistry } from '../core/orchestrator/toolRegistry';

export interface BuildCoordinatorOptions {
  /** Profile name or definition; defaults to ORCHESTRATOR_PROFILE. */
  profile?: string | StrategyProfile;
  humanInput: HumanInputCallback;
  knowledgeBase?: KnowledgeBase;
  /** Extra tools registered after the defaults, before the registry is sealed. */
  registerTools?: (registry: ToolRegistry) => void;
  onEvent?: (event: AgentEvent) => void;
}

/** Non-interactive human: declines reviews, gives no guidance, answers clarifications with "continue". */
export const unattendedHumanInput: HumanInputCallback = (request) => {
  if (request.category === 'review') return 'reject';
  if (request.category === 'clarification') return 'continue';
  return '';
};

/**
 * Wire a Coordinator with the default tools, the three strategies and the heuristic
 * collaborators, reading limits from the environment configuration.
 */
export function buildDefaultCoordinator(options: BuildCoordinatorOptions): Coordinator {
  try {
    const profile =
      typeof options.profile === 'object'
        ? options.profile
        : resolveStrategyProfile(options.profile ?? config.ORCHESTRATOR_PROFILE);
    const knowledgeBase = options.knowledgeBase ?? loadKnowledgeBase();

    const registry = new ToolRegistry();
    registerDefaultTools(registry);
    registerKnowledgeLookupTool(registry, knowledgeBase);
    options.registerTools?.(registry);

    const retrieval = new KnowledgeBaseRetriever({ knowledgeBase });
    const search = new LocalSearchAgent(knowledgeBase);
    const executor = new SafeExecutor({
      registry,
      defaultTimeoutMs: config.TOOL_DEFAULT_TIMEOUT_MS,
      retryBaseDelayMs: config.TOOL_RETRY_BASE_DELAY_MS,
    });
    const strategies = new ParallelStrategyExecutor([
      createToolStrategy(executor),
      createRetrievalStrategy(retrieval),
      createSearchStrategy(search),
    ]);

    logger.debug({ profile: profile.name, tools: registry.listNames() }, 'Coordinator wired');

    return new Coordinator({
      registry,
      strategies,
      collaborators: {
        perception: new RuleBasedPerceptionAgent(),
        retrieval,
        memory: new ShortTermMemoryAgent(),
        planner: new HeuristicPlanner({ availableTools: registry.listNames() }),
        critic: new HeuristicCritic(),
        search,
      },
      humanInput: options.humanInput,
      profile,
      toolLogDir: config.TOOL_LOG_DIR || undefined,
      collaboratorTimeoutMs: config.COLLABORATOR_TIMEOUT_MS,
      onEvent: options.onEvent,
    });
  } catch (error) {
    if (error instanceof AppError) throw error;
    throw new AppError('BOOTSTRAP_FAILED', 'Could not build the coordinator', error);
  }
}
