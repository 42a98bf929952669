import path from 'path';
import type { Config } from '../config/validator';
import { requireApiKey } from '../config/loader';
import { GeminiClient } from '../gemini/client';
import type { LanguageModel } from '../gemini/types';
import { ClarityAgent } from '../agents/clarity-agent';
import { ResearchAgent } from '../agents/research-agent';
import { ValidatorAgent } from '../agents/validator-agent';
import { SynthesisAgent } from '../agents/synthesis-agent';
import { FileCheckpointStore, MemoryCheckpointStore } from './checkpoint-store';
import type { CheckpointStore } from './checkpoint-store';
import { GraphExecutor } from './executor';
import { ConsoleWorkflowLogger } from './logger';
import type { WorkflowLogger } from './logger';
import { createResearchGraph } from './research-graph';
import type { ResearchAgents } from './research-graph';
import type { ResearchStage, ThreadState } from './thread-state';

export type ResearchExecutor = GraphExecutor<ThreadState, ResearchStage>;

export interface ResearchExecutorParams {
  config: Config;
  /** Defaults to the store named by `config.storage` */
  store?: CheckpointStore;
  logger?: WorkflowLogger;
  /** Reasoning client shared by every agent (defaults to a GeminiClient) */
  client?: LanguageModel;
  /** Replaces the agents entirely (fakes in tests); `client` is then unused */
  agents?: ResearchAgents;
  /** Base for a relative `storage.dir` (default: process.cwd()) */
  cwd?: string;
}

export function createCheckpointStore(config: Config, cwd: string = process.cwd(), logger?: WorkflowLogger): CheckpointStore {
  if (config.storage.driver === 'memory') {
    return new MemoryCheckpointStore();
  }
  return new FileCheckpointStore(path.resolve(cwd, config.storage.dir), { logger });
}

export function createGeminiClient(config: Config, logger?: WorkflowLogger): GeminiClient {
  return new GeminiClient({
    apiKey: requireApiKey(config),
    model: config.gemini.model,
    baseUrl: config.gemini.base_url,
    timeout: config.gemini.timeout_ms,
    maxRetries: config.gemini.max_retries,
    retryBaseDelayMs: config.gemini.retry_base_delay_ms,
    logger,
  });
}

export function createResearchAgents(client: LanguageModel, config: Config, logger?: WorkflowLogger): ResearchAgents {
  const options = { model: config.gemini.model, logger };
  return {
    resolve: new ClarityAgent(client, options),
    gather: new ResearchAgent(client, { ...options, researchModel: config.gemini.research_model }),
    validate: new ValidatorAgent(client, options),
    compose: new SynthesisAgent(client, options),
  };
}

/** Wires config, agents, store and logger into a ready-to-use executor. */
export function createResearchExecutor(params: ResearchExecutorParams): ResearchExecutor {
  const { config } = params;
  const logger = params.logger ?? new ConsoleWorkflowLogger({ level: config.logging.level });
  const agents = params.agents ?? createResearchAgents(params.client ?? createGeminiClient(config, logger), config, logger);

  return new GraphExecutor({
    graph: createResearchGraph(agents),
    store: params.store ?? createCheckpointStore(config, params.cwd, logger),
    logger,
    maxSteps: config.engine.max_steps,
  });
}
