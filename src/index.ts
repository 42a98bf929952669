// Engine
export * from './orchestrator/errors';
export * from './orchestrator/state';
export * from './orchestrator/stage';
export * from './orchestrator/graph';
export * from './orchestrator/checkpoint-store';
export * from './orchestrator/thread-lock';
export * from './orchestrator/events';
export * from './orchestrator/logger';
export * from './orchestrator/executor';

// Research graph
export * from './orchestrator/thread-state';
export * from './orchestrator/routing';
export * from './orchestrator/research-graph';
export * from './orchestrator/register-stages';

// Reasoning service and agents
export * from './gemini/types';
export * from './gemini/errors';
export { GeminiClient } from './gemini/client';
export { ClarityAgent } from './agents/clarity-agent';
export { ResearchAgent } from './agents/research-agent';
export type { ResearchAgentOptions } from './agents/research-agent';
export { ValidatorAgent } from './agents/validator-agent';
export { SynthesisAgent } from './agents/synthesis-agent';
export { AgentOutputError } from './agents/errors';
export type { AgentOptions } from './agents/types';

// Configuration
export { loadConfig, requireApiKey } from './config/loader';
export type { DeepPartial, LoadConfigOptions } from './config/loader';
export { ConfigSchema, ConfigValidationError } from './config/validator';
export type { Config } from './config/validator';
