import type { LanguageModel } from '../gemini/types';
import type { StageAgent } from '../orchestrator/research-graph';
import type { ThreadState, ThreadUpdate } from '../orchestrator/thread-state';
import { AgentOutputError } from './errors';
import { parseModelJson } from './json';
import { CONFIDENCE_SYSTEM_PROMPT, buildConfidencePrompt, buildResearchPrompt } from './prompts/research';
import { ConfidenceAssessmentSchema } from './types';
import type { AgentOptions } from './types';

export interface ResearchAgentOptions extends AgentOptions {
  /** Model for the search-grounded call; `model` is used for the confidence assessment */
  researchModel?: string;
}

/**
 * Gathers findings with a search-grounded call, then asks the model to
 * score how well they answer the query.
 */
export class ResearchAgent implements StageAgent {
  constructor(
    private client: LanguageModel,
    private options: ResearchAgentOptions = {},
  ) {}

  async run(state: Readonly<ThreadState>): Promise<ThreadUpdate> {
    const query = state.currentQuery ?? '';

    const research = await this.client.generate({
      prompt: buildResearchPrompt({ query, subject: state.subjectEntity }),
      groundWithSearch: true,
      model: this.options.researchModel,
    });
    const findings = research.text.trim();
    if (!findings) {
      throw new AgentOutputError('ResearchAgent', 'model returned empty research findings');
    }

    const assessment = await this.client.generate({
      system: CONFIDENCE_SYSTEM_PROMPT,
      prompt: buildConfidencePrompt({ query, findings }),
      temperature: 0,
      json: true,
      model: this.options.model,
    });
    const { confidence_score, reasoning } = parseModelJson('ResearchAgent', assessment.text, ConfidenceAssessmentSchema);
    this.options.logger?.info('Research confidence assessed', { score: confidence_score, reasoning });

    return {
      messageHistory: [{ role: 'assistant', content: findings, stage: 'gather' }],
      researchFindings: findings,
      confidenceScore: confidence_score,
    };
  }
}
