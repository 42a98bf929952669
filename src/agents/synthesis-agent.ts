import type { LanguageModel } from '../gemini/types';
import type { StageAgent } from '../orchestrator/research-graph';
import type { ThreadState, ThreadUpdate } from '../orchestrator/thread-state';
import { AgentOutputError } from './errors';
import { toChatTurns } from './history';
import { SYNTHESIS_SYSTEM_PROMPT, buildSynthesisPrompt } from './prompts/synthesis';
import type { AgentOptions } from './types';

/** Writes the user-facing answer from the conversation and the latest findings. */
export class SynthesisAgent implements StageAgent {
  constructor(
    private client: LanguageModel,
    private options: AgentOptions = {},
  ) {}

  async run(state: Readonly<ThreadState>): Promise<ThreadUpdate> {
    const response = await this.client.generate({
      system: SYNTHESIS_SYSTEM_PROMPT,
      messages: toChatTurns(state.messageHistory),
      prompt: buildSynthesisPrompt({ query: state.currentQuery ?? '', findings: state.researchFindings }),
      temperature: 0.3,
      model: this.options.model,
    });

    const answer = response.text.trim();
    if (!answer) {
      throw new AgentOutputError('SynthesisAgent', 'model produced an empty response');
    }
    this.options.logger?.debug('Final response composed', { length: answer.length });

    return {
      messageHistory: [{ role: 'assistant', content: answer, stage: 'compose' }],
      finalResponse: answer,
    };
  }
}
