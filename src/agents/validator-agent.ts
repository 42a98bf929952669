import type { LanguageModel } from '../gemini/types';
import type { StageAgent } from '../orchestrator/research-graph';
import type { ThreadState, ThreadUpdate } from '../orchestrator/thread-state';
import { toChatTurns } from './history';
import { parseModelJson } from './json';
import { VALIDATOR_SYSTEM_PROMPT, buildValidationPrompt } from './prompts/validation';
import { ValidationAssessmentSchema } from './types';
import type { AgentOptions } from './types';

/** Grades the findings and counts the attempt. Routing decides what happens next. */
export class ValidatorAgent implements StageAgent {
  constructor(
    private client: LanguageModel,
    private options: AgentOptions = {},
  ) {}

  async run(state: Readonly<ThreadState>): Promise<ThreadUpdate> {
    const response = await this.client.generate({
      system: VALIDATOR_SYSTEM_PROMPT,
      messages: toChatTurns(state.messageHistory),
      prompt: buildValidationPrompt({ query: state.currentQuery ?? '', findings: state.researchFindings }),
      temperature: 0.1,
      json: true,
      model: this.options.model,
    });
    const assessment = parseModelJson('ValidatorAgent', response.text, ValidationAssessmentSchema);

    const attemptCounter = state.attemptCounter + 1;
    this.options.logger?.info('Research validated', { result: assessment.validation_result, attempt: attemptCounter });

    return {
      messageHistory: [{ role: 'assistant', content: formatCritique(assessment.critique, assessment.suggestions), stage: 'validate' }],
      validationResult: assessment.validation_result,
      attemptCounter,
    };
  }
}

export function formatCritique(critique: string, suggestions: string): string {
  return suggestions ? `Critique: ${critique}\n\nSuggestions: ${suggestions}` : `Critique: ${critique}`;
}
