import type { LanguageModel } from '../gemini/types';
import type { StageAgent } from '../orchestrator/research-graph';
import type { ThreadState, ThreadUpdate } from '../orchestrator/thread-state';
import { toChatTurns } from './history';
import { parseModelJson } from './json';
import { CLARITY_SYSTEM_PROMPT, buildClarityPrompt, buildLastSubjectContext } from './prompts/clarity';
import { ClarityResultSchema } from './types';
import type { AgentOptions } from './types';

/**
 * Decides whether the current query names a company, using the whole
 * conversation and the last company the thread settled on.
 */
export class ClarityAgent implements StageAgent {
  constructor(
    private client: LanguageModel,
    private options: AgentOptions = {},
  ) {}

  async run(state: Readonly<ThreadState>): Promise<ThreadUpdate> {
    const query = state.currentQuery ?? '';
    const system = state.lastResolvedSubject ? `${CLARITY_SYSTEM_PROMPT}\n\n${buildLastSubjectContext(state.lastResolvedSubject)}` : CLARITY_SYSTEM_PROMPT;

    const response = await this.client.generate({
      system,
      messages: toChatTurns(state.messageHistory),
      prompt: buildClarityPrompt({ query }),
      temperature: 0,
      json: true,
      model: this.options.model,
    });
    const result = parseModelJson('ClarityAgent', response.text, ClarityResultSchema);

    const subject = result.company_name?.trim() || undefined;
    this.options.logger?.info('Clarity assessed', { status: result.clarity_status, subject: subject ?? null });

    if (result.clarity_status === 'needs_clarification') {
      const question = result.clarification_question?.trim();
      return {
        clarityStatus: 'needs_clarification',
        subjectEntity: subject ?? null,
        clarificationQuestion: question || null,
      };
    }

    return {
      clarityStatus: 'clear',
      subjectEntity: subject ?? null,
      clarificationQuestion: null,
      ...(subject ? { lastResolvedSubject: subject } : {}),
    };
  }
}
