import type { ResearchExecutor } from '../orchestrator/register-stages';
import type { RunOutcome } from '../orchestrator/executor';
import { userTurn } from '../orchestrator/thread-state';
import type { ResearchStage, ThreadState } from '../orchestrator/thread-state';

export type ResearchOutcome = RunOutcome<ThreadState, ResearchStage>;

export interface ConversationOptions {
  /** Answer suspensions on the spot instead of returning them */
  interactive: boolean;
  ask: (question: string) => Promise<string>;
  /** Called after every invoke/resume */
  onOutcome?: (outcome: ResearchOutcome) => void;
}

/**
 * Runs one user turn. In interactive mode every clarification request is put
 * to the user and the thread resumed with the answer until the turn completes.
 */
export async function runConversationTurn(executor: ResearchExecutor, threadId: string, query: string, options: ConversationOptions): Promise<ResearchOutcome> {
  let outcome = await executor.invoke(threadId, userTurn(query));
  options.onOutcome?.(outcome);

  while (outcome.status === 'suspended' && options.interactive) {
    const answer = await options.ask(String(outcome.payload));
    outcome = await executor.resume(threadId, answer);
    options.onOutcome?.(outcome);
  }
  return outcome;
}
