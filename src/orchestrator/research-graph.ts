import { StageGraph } from './graph';
import { proceed, suspend } from './stage';
import type { StageFn } from './stage';
import { routeAfterCompose, routeAfterGather, routeAfterResolve, routeAfterValidate } from './routing';
import { CLARIFICATION_FALLBACK, TURN_RESET, threadStateDefinition } from './thread-state';
import type { ResearchStage, ThreadState, ThreadUpdate } from './thread-state';

export type ResearchGraph = StageGraph<ThreadState, ResearchStage>;

/** A stage that always proceeds: it only computes an update. */
export interface StageAgent {
  run(state: Readonly<ThreadState>): Promise<ThreadUpdate>;
}

export interface ResearchAgents {
  resolve: StageAgent;
  gather: StageAgent;
  validate: StageAgent;
  compose: StageAgent;
}

/** Pauses the turn and hands the clarification question to the caller. */
export const awaitInputStage: StageFn<ThreadState, ResearchStage> = (state) => Promise.resolve(suspend(state.clarificationQuestion ?? CLARIFICATION_FALLBACK, 'resolve'));

function asStage(agent: StageAgent): StageFn<ThreadState, ResearchStage> {
  return async (state) => proceed(await agent.run(state));
}

/** Text of the user's answer: strings verbatim, anything else as JSON where it serialises. */
export function resumeText(value: unknown): string {
  if (typeof value === 'string') return value;
  try {
    return JSON.stringify(value) ?? String(value);
  } catch {
    // BigInt and cyclic values
    return String(value);
  }
}

/**
 * resolve ─┬─ needs clarification ─► await-input ─(resume)─► resolve
 *          └─ clear ─► gather ─┬─ confident ─► compose ─► END
 *                              └─ low ─► validate ─┬─ retry ─► gather
 *                                                  └─ done ──► compose
 */
export function createResearchGraph(agents: ResearchAgents): ResearchGraph {
  const graph = new StageGraph<ThreadState, ResearchStage>({
    state: threadStateDefinition,
    recordStage: (stage) => ({ visitedTrace: [stage] }),
    resumeDelta: (value) => {
      const answer = resumeText(value);
      return {
        messageHistory: [{ role: 'user', content: answer }],
        currentQuery: answer,
      };
    },
  });

  graph
    .addStage('resolve', asStage(agents.resolve), { turnReset: TURN_RESET })
    .addStage('await-input', awaitInputStage)
    .addStage('gather', asStage(agents.gather))
    .addStage('validate', asStage(agents.validate))
    .addStage('compose', asStage(agents.compose))
    .setEntry('resolve')
    .addConditionalEdge('resolve', routeAfterResolve)
    .addConditionalEdge('gather', routeAfterGather)
    .addConditionalEdge('validate', routeAfterValidate)
    .addConditionalEdge('compose', routeAfterCompose);

  graph.validate();
  return graph;
}
