import { z } from 'zod';
import type { MergePolicy, StateDefinition, StateUpdate } from './state';

// ── Stages ──────────────────────────────────────────────────────────────

export const RESEARCH_STAGES = ['resolve', 'await-input', 'gather', 'validate', 'compose'] as const;

export type ResearchStage = (typeof RESEARCH_STAGES)[number];

/** Confidence below this sends findings to validation */
export const CONFIDENCE_THRESHOLD = 6.0;

/** Maximum validate runs per turn */
export const ATTEMPT_CAP = 3;

export const CLARIFICATION_FALLBACK = 'Your question about the company is ambiguous. Please clarify which company or topic you are interested in.';

// ── Schema ──────────────────────────────────────────────────────────────

export const ThreadMessageSchema = z
  .object({
    role: z.enum(['user', 'assistant']),
    content: z.string(),
    /** Stage that produced an assistant message */
    stage: z.string().optional(),
  })
  .strict();

export type ThreadMessage = z.infer<typeof ThreadMessageSchema>;

export const ThreadStateSchema = z
  .object({
    messageHistory: z.array(ThreadMessageSchema),
    currentQuery: z.string().optional(),
    subjectEntity: z.string().optional(),
    lastResolvedSubject: z.string().optional(),
    clarityStatus: z.enum(['clear', 'needs_clarification']).optional(),
    clarificationQuestion: z.string().optional(),
    researchFindings: z.string().optional(),
    confidenceScore: z.number().min(0).max(10).optional(),
    validationResult: z.enum(['sufficient', 'insufficient']).optional(),
    attemptCounter: z.number().int().min(0).max(ATTEMPT_CAP),
    finalResponse: z.string().optional(),
    visitedTrace: z.array(z.string()),
  })
  .strict()
  .refine((state) => state.clarificationQuestion === undefined || state.clarityStatus === 'needs_clarification', {
    message: 'clarificationQuestion is only allowed while clarification is needed',
    path: ['clarificationQuestion'],
  });

export type ThreadState = z.infer<typeof ThreadStateSchema>;

export type ThreadUpdate = StateUpdate<ThreadState>;

// ── Merge policy ────────────────────────────────────────────────────────

export const THREAD_MERGE_POLICY: MergePolicy<ThreadState> = {
  messageHistory: 'append',
  currentQuery: 'overwrite',
  subjectEntity: 'overwrite',
  lastResolvedSubject: 'overwrite',
  clarityStatus: 'overwrite',
  clarificationQuestion: 'overwrite',
  researchFindings: 'overwrite',
  confidenceScore: 'overwrite',
  validationResult: 'overwrite',
  attemptCounter: 'overwrite',
  finalResponse: 'overwrite',
  visitedTrace: 'append',
};

/** Cleared when `resolve` opens a new turn, before its own output lands */
export const TURN_RESET: ThreadUpdate = {
  attemptCounter: 0,
  validationResult: null,
  confidenceScore: null,
  researchFindings: null,
  finalResponse: null,
};

export function initialThreadState(): ThreadState {
  return { messageHistory: [], attemptCounter: 0, visitedTrace: [] };
}

export const threadStateDefinition: StateDefinition<ThreadState> = {
  schema: ThreadStateSchema,
  policy: THREAD_MERGE_POLICY,
  initial: initialThreadState,
};

/** Input delta for a new user turn */
export function userTurn(query: string): ThreadUpdate {
  return {
    messageHistory: [{ role: 'user', content: query }],
    currentQuery: query,
  };
}
