import type { StateUpdate } from './state';

/** Routing marker: the turn is finished. */
export const END = Symbol('END');
export type End = typeof END;

export interface ProceedResult<S> {
  kind: 'proceed';
  update: StateUpdate<S>;
}

export interface SuspendResult<N extends string> {
  kind: 'suspend';
  /** Surfaced to the caller unmodified */
  payload: unknown;
  /** Stage that runs first when the thread is resumed */
  resumeTarget: N;
}

export type StageResult<S, N extends string> = ProceedResult<S> | SuspendResult<N>;

/**
 * A pluggable unit of work. Receives a private copy of the full thread state
 * and either proceeds with a partial update or asks the executor to suspend.
 * Throwing aborts the invocation.
 */
export type StageFn<S, N extends string> = (state: Readonly<S>) => Promise<StageResult<S, N>>;

/** Pure routing decision evaluated once after a stage proceeds. */
export type RouteFn<S, N extends string> = (state: Readonly<S>) => N | End;

export function proceed<S>(update: StateUpdate<S> = {}): ProceedResult<S> {
  return { kind: 'proceed', update };
}

export function suspend<N extends string>(payload: unknown, resumeTarget: N): SuspendResult<N> {
  return { kind: 'suspend', payload, resumeTarget };
}

/** Continuation recorded on a checkpoint while the thread is suspended. */
export interface PendingResume<N extends string> {
  /** Stage that returned the suspension */
  stage: N;
  targetStage: N;
  payload: unknown;
  suspendedAt: string;
}
