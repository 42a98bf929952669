import { CheckpointCorruptError, GraphDefinitionError, InvalidThreadStateError, StageExecutionError, StepLimitExceededError, ThreadNotFoundError, describeError } from './errors';
import { ExecutorEvents } from './events';
import type { StageGraph } from './graph';
import { ConsoleWorkflowLogger } from './logger';
import type { WorkflowLogger } from './logger';
import { END } from './stage';
import type { PendingResume, StageResult } from './stage';
import { mergeAll, mergeState, validateState } from './state';
import type { StateRecord, StateUpdate } from './state';
import type { CheckpointStore, CheckpointSummary, StoredCheckpoint } from './checkpoint-store';
import { ThreadLock } from './thread-lock';

export const DEFAULT_MAX_STEPS = 50;

// ── Options ─────────────────────────────────────────────────────────────

export interface GraphExecutorOptions<S extends StateRecord, N extends string> {
  graph: StageGraph<S, N>;
  store: CheckpointStore;
  /** Logger implementation (defaults to ConsoleWorkflowLogger) */
  logger?: WorkflowLogger;
  /** Shared lock, for several executors over the same store in one process */
  lock?: ThreadLock;
  /** Stage executions allowed in a single invoke/resume call (default: 50) */
  maxSteps?: number;
}

// ── Results ─────────────────────────────────────────────────────────────

export interface ThreadSnapshot<S, N extends string> {
  threadId: string;
  version: number;
  createdAt: string;
  updatedAt: string;
  lastStage?: N;
  pendingResume?: PendingResume<N>;
  state: S;
}

export interface CompletedOutcome<S> {
  status: 'completed';
  threadId: string;
  state: S;
  steps: number;
  durationMs: number;
}

export interface SuspendedOutcome<S, N extends string> {
  status: 'suspended';
  threadId: string;
  state: S;
  /** Value the suspending stage wants shown to the caller */
  payload: unknown;
  stage: N;
  resumeTarget: N;
  steps: number;
  durationMs: number;
}

export type RunOutcome<S, N extends string> = CompletedOutcome<S> | SuspendedOutcome<S, N>;

interface RunContext<S, N extends string> {
  threadId: string;
  version: number;
  createdAt: string;
  state: S;
  stage: N;
  startedAt: number;
}

// ── Executor ────────────────────────────────────────────────────────────

/**
 * GraphExecutor drives threads through a StageGraph.
 *
 * Responsibilities:
 *  - Serialises calls per thread id and checkpoints after every stage
 *  - Merges stage output through the graph's state definition
 *  - Turns a stage's suspension into a resumable checkpoint
 *  - Logs and emits every stage start, completion, suspension and failure
 *
 * A failing stage is never retried and nothing it produced is persisted:
 * the thread stays at its last good checkpoint.
 */
export class GraphExecutor<S extends StateRecord, N extends string> {
  readonly events = new ExecutorEvents();
  private graph: StageGraph<S, N>;
  private store: CheckpointStore;
  private logger: WorkflowLogger;
  private lock: ThreadLock;
  private maxSteps: number;

  constructor(options: GraphExecutorOptions<S, N>) {
    options.graph.validate();
    this.graph = options.graph;
    this.store = options.store;
    this.logger = options.logger ?? new ConsoleWorkflowLogger();
    this.lock = options.lock ?? new ThreadLock();
    this.maxSteps = options.maxSteps ?? DEFAULT_MAX_STEPS;
  }

  // ── Public API ──────────────────────────────────────────────────────

  /**
   * Start a turn on a new or settled thread. The input is merged like any
   * other update and persisted together with the first stage's output.
   * @throws InvalidThreadStateError when the thread is suspended.
   */
  invoke(threadId: string, input: StateUpdate<S> = {}): Promise<RunOutcome<S, N>> {
    return this.lock.runExclusive(threadId, async () => {
      const snapshot = await this.loadSnapshot(threadId);
      if (snapshot?.pendingResume) {
        throw new InvalidThreadStateError(threadId, `Thread [${threadId}] is suspended at [${snapshot.pendingResume.stage}]; resume it instead`);
      }

      const state = mergeState(this.graph.state, snapshot?.state ?? this.graph.state.initial(), input);
      const entry = this.graph.getEntry();
      this.logger.info('Starting turn', { threadId, entry, version: snapshot?.version ?? 0 });

      return this.runLoop({
        threadId,
        version: snapshot?.version ?? 0,
        createdAt: snapshot?.createdAt ?? new Date().toISOString(),
        state,
        stage: entry,
        startedAt: Date.now(),
      });
    });
  }

  /**
   * Continue a suspended thread with the caller's answer. Execution restarts
   * at the resume target the suspending stage named.
   * @throws ThreadNotFoundError for an unknown thread.
   * @throws InvalidThreadStateError when the thread is not suspended.
   */
  resume(threadId: string, value: unknown): Promise<RunOutcome<S, N>> {
    return this.lock.runExclusive(threadId, async () => {
      const snapshot = await this.loadSnapshot(threadId);
      if (!snapshot) {
        throw new ThreadNotFoundError(threadId);
      }
      const pending = snapshot.pendingResume;
      if (!pending) {
        throw new InvalidThreadStateError(threadId, `Thread [${threadId}] is not waiting for input`);
      }

      const state = mergeAll(this.graph.state, snapshot.state, [this.graph.resumeDelta(value, pending), this.graph.recordStage(pending.stage)]);
      this.logger.info('Resuming thread', { threadId, from: pending.stage, target: pending.targetStage });

      return this.runLoop({
        threadId,
        version: snapshot.version,
        createdAt: snapshot.createdAt,
        state,
        stage: pending.targetStage,
        startedAt: Date.now(),
      });
    });
  }

  /** Latest checkpoint of a thread, or null when it has never been saved */
  getThread(threadId: string): Promise<ThreadSnapshot<S, N> | null> {
    return this.loadSnapshot(threadId);
  }

  listThreads(): Promise<CheckpointSummary[]> {
    return this.store.list();
  }

  // ── Run loop ────────────────────────────────────────────────────────

  private async runLoop(ctx: RunContext<S, N>): Promise<RunOutcome<S, N>> {
    const { threadId } = ctx;
    let steps = 0;

    for (;;) {
      if (steps >= this.maxSteps) {
        this.logger.error('Step limit exceeded', { threadId, limit: this.maxSteps, stage: ctx.stage });
        throw new StepLimitExceededError(threadId, this.maxSteps);
      }
      steps++;

      const stage = this.graph.getStage(ctx.stage);
      const stageStart = Date.now();
      this.logger.debug('Running stage', { threadId, stage: stage.name, step: steps });
      this.events.emitEvent('stageStarted', { threadId, stage: stage.name, step: steps, timestamp: new Date().toISOString() });

      let result: StageResult<S, N>;
      let next: S;
      try {
        result = await stage.run(structuredClone(ctx.state));
        next = result.kind === 'proceed' ? mergeAll(this.graph.state, ctx.state, [stage.turnReset, result.update, this.graph.recordStage(stage.name)]) : ctx.state;
      } catch (error) {
        throw this.stageFailed(threadId, stage.name, steps, error);
      }

      if (result.kind === 'suspend') {
        if (!this.graph.isStage(result.resumeTarget)) {
          throw new GraphDefinitionError(`Stage [${stage.name}] suspended with unknown resume target [${String(result.resumeTarget)}]`);
        }
        const pendingResume: PendingResume<N> = {
          stage: stage.name,
          targetStage: result.resumeTarget,
          payload: result.payload,
          suspendedAt: new Date().toISOString(),
        };
        await this.persist(ctx, stage.name, pendingResume);

        this.logger.info('Thread suspended', { threadId, stage: stage.name, resumeTarget: result.resumeTarget });
        this.events.emitEvent('suspended', {
          threadId,
          stage: stage.name,
          step: steps,
          timestamp: pendingResume.suspendedAt,
          resumeTarget: result.resumeTarget,
          payload: result.payload,
        });

        return {
          status: 'suspended',
          threadId,
          state: ctx.state,
          payload: result.payload,
          stage: stage.name,
          resumeTarget: result.resumeTarget,
          steps,
          durationMs: Date.now() - ctx.startedAt,
        };
      }

      ctx.state = next;
      await this.persist(ctx, stage.name);

      const target = this.graph.route(stage.name, ctx.state);
      const durationMs = Date.now() - stageStart;
      this.logger.info(`Stage ${stage.name} completed`, { threadId, durationMs, next: target === END ? 'END' : target });
      this.events.emitEvent('stageCompleted', {
        threadId,
        stage: stage.name,
        step: steps,
        timestamp: new Date().toISOString(),
        durationMs,
        next: target === END ? null : target,
      });

      if (target === END) {
        this.logger.info('Turn completed', { threadId, steps });
        this.events.emitEvent('completed', { threadId, steps, timestamp: new Date().toISOString() });
        return { status: 'completed', threadId, state: ctx.state, steps, durationMs: Date.now() - ctx.startedAt };
      }
      ctx.stage = target;
    }
  }

  private stageFailed(threadId: string, stage: N, step: number, error: unknown): StageExecutionError {
    this.logger.error(`Stage ${stage} failed`, { threadId, error: describeError(error) });
    this.events.emitEvent('failed', { threadId, stage, step, timestamp: new Date().toISOString(), error: describeError(error) });
    return new StageExecutionError(threadId, stage, error);
  }

  // ── Persistence ─────────────────────────────────────────────────────

  private async persist(ctx: RunContext<S, N>, lastStage: N, pendingResume?: PendingResume<N>): Promise<void> {
    const checkpoint: StoredCheckpoint = {
      threadId: ctx.threadId,
      version: ctx.version + 1,
      createdAt: ctx.createdAt,
      updatedAt: new Date().toISOString(),
      lastStage,
      ...(pendingResume ? { pendingResume } : {}),
      state: ctx.state,
    };
    await this.store.save(checkpoint);
    ctx.version = checkpoint.version;
  }

  private async loadSnapshot(threadId: string): Promise<ThreadSnapshot<S, N> | null> {
    const stored = await this.store.load(threadId);
    if (!stored) return null;

    let state: S;
    try {
      state = validateState(this.graph.state, stored.state);
    } catch (error) {
      throw new CheckpointCorruptError(threadId, describeError(error), { cause: error });
    }

    const snapshot: ThreadSnapshot<S, N> = {
      threadId,
      version: stored.version,
      createdAt: stored.createdAt,
      updatedAt: stored.updatedAt,
      state,
    };
    if (stored.lastStage !== undefined) {
      snapshot.lastStage = this.knownStage(threadId, stored.lastStage);
    }
    if (stored.pendingResume) {
      snapshot.pendingResume = {
        stage: this.knownStage(threadId, stored.pendingResume.stage),
        targetStage: this.knownStage(threadId, stored.pendingResume.targetStage),
        payload: stored.pendingResume.payload,
        suspendedAt: stored.pendingResume.suspendedAt,
      };
    }
    return snapshot;
  }

  private knownStage(threadId: string, name: string): N {
    if (!this.graph.isStage(name)) {
      throw new CheckpointCorruptError(threadId, `unknown stage [${name}]`);
    }
    return name;
  }
}
