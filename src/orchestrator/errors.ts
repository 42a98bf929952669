export type WorkflowErrorCode = 'STAGE_FAILED' | 'INVALID_THREAD_STATE' | 'THREAD_NOT_FOUND' | 'CHECKPOINT_CONFLICT' | 'CHECKPOINT_LOCKED' | 'CHECKPOINT_CORRUPT' | 'INVALID_GRAPH' | 'INVALID_STATE_UPDATE' | 'STEP_LIMIT_EXCEEDED';

export class WorkflowError extends Error {
  constructor(
    message: string,
    public readonly code: WorkflowErrorCode,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'WorkflowError';
  }
}

/** A stage threw, or produced an update the state schema rejects. Terminal for the invocation. */
export class StageExecutionError extends WorkflowError {
  constructor(
    public readonly threadId: string,
    public readonly stage: string,
    cause: unknown,
  ) {
    super(`Stage [${stage}] failed on thread [${threadId}]: ${describeError(cause)}`, 'STAGE_FAILED', { cause });
    this.name = 'StageExecutionError';
  }
}

/** invoke() on a suspended thread, or resume() on a settled one. */
export class InvalidThreadStateError extends WorkflowError {
  constructor(
    public readonly threadId: string,
    message: string,
  ) {
    super(message, 'INVALID_THREAD_STATE');
    this.name = 'InvalidThreadStateError';
  }
}

export class ThreadNotFoundError extends WorkflowError {
  constructor(public readonly threadId: string) {
    super(`Thread [${threadId}] not found`, 'THREAD_NOT_FOUND');
    this.name = 'ThreadNotFoundError';
  }
}

export class CheckpointConflictError extends WorkflowError {
  constructor(
    public readonly threadId: string,
    public readonly expectedVersion: number,
    public readonly actualVersion: number,
  ) {
    super(`Checkpoint conflict on thread [${threadId}]: expected stored version ${expectedVersion}, found ${actualVersion}`, 'CHECKPOINT_CONFLICT');
    this.name = 'CheckpointConflictError';
  }
}

/** Another writer held the thread's lock file for longer than the store waits. */
export class CheckpointLockedError extends WorkflowError {
  constructor(
    public readonly threadId: string,
    public readonly lockPath: string,
  ) {
    super(`Checkpoint for thread [${threadId}] is locked by another writer (${lockPath})`, 'CHECKPOINT_LOCKED');
    this.name = 'CheckpointLockedError';
  }
}

export class CheckpointCorruptError extends WorkflowError {
  constructor(
    public readonly threadId: string,
    details: string,
    options?: { cause?: unknown },
  ) {
    super(`Checkpoint for thread [${threadId}] is unreadable: ${details}`, 'CHECKPOINT_CORRUPT', options);
    this.name = 'CheckpointCorruptError';
  }
}

export class GraphDefinitionError extends WorkflowError {
  constructor(message: string) {
    super(message, 'INVALID_GRAPH');
    this.name = 'GraphDefinitionError';
  }
}

export class StateUpdateError extends WorkflowError {
  constructor(message: string) {
    super(message, 'INVALID_STATE_UPDATE');
    this.name = 'StateUpdateError';
  }
}

export class StepLimitExceededError extends WorkflowError {
  constructor(
    public readonly threadId: string,
    public readonly limit: number,
  ) {
    super(`Thread [${threadId}] exceeded the limit of ${limit} stage executions in one call`, 'STEP_LIMIT_EXCEEDED');
    this.name = 'StepLimitExceededError';
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
