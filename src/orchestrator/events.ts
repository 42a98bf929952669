import { EventEmitter } from 'events';

export interface StageEvent {
  threadId: string;
  stage: string;
  step: number;
  timestamp: string;
}

export interface StageCompletedEvent extends StageEvent {
  durationMs: number;
  /** Stage chosen by the routing function, or null when the turn ended */
  next: string | null;
}

export interface SuspendedEvent extends StageEvent {
  resumeTarget: string;
  payload: unknown;
}

export interface StageFailedEvent extends StageEvent {
  error: string;
}

export interface TurnCompletedEvent {
  threadId: string;
  steps: number;
  timestamp: string;
}

export interface ExecutorEventMap {
  stageStarted: StageEvent;
  stageCompleted: StageCompletedEvent;
  suspended: SuspendedEvent;
  failed: StageFailedEvent;
  completed: TurnCompletedEvent;
}

export class ExecutorEvents extends EventEmitter {
  emitEvent<K extends keyof ExecutorEventMap>(name: K, event: ExecutorEventMap[K]): void {
    this.emit(name, event);
  }

  onEvent<K extends keyof ExecutorEventMap>(name: K, listener: (event: ExecutorEventMap[K]) => void): this {
    return this.on(name, listener);
  }
}
