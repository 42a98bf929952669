import { GraphDefinitionError } from './errors';
import { END } from './stage';
import type { End, PendingResume, RouteFn, StageFn } from './stage';
import type { StateDefinition, StateRecord, StateUpdate } from './state';

export interface StageOptions<S> {
  /**
   * Applied immediately before the stage's own update is merged. Used by the
   * stage that opens a turn to clear what the previous turn left behind.
   */
  turnReset?: StateUpdate<S>;
}

export interface RegisteredStage<S, N extends string> {
  name: N;
  run: StageFn<S, N>;
  turnReset?: StateUpdate<S>;
}

export interface StageGraphOptions<S extends StateRecord, N extends string> {
  state: StateDefinition<S>;
  /** Update recording that a stage completed (e.g. appending to a trace field) */
  recordStage?: (stage: N) => StateUpdate<S>;
  /** Converts the caller's resume value into an update merged before the target stage runs */
  resumeDelta: (value: unknown, pending: PendingResume<N>) => StateUpdate<S>;
}

/**
 * StageGraph holds the stages of a workflow and the edges between them.
 *
 * Stages are registered externally (real agents in production, fakes in
 * tests), keeping the graph itself free of any dependency on what a stage
 * computes. Every stage that can proceed needs an outgoing edge: a fixed one
 * (`addEdge`) or a routing function (`addConditionalEdge`). A stage that only
 * ever suspends needs none.
 */
export class StageGraph<S extends StateRecord, N extends string> {
  private stages = new Map<N, RegisteredStage<S, N>>();
  private routes = new Map<N, RouteFn<S, N>>();
  private entry?: N;

  constructor(private readonly options: StageGraphOptions<S, N>) {}

  get state(): StateDefinition<S> {
    return this.options.state;
  }

  addStage(name: N, run: StageFn<S, N>, options: StageOptions<S> = {}): this {
    if (this.stages.has(name)) {
      throw new GraphDefinitionError(`Stage [${name}] is already registered`);
    }
    this.stages.set(name, { name, run, turnReset: options.turnReset });
    return this;
  }

  addEdge(from: N, to: N | End): this {
    return this.addConditionalEdge(from, () => to);
  }

  addConditionalEdge(from: N, route: RouteFn<S, N>): this {
    if (this.routes.has(from)) {
      throw new GraphDefinitionError(`Stage [${from}] already has an outgoing edge`);
    }
    this.routes.set(from, route);
    return this;
  }

  setEntry(name: N): this {
    this.entry = name;
    return this;
  }

  getEntry(): N {
    if (this.entry === undefined) {
      throw new GraphDefinitionError('No entry stage set');
    }
    return this.entry;
  }

  /** Type guard used when reading stage names back from storage */
  isStage(name: string): name is N {
    for (const stage of this.stages.keys()) {
      if (stage === name) return true;
    }
    return false;
  }

  getStage(name: N): RegisteredStage<S, N> {
    const stage = this.stages.get(name);
    if (!stage) {
      throw new GraphDefinitionError(`No stage registered with name: ${name}`);
    }
    return stage;
  }

  getRegisteredStages(): N[] {
    return [...this.stages.keys()];
  }

  /**
   * Evaluate the outgoing edge of `from` against the merged state.
   * @throws GraphDefinitionError when the stage has no edge or routes to an unknown stage.
   */
  route(from: N, state: Readonly<S>): N | End {
    const route = this.routes.get(from);
    if (!route) {
      throw new GraphDefinitionError(`Stage [${from}] proceeded but has no outgoing edge`);
    }
    const next = route(state);
    if (next !== END && !this.stages.has(next)) {
      throw new GraphDefinitionError(`Stage [${from}] routed to unknown stage [${String(next)}]`);
    }
    return next;
  }

  recordStage(stage: N): StateUpdate<S> | undefined {
    return this.options.recordStage?.(stage);
  }

  resumeDelta(value: unknown, pending: PendingResume<N>): StateUpdate<S> {
    return this.options.resumeDelta(value, pending);
  }

  /**
   * Check the static shape of the graph: an entry is set and every edge
   * starts at a registered stage.
   */
  validate(): void {
    const entry = this.getEntry();
    if (!this.stages.has(entry)) {
      throw new GraphDefinitionError(`Entry stage [${entry}] is not registered`);
    }
    for (const from of this.routes.keys()) {
      if (!this.stages.has(from)) {
        throw new GraphDefinitionError(`Edge starts at unregistered stage [${from}]`);
      }
    }
  }
}
