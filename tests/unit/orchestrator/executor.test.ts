import { z } from 'zod';
import { CheckpointConflictError, CheckpointCorruptError, GraphDefinitionError, InvalidThreadStateError, StageExecutionError, StateUpdateError, StepLimitExceededError, ThreadNotFoundError } from '../../../src/orchestrator/errors';
import { MemoryCheckpointStore } from '../../../src/orchestrator/checkpoint-store';
import { GraphExecutor } from '../../../src/orchestrator/executor';
import { StageGraph } from '../../../src/orchestrator/graph';
import { END, proceed, suspend } from '../../../src/orchestrator/stage';
import type { StageFn } from '../../../src/orchestrator/stage';
import type { StateDefinition } from '../../../src/orchestrator/state';
import { createSilentLogger } from '../../helpers/research-fakes';

// ── Helpers ─────────────────────────────────────────────────────────────

const TallySchema = z
  .object({
    entries: z.array(z.string()),
    trace: z.array(z.string()),
    total: z.number().int().min(0).max(100),
    label: z.string().optional(),
  })
  .strict();

type Tally = z.infer<typeof TallySchema>;
type Step = 'open' | 'ask' | 'add' | 'close';

const tallyDefinition: StateDefinition<Tally> = {
  schema: TallySchema,
  policy: { entries: 'append', trace: 'append', total: 'overwrite', label: 'overwrite' },
  initial: () => ({ entries: [], trace: [], total: 0 }),
};

interface Stages {
  open: StageFn<Tally, Step>;
  ask: StageFn<Tally, Step>;
  add: StageFn<Tally, Step>;
  close: StageFn<Tally, Step>;
}

/** open ─► (label missing ? ask : add) ─► close ─► END; ask suspends back to open */
function createGraph(overrides: Partial<Stages> = {}): StageGraph<Tally, Step> {
  const stages: Stages = {
    open: () => Promise.resolve(proceed<Tally>({})),
    ask: () => Promise.resolve(suspend('Label?', 'open')),
    add: (state) => Promise.resolve(proceed<Tally>({ total: state.total + 1 })),
    close: () => Promise.resolve(proceed<Tally>({ entries: ['closed'] })),
    ...overrides,
  };

  return new StageGraph<Tally, Step>({
    state: tallyDefinition,
    recordStage: (stage) => ({ trace: [stage] }),
    resumeDelta: (value) => ({ label: String(value), entries: [`answer:${String(value)}`] }),
  })
    .addStage('open', stages.open, { turnReset: { total: 0 } })
    .addStage('ask', stages.ask)
    .addStage('add', stages.add)
    .addStage('close', stages.close)
    .setEntry('open')
    .addConditionalEdge('open', (state) => (state.label === undefined ? 'ask' : 'add'))
    .addEdge('add', 'close')
    .addEdge('close', END);
}

function createExecutor(graph = createGraph(), store = new MemoryCheckpointStore(), maxSteps?: number): GraphExecutor<Tally, Step> {
  return new GraphExecutor({ graph, store, logger: createSilentLogger(), maxSteps });
}

// ═══════════════════════════════════════════════════════════════════════
// invoke
// ═══════════════════════════════════════════════════════════════════════

describe('GraphExecutor.invoke', () => {
  it('should run to completion and checkpoint after every stage', async () => {
    const store = new MemoryCheckpointStore();
    const executor = createExecutor(createGraph(), store);

    const outcome = await executor.invoke('t-1', { label: 'sum', entries: ['input'] });

    expect(outcome.status).toBe('completed');
    expect(outcome.steps).toBe(3);
    expect(outcome.state).toEqual({ entries: ['input', 'closed'], trace: ['open', 'add', 'close'], total: 1, label: 'sum' });

    const snapshot = await executor.getThread('t-1');
    expect(snapshot?.version).toBe(3);
    expect(snapshot?.lastStage).toBe('close');
    expect(snapshot?.pendingResume).toBeUndefined();
    expect(snapshot?.state).toEqual(outcome.state);
  });

  it('should apply the turn reset before the stage update', async () => {
    const executor = createExecutor(createGraph({ open: (state) => Promise.resolve(proceed<Tally>({ entries: [`seen:${state.total}`] })) }));

    await executor.invoke('t-1', { label: 'x' });
    const second = await executor.invoke('t-1', {});

    // The stage still sees the previous total; the merged state starts from zero
    expect(second.state.entries).toEqual(['seen:0', 'closed', 'seen:1', 'closed']);
    expect(second.state.total).toBe(1);
  });

  it('should hand each stage a private copy of the state', async () => {
    const open: StageFn<Tally, Step> = (state) => {
      state.entries.push('mutated');
      return Promise.resolve(proceed<Tally>({}));
    };
    const executor = createExecutor(createGraph({ open }));

    const outcome = await executor.invoke('t-1', { label: 'x' });
    expect(outcome.state.entries).toEqual(['closed']);
  });

  it('should reject a suspended thread', async () => {
    const executor = createExecutor();
    await executor.invoke('t-1', {});

    await expect(executor.invoke('t-1', { label: 'x' })).rejects.toThrow(InvalidThreadStateError);
  });

  it('should reject an invalid input without touching the thread', async () => {
    const executor = createExecutor();
    await expect(executor.invoke('t-1', { total: 500 })).rejects.toThrow(StateUpdateError);
    expect(await executor.getThread('t-1')).toBeNull();
  });

  it('should list every checkpointed thread', async () => {
    const executor = createExecutor();
    await executor.invoke('t-a', { label: 'a' });
    await executor.invoke('t-b', {});

    const summaries = await executor.listThreads();

    expect(summaries.map(({ threadId, suspended, lastStage }) => ({ threadId, suspended, lastStage })).sort((x, y) => x.threadId.localeCompare(y.threadId))).toEqual([
      { threadId: 't-a', suspended: false, lastStage: 'close' },
      { threadId: 't-b', suspended: true, lastStage: 'ask' },
    ]);
  });

  it('should emit stage events in order', async () => {
    const executor = createExecutor();
    const seen: string[] = [];
    executor.events.onEvent('stageStarted', (e) => seen.push(`start:${e.stage}`));
    executor.events.onEvent('stageCompleted', (e) => seen.push(`done:${e.stage}->${e.next ?? 'END'}`));
    executor.events.onEvent('completed', (e) => seen.push(`completed:${e.steps}`));

    await executor.invoke('t-1', { label: 'x' });

    expect(seen).toEqual(['start:open', 'done:open->add', 'start:add', 'done:add->close', 'start:close', 'done:close->END', 'completed:3']);
  });
});

// ═══════════════════════════════════════════════════════════════════════
// Suspension and resume
// ═══════════════════════════════════════════════════════════════════════

describe('GraphExecutor suspension', () => {
  it('should return the payload and record the continuation', async () => {
    const executor = createExecutor();
    const suspended = jest.fn();
    executor.events.onEvent('suspended', suspended);

    const outcome = await executor.invoke('t-1', {});

    expect(outcome).toMatchObject({ status: 'suspended', payload: 'Label?', stage: 'ask', resumeTarget: 'open', steps: 2 });
    expect(outcome.state.trace).toEqual(['open']);
    expect(suspended).toHaveBeenCalledWith(expect.objectContaining({ threadId: 't-1', stage: 'ask', resumeTarget: 'open', payload: 'Label?' }));

    const snapshot = await executor.getThread('t-1');
    expect(snapshot?.version).toBe(2);
    expect(snapshot?.lastStage).toBe('ask');
    expect(snapshot?.pendingResume).toMatchObject({ stage: 'ask', targetStage: 'open', payload: 'Label?' });
  });

  it('should resume at the target with the resume delta merged', async () => {
    const executor = createExecutor();
    await executor.invoke('t-1', {});

    const outcome = await executor.resume('t-1', 'count');

    expect(outcome.status).toBe('completed');
    expect(outcome.state).toEqual({
      entries: ['answer:count', 'closed'],
      trace: ['open', 'ask', 'open', 'add', 'close'],
      total: 1,
      label: 'count',
    });
    const snapshot = await executor.getThread('t-1');
    expect(snapshot?.pendingResume).toBeUndefined();
    expect(snapshot?.version).toBe(5);
  });

  it('should reject resume on an unknown thread', async () => {
    await expect(createExecutor().resume('missing', 'x')).rejects.toThrow(ThreadNotFoundError);
  });

  it('should reject resume on a settled thread', async () => {
    const executor = createExecutor();
    await executor.invoke('t-1', { label: 'x' });

    await expect(executor.resume('t-1', 'y')).rejects.toThrow(InvalidThreadStateError);
  });

  it('should keep the thread suspended when the resumed stage fails', async () => {
    let fail = true;
    const open: StageFn<Tally, Step> = () => (fail ? Promise.reject(new Error('boom')) : Promise.resolve(proceed<Tally>({})));
    const executor = createExecutor(createGraph({ open }));

    fail = false;
    await executor.invoke('t-1', {});
    fail = true;

    await expect(executor.resume('t-1', 'x')).rejects.toThrow(StageExecutionError);
    const snapshot = await executor.getThread('t-1');
    expect(snapshot?.version).toBe(2);
    expect(snapshot?.pendingResume?.targetStage).toBe('open');
  });

  it('should reject a suspension naming an unknown stage', async () => {
    const graph = new StageGraph<Tally, Step>({ state: tallyDefinition, resumeDelta: () => ({}) })
      .addStage('open', () => Promise.resolve(suspend('?', 'close')))
      .setEntry('open');
    const executor = createExecutor(graph);

    await expect(executor.invoke('t-1', {})).rejects.toThrow(GraphDefinitionError);
  });
});

// ═══════════════════════════════════════════════════════════════════════
// Failures
// ═══════════════════════════════════════════════════════════════════════

describe('GraphExecutor failures', () => {
  it('should wrap a throwing stage and persist nothing from it', async () => {
    const add: StageFn<Tally, Step> = () => Promise.reject(new Error('service unavailable'));
    const executor = createExecutor(createGraph({ add }));
    const failed = jest.fn();
    executor.events.onEvent('failed', failed);

    const error: unknown = await executor.invoke('t-1', { label: 'x' }).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(StageExecutionError);
    expect(error).toMatchObject({ threadId: 't-1', stage: 'add', code: 'STAGE_FAILED' });
    expect(failed).toHaveBeenCalledWith(expect.objectContaining({ stage: 'add', error: 'service unavailable' }));

    const snapshot = await executor.getThread('t-1');
    expect(snapshot?.version).toBe(1);
    expect(snapshot?.lastStage).toBe('open');
    expect(snapshot?.state.trace).toEqual(['open']);
  });

  it('should leave a new thread unsaved when the first stage fails', async () => {
    const open: StageFn<Tally, Step> = () => Promise.reject(new Error('boom'));
    const executor = createExecutor(createGraph({ open }));

    await expect(executor.invoke('t-1', { entries: ['input'] })).rejects.toThrow(StageExecutionError);
    expect(await executor.getThread('t-1')).toBeNull();
  });

  it('should treat an update the schema rejects as a stage failure', async () => {
    const add: StageFn<Tally, Step> = () => Promise.resolve(proceed<Tally>({ total: 101 }));
    const executor = createExecutor(createGraph({ add }));

    const error: unknown = await executor.invoke('t-1', { label: 'x' }).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(StageExecutionError);
    expect(error instanceof StageExecutionError && error.cause).toBeInstanceOf(StateUpdateError);
  });

  it('should stop a looping graph at the step limit', async () => {
    const graph = new StageGraph<Tally, Step>({ state: tallyDefinition, resumeDelta: () => ({}) })
      .addStage('open', (state) => Promise.resolve(proceed<Tally>({ total: state.total + 1 })))
      .setEntry('open')
      .addEdge('open', 'open');
    const executor = createExecutor(graph, new MemoryCheckpointStore(), 4);

    await expect(executor.invoke('t-1', {})).rejects.toThrow(StepLimitExceededError);
    const snapshot = await executor.getThread('t-1');
    expect(snapshot?.version).toBe(4);
    expect(snapshot?.state.total).toBe(4);
  });

  it('should surface a conflicting write from another process', async () => {
    const store = new MemoryCheckpointStore();
    const open: StageFn<Tally, Step> = async () => {
      const now = new Date().toISOString();
      await store.save({ threadId: 't-1', version: 1, createdAt: now, updatedAt: now, state: { entries: [], trace: [], total: 0 } });
      return proceed<Tally>({});
    };
    const executor = createExecutor(createGraph({ open }), store);

    await expect(executor.invoke('t-1', { label: 'x' })).rejects.toThrow(CheckpointConflictError);
  });

  it('should refuse a stored state that fails the schema', async () => {
    const store = new MemoryCheckpointStore();
    const now = new Date().toISOString();
    await store.save({ threadId: 't-1', version: 1, createdAt: now, updatedAt: now, state: { entries: 'broken' } });

    await expect(createExecutor(createGraph(), store).getThread('t-1')).rejects.toThrow(CheckpointCorruptError);
  });

  it('should refuse a stored stage name the graph does not know', async () => {
    const store = new MemoryCheckpointStore();
    const now = new Date().toISOString();
    await store.save({ threadId: 't-1', version: 1, createdAt: now, updatedAt: now, lastStage: 'gone', state: { entries: [], trace: [], total: 0 } });

    await expect(createExecutor(createGraph(), store).getThread('t-1')).rejects.toThrow('unknown stage [gone]');
  });
});

// ═══════════════════════════════════════════════════════════════════════
// Concurrency
// ═══════════════════════════════════════════════════════════════════════

describe('GraphExecutor concurrency', () => {
  it('should serialise calls on the same thread', async () => {
    const executor = createExecutor();

    const [first, second] = await Promise.allSettled([executor.invoke('t-1', { label: 'a' }), executor.invoke('t-1', {})]);

    expect(first.status).toBe('fulfilled');
    expect(second.status).toBe('fulfilled');
    const snapshot = await executor.getThread('t-1');
    expect(snapshot?.version).toBe(6);
    expect(snapshot?.state.trace).toEqual(['open', 'add', 'close', 'open', 'add', 'close']);
  });

  it('should run different threads independently', async () => {
    const executor = createExecutor();

    const [a, b] = await Promise.all([executor.invoke('t-a', { label: 'a' }), executor.invoke('t-b', {})]);

    expect(a.status).toBe('completed');
    expect(b.status).toBe('suspended');
  });
});
