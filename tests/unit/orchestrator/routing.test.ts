import { END } from '../../../src/orchestrator/stage';
import { routeAfterCompose, routeAfterGather, routeAfterResolve, routeAfterValidate } from '../../../src/orchestrator/routing';
import { ATTEMPT_CAP, CONFIDENCE_THRESHOLD, initialThreadState } from '../../../src/orchestrator/thread-state';
import type { ThreadState } from '../../../src/orchestrator/thread-state';

function stateWith(fields: Partial<ThreadState>): ThreadState {
  return { ...initialThreadState(), ...fields };
}

describe('routeAfterResolve', () => {
  it('should wait for input when clarification is needed', () => {
    expect(routeAfterResolve(stateWith({ clarityStatus: 'needs_clarification' }))).toBe('await-input');
  });

  it('should gather when the query is clear', () => {
    expect(routeAfterResolve(stateWith({ clarityStatus: 'clear' }))).toBe('gather');
  });

  it('should gather when clarity status is absent', () => {
    expect(routeAfterResolve(stateWith({}))).toBe('gather');
  });
});

describe('routeAfterGather', () => {
  it('should use a threshold of 6.0', () => {
    expect(CONFIDENCE_THRESHOLD).toBe(6.0);
  });

  it('should validate below the threshold', () => {
    expect(routeAfterGather(stateWith({ confidenceScore: 5.9 }))).toBe('validate');
    expect(routeAfterGather(stateWith({ confidenceScore: 0 }))).toBe('validate');
  });

  it('should compose at or above the threshold', () => {
    expect(routeAfterGather(stateWith({ confidenceScore: 6.0 }))).toBe('compose');
    expect(routeAfterGather(stateWith({ confidenceScore: 10 }))).toBe('compose');
  });

  it('should treat missing confidence as low', () => {
    expect(routeAfterGather(stateWith({}))).toBe('validate');
  });
});

describe('routeAfterValidate', () => {
  it('should cap attempts at 3', () => {
    expect(ATTEMPT_CAP).toBe(3);
  });

  it('should gather again while insufficient and under the cap', () => {
    expect(routeAfterValidate(stateWith({ validationResult: 'insufficient', attemptCounter: 1 }))).toBe('gather');
    expect(routeAfterValidate(stateWith({ validationResult: 'insufficient', attemptCounter: 2 }))).toBe('gather');
  });

  it('should compose once the cap is reached', () => {
    expect(routeAfterValidate(stateWith({ validationResult: 'insufficient', attemptCounter: 3 }))).toBe('compose');
  });

  it('should compose when findings are sufficient', () => {
    expect(routeAfterValidate(stateWith({ validationResult: 'sufficient', attemptCounter: 1 }))).toBe('compose');
  });

  it('should compose when no grade was recorded', () => {
    expect(routeAfterValidate(stateWith({ attemptCounter: 1 }))).toBe('compose');
  });
});

describe('routeAfterCompose', () => {
  it('should end the turn', () => {
    expect(routeAfterCompose()).toBe(END);
  });
});
