import { END } from './stage';
import type { End } from './stage';
import { ATTEMPT_CAP, CONFIDENCE_THRESHOLD } from './thread-state';
import type { ResearchStage, ThreadState } from './thread-state';

export function routeAfterResolve(state: Readonly<ThreadState>): ResearchStage {
  return state.clarityStatus === 'needs_clarification' ? 'await-input' : 'gather';
}

/** Missing confidence counts as low. */
export function routeAfterGather(state: Readonly<ThreadState>): ResearchStage {
  if (state.confidenceScore === undefined || state.confidenceScore < CONFIDENCE_THRESHOLD) {
    return 'validate';
  }
  return 'compose';
}

export function routeAfterValidate(state: Readonly<ThreadState>): ResearchStage {
  if (state.validationResult === 'insufficient' && state.attemptCounter < ATTEMPT_CAP) {
    return 'gather';
  }
  return 'compose';
}

export function routeAfterCompose(): End {
  return END;
}
