/**
 * Job Executor: per-cell state machine.
 *
 *   NotStarted → Provisioned → DependenciesInstalled → ProjectInstalled → Tested → Reported
 *
 * Any step failure moves directly to the terminal `Failed` state, recording
 * the stage that failed. Steps are never skipped.
 */

import { AppError, type ErrorCode } from '../errors/errors.ts';

export type JobPhase =
  | 'NotStarted'
  | 'Provisioned'
  | 'DependenciesInstalled'
  | 'ProjectInstalled'
  | 'Tested'
  | 'Reported';

/** Work performed while leaving a phase. */
export type JobStage = 'provision' | 'dependencies' | 'install' | 'test' | 'report';

export interface ActiveJobState {
  readonly kind: JobPhase;
}

export interface FailedJobState {
  readonly kind: 'Failed';
  /** Last phase reached before the failure. */
  readonly after: JobPhase;
  readonly stage: JobStage;
  readonly code: ErrorCode;
  readonly message: string;
}

export type JobState = ActiveJobState | FailedJobState;

const TRANSITIONS: Readonly<Record<JobPhase, { readonly stage: JobStage; readonly next: JobPhase } | null>> = {
  NotStarted: { stage: 'provision', next: 'Provisioned' },
  Provisioned: { stage: 'dependencies', next: 'DependenciesInstalled' },
  DependenciesInstalled: { stage: 'install', next: 'ProjectInstalled' },
  ProjectInstalled: { stage: 'test', next: 'Tested' },
  Tested: { stage: 'report', next: 'Reported' },
  Reported: null,
};

export const INITIAL_JOB_STATE: JobState = Object.freeze({ kind: 'NotStarted' });

export function isTerminal(state: JobState): boolean {
  return state.kind === 'Failed' || state.kind === 'Reported';
}

function transitionFor(state: JobState): { readonly stage: JobStage; readonly next: JobPhase } {
  const transition = state.kind === 'Failed' ? null : TRANSITIONS[state.kind];
  if (!transition) {
    throw new AppError('JOB_INVALID_TRANSITION', `No transition out of terminal state ${state.kind}`, {
      details: { state },
    });
  }
  return transition;
}

/**
 * Stage that runs next from the given state.
 *
 * @throws {AppError} `JOB_INVALID_TRANSITION` for terminal states.
 */
export function pendingStage(state: JobState): JobStage {
  return transitionFor(state).stage;
}

/**
 * Move to the next phase after the pending stage succeeded.
 */
export function advance(state: JobState): JobState {
  return Object.freeze({ kind: transitionFor(state).next });
}

/**
 * Record a failure of the pending stage.
 */
export function failJob(state: JobState, code: ErrorCode, message: string): JobState {
  const { stage } = transitionFor(state);
  // transitionFor rejects Failed, so kind is a phase here
  const after: JobPhase = state.kind === 'Failed' ? state.after : state.kind;
  return Object.freeze({ kind: 'Failed', after, stage, code, message });
}
