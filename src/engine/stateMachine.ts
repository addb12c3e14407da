import type { EventStatus, WaveObservation } from '../types/wave';

const VALID_TRANSITIONS: Record<EventStatus, EventStatus[]> = {
  undefined: ['next', 'soon', 'running', 'done'],
  next: ['undefined', 'soon', 'running', 'done'],
  soon: ['undefined', 'running', 'done'],
  running: ['undefined', 'done'],
  done: [],
};

export function canTransition(from: EventStatus, to: EventStatus): boolean {
  if (from === to) return true;
  return VALID_TRANSITIONS[from].includes(to);
}

export type ValidationIssueKind =
  | 'progression_out_of_range'
  | 'done_incomplete'
  | 'running_without_progression'
  | 'progression_regressed'
  | 'backward_transition'
  | 'conflicting_user_state';

export interface ValidationIssue {
  kind: ValidationIssueKind;
  message: string;
}

/**
 * Anomalies between two consecutive observations. Statuses are driven by the
 * event timeline; these are reported, never enforced.
 */
export function validateTransition(
  previous: WaveObservation | null,
  current: WaveObservation,
): ValidationIssue[] {
  const issues: ValidationIssue[] = [];
  const { progression, status } = current;

  if (progression < 0 || progression > 100) {
    issues.push({ kind: 'progression_out_of_range', message: `Progression out of range: ${progression}` });
  }
  if (status === 'done' && progression < 100) {
    issues.push({ kind: 'done_incomplete', message: `Status done with progression ${progression}` });
  }
  if (status === 'running' && progression <= 0) {
    issues.push({ kind: 'running_without_progression', message: `Status running with progression ${progression}` });
  }

  if (previous) {
    if (progression < previous.progression && status !== 'done') {
      issues.push({
        kind: 'progression_regressed',
        message: `Progression went backwards: ${previous.progression} → ${progression}`,
      });
    }
    if (!canTransition(previous.status, status)) {
      issues.push({
        kind: 'backward_transition',
        message: `Backward status transition: ${previous.status} → ${status}`,
      });
    }
  }

  return issues;
}

export interface UserHitState {
  isUserWarmingInProgress: boolean;
  userIsGoingToBeHit: boolean;
  userHasBeenHit: boolean;
  userIsInArea: boolean;
}

/** Mutually exclusive user flags that are set together */
export function validateUserState(state: UserHitState): ValidationIssue[] {
  const issues: ValidationIssue[] = [];
  const conflict = (message: string) => issues.push({ kind: 'conflicting_user_state', message });

  if (state.userHasBeenHit && state.userIsGoingToBeHit) conflict('User both hit and about to be hit');
  if (state.userHasBeenHit && state.isUserWarmingInProgress) conflict('User both hit and warming');
  if (state.userIsGoingToBeHit && state.isUserWarmingInProgress) conflict('User both warming and about to be hit');
  if (state.userIsGoingToBeHit && !state.userIsInArea) conflict('User about to be hit outside the area');
  return issues;
}
