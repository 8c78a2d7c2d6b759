import { DeploymentStatus } from '../types';
import { InvalidTransitionError } from '../errors';

const TRANSITIONS: Record<DeploymentStatus, readonly DeploymentStatus[]> = {
  NOT_STARTED: ['IN_PROGRESS'],
  IN_PROGRESS: ['DEPLOYED', 'FAILED'],
  DEPLOYED: ['UPDATING'],
  UPDATING: ['DEPLOYED', 'FAILED'],
  FAILED: ['IN_PROGRESS']
};

export interface TransitionOptions {
  /** Reconciliation and teardown may mark any record FAILED */
  reconcile?: boolean;
}

export function canTransition(
  from: DeploymentStatus,
  to: DeploymentStatus,
  options: TransitionOptions = {}
): boolean {
  if (options.reconcile && to === 'FAILED') {
    return true;
  }
  return TRANSITIONS[from].includes(to);
}

/**
 * @throws InvalidTransitionError
 */
export function assertTransition(
  projectName: string,
  from: DeploymentStatus,
  to: DeploymentStatus,
  options: TransitionOptions = {}
): void {
  if (!canTransition(from, to, options)) {
    throw new InvalidTransitionError(from, to, { projectName });
  }
}
