import { InvalidTransitionError, type CaseStatus } from '@testmend/shared';

/**
 * Legal edges of the case lifecycle. Passed, Skipped, FlaggedBug and
 * ExpectedFailure have no outgoing edges.
 */
export const TRANSITIONS: Readonly<Record<CaseStatus, readonly CaseStatus[]>> = {
  Pending: ['Generating'],
  Generating: ['Verifying'],
  Verifying: ['Passed', 'Failed'],
  Failed: ['Healing', 'Escalated'],
  Healing: ['Verifying', 'Escalated'],
  Escalated: ['Healing', 'FlaggedBug', 'Skipped', 'ExpectedFailure'],
  Passed: [],
  Skipped: [],
  FlaggedBug: [],
  ExpectedFailure: [],
};

export function canTransition(from: CaseStatus, to: CaseStatus): boolean {
  return TRANSITIONS[from].includes(to);
}

export function assertTransition(caseId: string, from: CaseStatus, to: CaseStatus): void {
  if (!canTransition(from, to)) {
    throw new InvalidTransitionError(caseId, from, to);
  }
}

/**
 * Whether the engine still has work on a case in this status. An interrupted
 * step is re-run from its start on resume.
 */
export function isResumable(status: CaseStatus): boolean {
  return TRANSITIONS[status].length > 0 && status !== 'Escalated';
}
