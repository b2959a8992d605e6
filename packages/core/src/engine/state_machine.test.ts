import { CASE_STATUSES, InvalidTransitionError } from '@testmend/shared';
import { assertTransition, canTransition, isResumable, TRANSITIONS } from './state_machine';

describe('state machine', () => {
  it('follows the lifecycle of a healed case', () => {
    const path = ['Pending', 'Generating', 'Verifying', 'Failed', 'Healing', 'Verifying', 'Passed'] as const;
    for (let i = 1; i < path.length; i++) {
      expect(() => assertTransition('c1', path[i - 1], path[i])).not.toThrow();
    }
  });

  it('never leaves Passed', () => {
    for (const to of CASE_STATUSES) {
      expect(canTransition('Passed', to)).toBe(false);
    }
  });

  it('only leaves Escalated through a verdict', () => {
    expect(TRANSITIONS.Escalated).toEqual(['Healing', 'FlaggedBug', 'Skipped', 'ExpectedFailure']);
    expect(canTransition('Escalated', 'Verifying')).toBe(false);
  });

  it('rejects skipping verification', () => {
    expect(() => assertTransition('c1', 'Healing', 'Passed')).toThrow(InvalidTransitionError);
    expect(() => assertTransition('c1', 'Healing', 'Passed')).toThrow(
      'Case "c1" cannot move from Healing to Passed',
    );
  });

  it('resumes in-flight statuses only', () => {
    expect(CASE_STATUSES.filter(isResumable)).toEqual([
      'Pending',
      'Generating',
      'Verifying',
      'Failed',
      'Healing',
    ]);
  });
});
