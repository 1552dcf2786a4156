import { describe, expect, it } from 'vitest';

import { InconsistentStateError } from '../errors';
import { assertConsistentSnapshot, resolveMode, TRANSITION_TABLE } from '../mode-controller';
import { MODES, type Mode } from '../types';
import { snapshotOf } from './fakes';

describe('resolveMode', () => {
  it('enters a new learner at intake', () => {
    const decision = resolveMode(snapshotOf());

    expect(decision).toEqual({
      mode: 'INTAKE',
      previousMode: null,
      changed: true,
      reason: 'No mode recorded yet; entering INTAKE.',
      path: []
    });
  });

  it('keeps a learner with an incomplete profile in intake', () => {
    const decision = resolveMode(snapshotOf(), 'INTAKE');

    expect(decision).toEqual({
      mode: 'INTAKE',
      previousMode: 'INTAKE',
      changed: false,
      reason: 'No transition guard matched; staying in INTAKE.',
      path: []
    });
  });

  it('routes a learner with no recorded mode and an active pathway to learning', () => {
    const decision = resolveMode(
      snapshotOf({ profileComplete: true, goalStatus: 'committed', hasActivePathway: true, currentPathwaySkill: 'sql' })
    );

    expect(decision).toEqual({
      mode: 'LEARNING',
      previousMode: null,
      changed: true,
      reason: 'No mode recorded yet; entering PATHWAY. An active pathway exists; supporting learning.',
      path: [{ from: 'PATHWAY', to: 'LEARNING', guard: 'pathway_active' }]
    });
  });

  it('enters a learner with no recorded mode at the stage their state describes', () => {
    expect(resolveMode(snapshotOf({ profileComplete: true })).mode).toBe('GOAL_DISCOVERY');
    expect(resolveMode(snapshotOf({ profileComplete: true, goalStatus: 'committed' })).mode).toBe('PATHWAY');
    expect(
      resolveMode(snapshotOf({ profileComplete: true, goalStatus: 'changed', hasActivePathway: true })).path
    ).toEqual([
      { from: 'PATHWAY', to: 'LEARNING', guard: 'pathway_active' },
      { from: 'LEARNING', to: 'GOAL_DISCOVERY', guard: 'goal_changed' }
    ]);
  });

  it('moves to goal discovery once the profile is complete', () => {
    const decision = resolveMode(snapshotOf({ profileComplete: true }), 'INTAKE');

    expect(decision.mode).toBe('GOAL_DISCOVERY');
    expect(decision.changed).toBe(true);
    expect(decision.path).toEqual([{ from: 'INTAKE', to: 'GOAL_DISCOVERY', guard: 'profile_complete' }]);
    expect(decision.reason).toBe('Profile is complete; moving on to goal discovery.');
  });

  it('plans a pathway for a committed goal without one', () => {
    const decision = resolveMode(snapshotOf({ profileComplete: true, goalStatus: 'committed' }), 'GOAL_DISCOVERY');

    expect(decision.mode).toBe('PATHWAY');
    expect(decision.path).toEqual([
      { from: 'GOAL_DISCOVERY', to: 'PATHWAY', guard: 'goal_committed_without_pathway' }
    ]);
  });

  it('moves to learning once a pathway is active', () => {
    const decision = resolveMode(
      snapshotOf({ profileComplete: true, goalStatus: 'committed', hasActivePathway: true, currentPathwaySkill: 'sql' }),
      'PATHWAY'
    );

    expect(decision.mode).toBe('LEARNING');
    expect(decision.reason).toBe('An active pathway exists; supporting learning.');
  });

  it('returns to goal discovery when the goal changes', () => {
    const decision = resolveMode(
      snapshotOf({ profileComplete: true, goalStatus: 'changed', hasActivePathway: true }),
      'LEARNING'
    );

    expect(decision.mode).toBe('GOAL_DISCOVERY');
    expect(decision.path).toEqual([{ from: 'LEARNING', to: 'GOAL_DISCOVERY', guard: 'goal_changed' }]);
  });

  it('applies chained transitions in one decision', () => {
    const decision = resolveMode(snapshotOf({ profileComplete: true, goalStatus: 'committed' }), 'INTAKE');

    expect(decision.mode).toBe('PATHWAY');
    expect(decision.path.map((step) => step.to)).toEqual(['GOAL_DISCOVERY', 'PATHWAY']);
    expect(decision.reason).toBe(
      'Profile is complete; moving on to goal discovery. Goal is committed and no pathway exists yet; planning the pathway.'
    );
  });

  it('stays in goal discovery while the goal is still being explored', () => {
    const decision = resolveMode(snapshotOf({ profileComplete: true, goalStatus: 'exploring' }), 'GOAL_DISCOVERY');

    expect(decision.mode).toBe('GOAL_DISCOVERY');
    expect(decision.changed).toBe(false);
  });

  it('is idempotent when replayed with the resolved mode', () => {
    const snapshots = [
      snapshotOf(),
      snapshotOf({ profileComplete: true }),
      snapshotOf({ profileComplete: true, goalStatus: 'committed' }),
      snapshotOf({ profileComplete: true, goalStatus: 'committed', hasActivePathway: true }),
      snapshotOf({ profileComplete: true, goalStatus: 'changed', hasActivePathway: true }),
      snapshotOf({ profileComplete: true, goalStatus: 'achieved', hasActivePathway: true })
    ];

    for (const snapshot of snapshots) {
      for (const start of [...MODES, null]) {
        const first = resolveMode(snapshot, start);
        const replay = resolveMode(snapshot, first.mode);

        expect(replay.mode).toBe(first.mode);
        expect(replay.changed).toBe(false);
      }
    }
  });

  it('only produces transitions listed in the table', () => {
    const allowed = new Set(TRANSITION_TABLE.map((rule) => `${rule.from}->${rule.to}`));
    const decision = resolveMode(
      snapshotOf({ profileComplete: true, goalStatus: 'changed', hasActivePathway: true }),
      'LEARNING'
    );

    for (const step of decision.path) {
      expect(allowed.has(`${step.from}->${step.to}`)).toBe(true);
    }
  });

  it('never changes mode without a matching guard', () => {
    const start: Mode = 'LEARNING';
    const decision = resolveMode(
      snapshotOf({ profileComplete: true, goalStatus: 'committed', hasActivePathway: true }),
      start
    );

    expect(decision).toMatchObject({ mode: 'LEARNING', changed: false, path: [] });
  });
});

describe('assertConsistentSnapshot', () => {
  it.each([
    [snapshotOf({ hasActivePathway: true }), 'active pathway without a goal'],
    [snapshotOf({ hasActivePathway: true, goalStatus: 'exploring' }), 'active pathway while the goal is still exploring'],
    [snapshotOf({ goalStatus: 'committed', currentPathwaySkill: 'sql' }), 'current pathway skill without an active pathway']
  ])('rejects %#', (snapshot, violation) => {
    expect(() => assertConsistentSnapshot(snapshot)).toThrow(
      `Learner learner-1 has an inconsistent state: ${violation}`
    );
  });

  it('carries the snapshot and a core origin on the error', () => {
    const snapshot = snapshotOf({ hasActivePathway: true });

    try {
      resolveMode(snapshot);
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(InconsistentStateError);
      if (error instanceof InconsistentStateError) {
        expect(error.snapshot).toBe(snapshot);
        expect(error.violation).toBe('active pathway without a goal');
        expect(error.origin).toBe('core');
        expect(error.statusCode).toBe(409);
      }
    }
  });
});
