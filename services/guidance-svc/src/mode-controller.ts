import { InconsistentStateError } from './errors';
import type { LearnerSnapshot, Mode, ModeDecision, ModeTransition } from './types';

export const INITIAL_MODE: Mode = 'INTAKE';

/** Mode a caller falls back to after an InconsistentStateError. */
export const SAFE_FALLBACK_MODE: Mode = 'INTAKE';

interface TransitionRule {
  from: Mode;
  to: Mode;
  guard: string;
  reason: string;
  test: (snapshot: LearnerSnapshot) => boolean;
}

/** Evaluated top to bottom; the first rule whose `from` and guard match wins. */
export const TRANSITION_TABLE: readonly TransitionRule[] = Object.freeze([
  {
    from: 'INTAKE',
    to: 'GOAL_DISCOVERY',
    guard: 'profile_complete',
    reason: 'Profile is complete; moving on to goal discovery.',
    test: (snapshot) => snapshot.profileComplete
  },
  {
    from: 'GOAL_DISCOVERY',
    to: 'PATHWAY',
    guard: 'goal_committed_without_pathway',
    reason: 'Goal is committed and no pathway exists yet; planning the pathway.',
    test: (snapshot) => snapshot.goalStatus === 'committed' && !snapshot.hasActivePathway
  },
  {
    from: 'PATHWAY',
    to: 'LEARNING',
    guard: 'pathway_active',
    reason: 'An active pathway exists; supporting learning.',
    test: (snapshot) => snapshot.hasActivePathway
  },
  {
    from: 'LEARNING',
    to: 'GOAL_DISCOVERY',
    guard: 'goal_changed',
    reason: 'Goal was changed; returning to goal discovery.',
    test: (snapshot) => snapshot.goalStatus === 'changed'
  }
] satisfies TransitionRule[]);

/**
 * Throws InconsistentStateError when the persisted state cannot describe a real
 * learner: an active pathway needs a goal past exploring, and a current pathway
 * skill needs an active pathway.
 */
export function assertConsistentSnapshot(snapshot: LearnerSnapshot): void {
  if (snapshot.hasActivePathway && snapshot.goalStatus === null) {
    throw new InconsistentStateError(snapshot, 'active pathway without a goal');
  }

  if (snapshot.hasActivePathway && snapshot.goalStatus === 'exploring') {
    throw new InconsistentStateError(snapshot, 'active pathway while the goal is still exploring');
  }

  if (snapshot.currentPathwaySkill !== undefined && !snapshot.hasActivePathway) {
    throw new InconsistentStateError(snapshot, 'current pathway skill without an active pathway');
  }
}

/**
 * Where a learner with no recorded mode enters the table. A learner with an
 * active pathway enters at PATHWAY so the table can carry them to LEARNING.
 */
export function entryModeFor(snapshot: LearnerSnapshot): Mode {
  if (!snapshot.profileComplete) {
    return INITIAL_MODE;
  }
  if (snapshot.hasActivePathway) {
    return 'PATHWAY';
  }
  return 'GOAL_DISCOVERY';
}

function findRule(mode: Mode, snapshot: LearnerSnapshot): TransitionRule | undefined {
  return TRANSITION_TABLE.find((rule) => rule.from === mode && rule.test(snapshot));
}

/**
 * Decides the mode for this turn. Pure: the caller persists the result.
 *
 * Without a recorded mode the learner enters at {@link entryModeFor}. Guards are
 * re-applied after each transition until none matches, so replaying the same
 * snapshot with the returned mode yields that mode with `changed: false`.
 */
export function resolveMode(snapshot: LearnerSnapshot, currentMode: Mode | null = null): ModeDecision {
  assertConsistentSnapshot(snapshot);

  const path: ModeTransition[] = [];
  const reasons: string[] = [];
  let mode = currentMode ?? entryModeFor(snapshot);

  if (currentMode === null) {
    reasons.push(`No mode recorded yet; entering ${mode}.`);
  }

  for (let step = 0; step < TRANSITION_TABLE.length; step += 1) {
    const rule = findRule(mode, snapshot);
    if (!rule) {
      break;
    }

    path.push({ from: rule.from, to: rule.to, guard: rule.guard });
    reasons.push(rule.reason);
    mode = rule.to;
  }

  return {
    mode,
    previousMode: currentMode,
    changed: mode !== currentMode,
    reason: reasons.length > 0 ? reasons.join(' ') : `No transition guard matched; staying in ${mode}.`,
    path
  };
}
