import type { Logger } from 'pino';

import type { GuidancePgClient } from './pg-client';
import {
  MODES,
  type GoalStatus,
  type LearnerSnapshot,
  type LearnerStatus,
  type Mode,
  type ModeTransitionRecord
} from './types';

export interface StoredLearnerState {
  snapshot: LearnerSnapshot;
  /** Last persisted mode; null when the learner has never been routed. */
  currentMode: Mode | null;
}

export interface LearnerStore {
  readSnapshot(learnerId: string): Promise<StoredLearnerState | null>;
  readSkills(learnerId: string): Promise<string[]>;
  recordTransition(record: ModeTransitionRecord): Promise<void>;
}

interface SnapshotRow {
  learner_id: string;
  status: string | null;
  profile_complete: boolean | null;
  goal_status: string | null;
  has_active_pathway: boolean;
  current_pathway_skill: string | null;
  current_mode: string | null;
}

const LEARNER_STATUSES: readonly LearnerStatus[] = ['new', 'active', 'paused', 'completed'];
const GOAL_STATUSES: readonly GoalStatus[] = ['exploring', 'committed', 'achieved', 'changed'];

const COLLABORATOR = 'learner-store';

function isLearnerStatus(value: string): value is LearnerStatus {
  return (LEARNER_STATUSES as readonly string[]).includes(value);
}

function isGoalStatus(value: string): value is GoalStatus {
  return (GOAL_STATUSES as readonly string[]).includes(value);
}

function isMode(value: string): value is Mode {
  return (MODES as readonly string[]).includes(value);
}

export class PgLearnerStore implements LearnerStore {
  private readonly schema: string;

  constructor(private readonly client: GuidancePgClient, private readonly logger: Logger) {
    this.schema = client.schema;
  }

  async readSnapshot(learnerId: string): Promise<StoredLearnerState | null> {
    const s = this.schema;
    const rows = await this.client.query<SnapshotRow>(
      COLLABORATOR,
      'readSnapshot',
      `SELECT
         l.id AS learner_id,
         l.status,
         p.profile_complete,
         (SELECT g.status FROM ${s}.learner_goals g
            WHERE g.learner_id = l.id
            ORDER BY g.created_at DESC LIMIT 1) AS goal_status,
         EXISTS (SELECT 1 FROM ${s}.pathways pw
            WHERE pw.learner_id = l.id AND pw.status = 'active') AS has_active_pathway,
         (SELECT ps.skill_name FROM ${s}.pathway_skills ps
            JOIN ${s}.pathways pw ON pw.id = ps.pathway_id
            WHERE pw.learner_id = l.id AND pw.status = 'active' AND ps.status <> 'completed'
            ORDER BY ps.sequence_order ASC LIMIT 1) AS current_pathway_skill,
         (SELECT t.to_mode FROM ${s}.mode_transitions t
            WHERE t.learner_id = l.id
            ORDER BY t.decided_at DESC, t.id DESC LIMIT 1) AS current_mode
       FROM ${s}.learners l
       LEFT JOIN ${s}.learner_profiles p ON p.learner_id = l.id
       WHERE l.id = $1`,
      [learnerId]
    );

    const [row] = rows;
    if (!row) {
      return null;
    }

    return { snapshot: this.toSnapshot(row), currentMode: this.toMode(row) };
  }

  async readSkills(learnerId: string): Promise<string[]> {
    const rows = await this.client.query<{ skill_name: string }>(
      COLLABORATOR,
      'readSkills',
      `SELECT skill_name FROM ${this.schema}.learner_skills WHERE learner_id = $1 ORDER BY created_at ASC`,
      [learnerId]
    );
    return rows.map((row) => row.skill_name);
  }

  async recordTransition(record: ModeTransitionRecord): Promise<void> {
    await this.client.query(
      COLLABORATOR,
      'recordTransition',
      `INSERT INTO ${this.schema}.mode_transitions (learner_id, from_mode, to_mode, reason, decided_at)
       VALUES ($1, $2, $3, $4, $5)`,
      [record.learnerId, record.fromMode, record.toMode, record.reason, record.decidedAt]
    );
  }

  private toSnapshot(row: SnapshotRow): LearnerSnapshot {
    let status: LearnerStatus = 'new';
    if (row.status !== null && isLearnerStatus(row.status)) {
      status = row.status;
    } else if (row.status !== null) {
      this.logger.warn({ learnerId: row.learner_id, status: row.status }, 'Unknown learner status; treating as new');
    }

    let goalStatus: GoalStatus | null = null;
    if (row.goal_status !== null && isGoalStatus(row.goal_status)) {
      goalStatus = row.goal_status;
    } else if (row.goal_status !== null) {
      this.logger.warn({ learnerId: row.learner_id, goalStatus: row.goal_status }, 'Unknown goal status; ignoring goal');
    }

    const snapshot: LearnerSnapshot = {
      learnerId: row.learner_id,
      status,
      profileComplete: row.profile_complete === true,
      goalStatus,
      hasActivePathway: row.has_active_pathway
    };

    if (row.current_pathway_skill !== null) {
      snapshot.currentPathwaySkill = row.current_pathway_skill;
    }

    return snapshot;
  }

  private toMode(row: SnapshotRow): Mode | null {
    if (row.current_mode === null) {
      return null;
    }
    if (isMode(row.current_mode)) {
      return row.current_mode;
    }
    this.logger.warn({ learnerId: row.learner_id, mode: row.current_mode }, 'Unknown persisted mode; ignoring');
    return null;
  }
}
