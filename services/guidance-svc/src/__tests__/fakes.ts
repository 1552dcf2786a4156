import type { Logger } from 'pino';
import { vi } from 'vitest';

import type { JobCorpusGateway, RiasecJobQuery } from '../job-corpus-gateway';
import type { LearnerStore, StoredLearnerState } from '../learner-store';
import type { JobRecord, LearnerSnapshot, Mode, ModeTransitionRecord } from '../types';

export function createMockLogger() {
  const logger = {
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
    child: vi.fn((): unknown => logger)
  };
  return logger;
}

export type MockLogger = ReturnType<typeof createMockLogger>;

export function asLogger(mock: MockLogger): Logger {
  return mock as unknown as Logger;
}

export function snapshotOf(overrides: Partial<LearnerSnapshot> = {}): LearnerSnapshot {
  return {
    learnerId: 'learner-1',
    status: 'active',
    profileComplete: false,
    goalStatus: null,
    hasActivePathway: false,
    ...overrides
  };
}

export class InMemoryLearnerStore implements LearnerStore {
  readonly transitions: ModeTransitionRecord[] = [];
  failWrites = false;
  failReads = false;

  private readonly learners = new Map<string, StoredLearnerState>();
  private readonly skills = new Map<string, string[]>();

  put(snapshot: LearnerSnapshot, currentMode: Mode | null = null, skills: string[] = []): void {
    this.learners.set(snapshot.learnerId, { snapshot, currentMode });
    this.skills.set(snapshot.learnerId, skills);
  }

  async readSnapshot(learnerId: string): Promise<StoredLearnerState | null> {
    if (this.failReads) {
      throw new Error('store offline');
    }
    return this.learners.get(learnerId) ?? null;
  }

  async readSkills(learnerId: string): Promise<string[]> {
    return this.skills.get(learnerId) ?? [];
  }

  async recordTransition(record: ModeTransitionRecord): Promise<void> {
    if (this.failWrites) {
      throw new Error('write rejected');
    }
    this.transitions.push(record);
  }
}

export class InMemoryJobCorpus implements JobCorpusGateway {
  readonly skillQueries: Array<{ skills: string[]; limit?: number }> = [];

  constructor(private readonly jobs: JobRecord[] = []) {}

  async findByRiasec(code: string, query: RiasecJobQuery = {}): Promise<JobRecord[]> {
    const matches = this.jobs.filter((job) =>
      query.primaryTypeOnly ? job.riasecCode?.[0] === code[0] : job.riasecCode === code
    );
    return matches.slice(0, query.limit ?? matches.length);
  }

  async findBySkills(skills: readonly string[], limit?: number): Promise<JobRecord[]> {
    this.skillQueries.push({ skills: [...skills], limit });
    return this.jobs.slice(0, limit ?? this.jobs.length);
  }

  async getJob(jobLink: string): Promise<JobRecord | null> {
    return this.jobs.find((job) => job.jobLink === jobLink) ?? null;
  }
}
