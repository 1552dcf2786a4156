import { getLogger, notFoundError } from '@career-guidance/common';
import type { Logger } from 'pino';

import type { GuidanceCorpusConfig } from './config';
import { InconsistentStateError } from './errors';
import type { JobCorpusGateway } from './job-corpus-gateway';
import type { LearnerStore, StoredLearnerState } from './learner-store';
import { SAFE_FALLBACK_MODE, resolveMode } from './mode-controller';
import { buildSystemPrompt } from './prompts';
import { rankJobsBySkillMatch } from './skill-gap';
import type { ToolCheckResult, ToolDispatchGuard, ToolSummary } from './tool-dispatch-guard';
import type { LearnerSnapshot, Mode, ModeDecision, ModeTransitionRecord, RankedJob } from './types';

interface GuidanceServiceDeps {
  store: LearnerStore;
  corpus: JobCorpusGateway;
  guard: ToolDispatchGuard;
  config: GuidanceCorpusConfig;
  logger?: Logger;
  now?: () => Date;
}

export interface TurnResult {
  learnerId: string;
  decision: ModeDecision;
  degraded: boolean;
  tools: ToolSummary[];
  systemPrompt: string;
}

export interface ToolCallResult {
  learnerId: string;
  mode: Mode;
  degraded: boolean;
  result: ToolCheckResult;
}

export interface BestFitJobsRequest {
  limit?: number;
  minMatchPercent?: number;
}

export interface BestFitJobsResult {
  learnerId: string;
  skills: string[];
  jobs: RankedJob[];
}

interface ResolvedTurn {
  state: StoredLearnerState;
  decision: ModeDecision;
  degraded: boolean;
}

export class GuidanceService {
  private readonly logger: Logger;
  private readonly now: () => Date;

  constructor(private readonly deps: GuidanceServiceDeps) {
    this.logger = deps.logger ?? getLogger({ module: 'guidance-service' });
    this.now = deps.now ?? (() => new Date());
  }

  private async loadState(learnerId: string): Promise<StoredLearnerState> {
    const state = await this.deps.store.readSnapshot(learnerId);
    if (!state) {
      throw notFoundError(`Learner ${learnerId} was not found.`, { learnerId });
    }
    return state;
  }

  private decide(state: StoredLearnerState): ResolvedTurn {
    const currentMode = state.currentMode;

    try {
      return { state, decision: resolveMode(state.snapshot, currentMode), degraded: false };
    } catch (error) {
      if (!(error instanceof InconsistentStateError)) {
        throw error;
      }

      this.logger.error(
        { learnerId: state.snapshot.learnerId, violation: error.violation, snapshot: state.snapshot, origin: error.origin },
        'Learner state is inconsistent; falling back to the safe mode.'
      );

      return {
        state,
        degraded: true,
        decision: {
          mode: SAFE_FALLBACK_MODE,
          previousMode: currentMode,
          changed: currentMode !== SAFE_FALLBACK_MODE,
          reason: `Learner state is inconsistent (${error.violation}); falling back to ${SAFE_FALLBACK_MODE}.`,
          path: []
        }
      };
    }
  }

  private recordTransition(snapshot: LearnerSnapshot, decision: ModeDecision): void {
    const record: ModeTransitionRecord = {
      learnerId: snapshot.learnerId,
      fromMode: decision.previousMode,
      toMode: decision.mode,
      reason: decision.reason,
      decidedAt: this.now().toISOString()
    };

    this.deps.store.recordTransition(record).catch((error: unknown) => {
      this.logger.error({ error, learnerId: record.learnerId, toMode: record.toMode }, 'Failed to record mode transition.');
    });
  }

  /**
   * Resolves the learner's mode for this turn and returns what the model needs:
   * the decision, the mode's tools and the system prompt. The transition record
   * is written without holding up the turn.
   */
  async resolveTurn(learnerId: string): Promise<TurnResult> {
    const { state, decision, degraded } = this.decide(await this.loadState(learnerId));

    if (!degraded && decision.changed) {
      this.recordTransition(state.snapshot, decision);
    }

    const tools = this.deps.guard.describeToolsForMode(decision.mode);

    this.logger.info(
      { learnerId, mode: decision.mode, previousMode: decision.previousMode, changed: decision.changed, degraded },
      'Turn mode resolved.'
    );

    return {
      learnerId,
      decision,
      degraded,
      tools,
      systemPrompt: buildSystemPrompt(
        decision.mode,
        state.snapshot,
        tools.map((tool) => tool.name)
      )
    };
  }

  async checkToolCall(learnerId: string, toolName: string, args: unknown): Promise<ToolCallResult> {
    const { decision, degraded } = this.decide(await this.loadState(learnerId));
    const result = this.deps.guard.check(decision.mode, toolName, args);

    return { learnerId, mode: decision.mode, degraded, result };
  }

  async findBestFitJobs(learnerId: string, request: BestFitJobsRequest = {}): Promise<BestFitJobsResult> {
    await this.loadState(learnerId);

    const skills = await this.deps.store.readSkills(learnerId);
    if (skills.length === 0) {
      this.logger.warn({ learnerId }, 'Best-fit job search requested for a learner with no skills.');
      return { learnerId, skills, jobs: [] };
    }

    const candidates = await this.deps.corpus.findBySkills(skills, this.deps.config.maxLimit);
    const jobs = rankJobsBySkillMatch(skills, candidates, {
      minMatchPercent: request.minMatchPercent,
      limit: Math.min(request.limit ?? this.deps.config.defaultLimit, this.deps.config.maxLimit)
    });

    return { learnerId, skills, jobs };
  }
}
