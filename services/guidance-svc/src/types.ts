export const RIASEC_LETTERS = ['R', 'I', 'A', 'S', 'E', 'C'] as const;

export type RiasecLetter = (typeof RIASEC_LETTERS)[number];

export type IndicatorTier = 'STRONG' | 'MODERATE' | 'KEYWORD';

export const TIER_WEIGHTS: Readonly<Record<IndicatorTier, number>> = {
  STRONG: 3.0,
  MODERATE: 1.5,
  KEYWORD: 1.0
};

export interface SkillIndicator {
  phrase: string;
  type: RiasecLetter;
  tier: IndicatorTier;
  weight: number;
}

export type RiasecScores = Record<RiasecLetter, number>;

export const EMPTY_INPUT_WARNING = 'empty_input';

export type ClassificationWarning = typeof EMPTY_INPUT_WARNING;

export interface ClassificationResult {
  code: string;
  primaryType: string;
  confidence: number;
  scores: RiasecScores;
  matchedIndicators: Partial<Record<RiasecLetter, string[]>>;
  warnings: ClassificationWarning[];
}

export type CodeRole = 'core_drive' | 'primary_expression' | 'supporting_amplifier';

export interface CodeLetterBreakdown {
  letter: RiasecLetter;
  name: string;
  title: string;
  role: CodeRole;
}

export interface CodeDescription {
  code: string;
  description: string;
  gift: string;
  themes: string[];
  types: CodeLetterBreakdown[];
}

export type FitLevel = 'Excellent' | 'Good' | 'Moderate' | 'Low';

export interface FitAssessment {
  learnerCode: string;
  jobCode: string;
  fitScore: number;
  fitLevel: FitLevel;
  recommendation: string;
  positionMatches: [boolean, boolean, boolean];
  sharedTypes: RiasecLetter[];
}

export interface SkillGapResult {
  has: string[];
  needs: string[];
  requiredCount: number;
  matchPercent: number;
}

export const MODES = ['INTAKE', 'GOAL_DISCOVERY', 'PATHWAY', 'LEARNING'] as const;

export type Mode = (typeof MODES)[number];

export type LearnerStatus = 'new' | 'active' | 'paused' | 'completed';

export type GoalStatus = 'exploring' | 'committed' | 'achieved' | 'changed';

export interface LearnerSnapshot {
  learnerId: string;
  status: LearnerStatus;
  profileComplete: boolean;
  goalStatus: GoalStatus | null;
  hasActivePathway: boolean;
  currentPathwaySkill?: string;
}

export interface ModeTransition {
  from: Mode;
  to: Mode;
  guard: string;
}

export interface ModeDecision {
  mode: Mode;
  /** Null when the learner had no recorded mode. */
  previousMode: Mode | null;
  changed: boolean;
  reason: string;
  path: ModeTransition[];
}

export interface ModeTransitionRecord {
  learnerId: string;
  fromMode: Mode | null;
  toMode: Mode;
  reason: string;
  decidedAt: string;
}

export interface JobRecord {
  jobLink: string;
  title: string;
  company?: string;
  location?: string;
  level?: string;
  skills: string;
  riasecCode?: string;
  riasecConfidence?: number;
}

export interface RankedJob {
  job: JobRecord;
  gap: SkillGapResult;
}

export interface ClassifyRequestBody {
  skills: string[];
  title?: string;
}

export interface CodeParams {
  code: string;
}

export interface FitRequestBody {
  learnerCode: string;
  jobCode: string;
}

export interface SkillGapRequestBody {
  learnerSkills: string[];
  requiredSkills: string;
}

export interface LearnerParams {
  learnerId: string;
}

export interface ToolCallRequestBody {
  toolName: string;
  arguments?: Record<string, unknown>;
}

export interface BestFitJobsRequestBody {
  limit?: number;
  minMatchPercent?: number;
}
