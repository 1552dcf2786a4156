import type { JobRecord, RankedJob, SkillGapResult } from './types';

function normalizeSkill(skill: string): string {
  return skill.trim().toLowerCase();
}

function uniqueSkills(skills: Iterable<string>): string[] {
  const seen = new Set<string>();
  for (const skill of skills) {
    const normalized = normalizeSkill(skill);
    if (normalized.length > 0) {
      seen.add(normalized);
    }
  }
  return Array.from(seen);
}

export function parseRequiredSkills(requiredSkillsText: string): string[] {
  return uniqueSkills(requiredSkillsText.split(','));
}

/**
 * Case-insensitive exact comparison of a learner's skills against a
 * comma-delimited requirement list. `has` and `needs` follow the order of the
 * requirement list; matchPercent is rounded to one decimal and is 0 when
 * nothing is required.
 */
export function calculateSkillGap(learnerSkills: Iterable<string>, requiredSkillsText: string): SkillGapResult {
  const learner = new Set(uniqueSkills(learnerSkills));
  const required = parseRequiredSkills(requiredSkillsText);

  const has = required.filter((skill) => learner.has(skill));
  const needs = required.filter((skill) => !learner.has(skill));
  const matchPercent = required.length === 0 ? 0 : Math.round((has.length / required.length) * 1000) / 10;

  return {
    has,
    needs,
    requiredCount: required.length,
    matchPercent
  };
}

export interface SkillMatchOptions {
  minMatchPercent?: number;
  limit?: number;
}

export function rankJobsBySkillMatch(
  learnerSkills: Iterable<string>,
  jobs: readonly JobRecord[],
  { minMatchPercent = 50, limit = 10 }: SkillMatchOptions = {}
): RankedJob[] {
  const skills = uniqueSkills(learnerSkills);

  return jobs
    .map((job) => ({ job, gap: calculateSkillGap(skills, job.skills) }))
    .filter(({ gap }) => gap.requiredCount > 0 && gap.matchPercent >= minMatchPercent)
    .sort((a, b) => b.gap.matchPercent - a.gap.matchPercent)
    .slice(0, Math.max(0, limit));
}

export function suggestNextSkills(gap: SkillGapResult, count = 5): string[] {
  return gap.needs.slice(0, Math.max(0, count));
}
