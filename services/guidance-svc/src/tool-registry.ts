import { z } from 'zod';

import { isValidRiasecCode } from './riasec/code-table';
import { RIASEC_LETTERS, type Mode } from './types';

const learnerId = z.string().trim().min(1).max(128);
const pathwayId = z.string().trim().min(1).max(128);
const skillName = z.string().trim().min(1).max(200);
const skillList = z.array(skillName).min(1).max(100);
const resultLimit = z.number().int().min(1).max(50).default(10);
const riasecCode = z
  .string()
  .refine(isValidRiasecCode, { message: 'Expected 3 distinct letters from RIASEC' })
  .transform((value) => value.trim().toUpperCase());

export const GOAL_STATUSES = ['exploring', 'committed', 'achieved', 'changed'] as const;
export const PROFICIENCY_LEVELS = ['none', 'beginner', 'intermediate', 'advanced', 'expert'] as const;
export const PATHWAY_SKILL_STATUSES = ['not_started', 'in_progress', 'completed'] as const;

const profileUpdates = z
  .object({
    current_job_title: z.string().max(200),
    current_industry: z.string().max(200),
    years_experience: z.number().int().min(0).max(70),
    education_level: z.string().max(100),
    weekly_study_hours: z.number().int().min(0).max(168),
    preferred_study_times: z.string().max(200),
    has_family_obligations: z.boolean(),
    employment_status: z.string().max(100),
    preferred_format: z.string().max(100),
    disposition: z.enum(['unclear', 'discontent', 'promotion', 'called']),
    inferred_riasec_code: riasecCode,
    profile_complete: z.boolean()
  })
  .partial()
  .strict()
  .refine((updates) => Object.keys(updates).length > 0, { message: 'At least one profile field is required' });

export type ToolModes = 'all' | readonly Mode[];

export interface ToolDefinition {
  description: string;
  modes: ToolModes;
  schema: z.ZodTypeAny;
}

function defineTool<S extends z.ZodTypeAny>(description: string, modes: ToolModes, schema: S) {
  return { description, modes, schema };
}

/**
 * Every tool the model may request, with the modes it belongs to and the
 * schema its arguments must satisfy. Static for the process lifetime.
 */
export const TOOL_REGISTRY = {
  get_learner_context: defineTool(
    'Get the full learner profile, skills, goals and pathway progress.',
    'all',
    z.object({ learner_id: learnerId })
  ),
  get_learner_profile: defineTool('Read the learner profile fields.', 'all', z.object({ learner_id: learnerId })),
  update_learner_profile: defineTool(
    'Update learner profile fields; set profile_complete once intake is done.',
    ['INTAKE'],
    z.object({ learner_id: learnerId, updates: profileUpdates })
  ),
  add_learner_skill: defineTool(
    "Add a skill to the learner's profile.",
    ['INTAKE'],
    z.object({
      learner_id: learnerId,
      skill_name: skillName,
      proficiency_level: z.enum(PROFICIENCY_LEVELS),
      evidence_source: z.enum(['self_reported', 'validated', 'credential']).default('self_reported')
    })
  ),
  infer_riasec_from_skills: defineTool(
    'Predict the most likely RIASEC code from a list of skills.',
    ['GOAL_DISCOVERY'],
    z.object({ skills: skillList })
  ),
  get_riasec_description: defineTool(
    'Get the description and career themes for a RIASEC code.',
    ['GOAL_DISCOVERY'],
    z.object({ riasec_code: riasecCode })
  ),
  compare_riasec_codes: defineTool(
    "Compare the learner's RIASEC code with a job's code to assess fit.",
    ['GOAL_DISCOVERY'],
    z.object({ learner_riasec: riasecCode, job_riasec: riasecCode })
  ),
  search_jobs: defineTool(
    'Search jobs by title, skills, location or level.',
    ['GOAL_DISCOVERY'],
    z.object({
      job_title: z.string().trim().min(1).max(200).optional(),
      skills: z.array(skillName).max(20).optional(),
      location: z.string().trim().min(1).max(200).optional(),
      job_level: z.string().trim().min(1).max(100).optional(),
      limit: resultLimit
    })
  ),
  search_jobs_by_riasec: defineTool(
    'Find jobs matching a RIASEC code.',
    ['GOAL_DISCOVERY'],
    z.object({
      riasec_code: riasecCode,
      primary_type_only: z.boolean().default(false),
      job_level: z.string().trim().min(1).max(100).optional(),
      limit: resultLimit
    })
  ),
  get_job_details: defineTool(
    'Get full details for a job by its job_link.',
    ['GOAL_DISCOVERY', 'PATHWAY'],
    z.object({ job_link: z.string().trim().min(1).max(2048) })
  ),
  get_salary_info: defineTool(
    'Look up salary and market demand for a job title.',
    ['GOAL_DISCOVERY'],
    z.object({ job_title: z.string().trim().min(1).max(200) })
  ),
  get_high_demand_jobs: defineTool(
    'Find jobs with labor shortages.',
    ['GOAL_DISCOVERY'],
    z.object({
      riasec_type: z.enum(RIASEC_LETTERS).optional(),
      min_salary: z.number().int().min(0).optional(),
      limit: resultLimit
    })
  ),
  find_jobs_by_skill_match: defineTool(
    'Find jobs where the learner already has the highest share of required skills.',
    ['GOAL_DISCOVERY'],
    z.object({
      learner_skills: skillList,
      min_match_percent: z.number().min(0).max(100).default(50),
      limit: resultLimit
    })
  ),
  set_learner_goal: defineTool(
    "Set or update the learner's career goal.",
    ['GOAL_DISCOVERY', 'LEARNING'],
    z.object({
      learner_id: learnerId,
      target_job_title: z.string().trim().min(1).max(200),
      status: z.enum(GOAL_STATUSES).default('exploring')
    })
  ),
  calculate_skill_gap: defineTool(
    "Compare the learner's skills with a target job's requirements.",
    ['PATHWAY'],
    z.object({ learner_skills: skillList, target_job_link: z.string().trim().min(1).max(2048) })
  ),
  suggest_next_skills: defineTool(
    'Suggest which missing skills to learn first for a target job.',
    ['PATHWAY'],
    z.object({
      learner_skills: skillList,
      target_job_link: z.string().trim().min(1).max(2048),
      count: z.number().int().min(1).max(20).default(5)
    })
  ),
  create_pathway: defineTool(
    'Create a learning pathway of ordered skills for a committed goal.',
    ['PATHWAY'],
    z.object({ learner_id: learnerId, goal_id: z.string().trim().min(1).max(128), skills_to_learn: skillList })
  ),
  update_pathway_progress: defineTool(
    'Update the status of a skill in the active pathway.',
    ['LEARNING'],
    z.object({ pathway_id: pathwayId, skill_name: skillName, new_status: z.enum(PATHWAY_SKILL_STATUSES) })
  ),
  get_current_skill: defineTool(
    'Get the skill the learner should be working on now.',
    ['LEARNING'],
    z.object({ pathway_id: pathwayId })
  ),
  get_pathway_details: defineTool(
    'Get the pathway, its skills and its goal.',
    ['LEARNING'],
    z.object({ pathway_id: pathwayId })
  )
} satisfies Record<string, ToolDefinition>;

export type ToolName = keyof typeof TOOL_REGISTRY;

