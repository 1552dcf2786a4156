import { beforeEach, describe, expect, it } from 'vitest';

import { ToolDispatchGuard } from '../tool-dispatch-guard';
import { asLogger, createMockLogger, type MockLogger } from './fakes';

describe('ToolDispatchGuard', () => {
  let logger: MockLogger;
  let guard: ToolDispatchGuard;

  beforeEach(() => {
    logger = createMockLogger();
    guard = new ToolDispatchGuard(asLogger(logger));
  });

  it('lists tools per mode in registry order', () => {
    expect(guard.toolsForMode('INTAKE')).toEqual([
      'get_learner_context',
      'get_learner_profile',
      'update_learner_profile',
      'add_learner_skill'
    ]);
    expect(guard.toolsForMode('PATHWAY')).toEqual([
      'get_learner_context',
      'get_learner_profile',
      'get_job_details',
      'calculate_skill_gap',
      'suggest_next_skills',
      'create_pathway'
    ]);
    expect(guard.toolsForMode('LEARNING')).toEqual([
      'get_learner_context',
      'get_learner_profile',
      'set_learner_goal',
      'update_pathway_progress',
      'get_current_skill',
      'get_pathway_details'
    ]);
    expect(guard.toolsForMode('GOAL_DISCOVERY')).toHaveLength(12);
  });

  it('allows the context tools in every mode', () => {
    for (const mode of ['INTAKE', 'GOAL_DISCOVERY', 'PATHWAY', 'LEARNING'] as const) {
      expect(guard.isAllowed(mode, 'get_learner_context')).toBe(true);
      expect(guard.isAllowed(mode, 'get_learner_profile')).toBe(true);
    }
  });

  it('answers isAllowed for mode-specific and unknown tools', () => {
    expect(guard.isAllowed('GOAL_DISCOVERY', 'search_jobs_by_riasec')).toBe(true);
    expect(guard.isAllowed('INTAKE', 'search_jobs_by_riasec')).toBe(false);
    expect(guard.isAllowed('INTAKE', 'drop_tables')).toBe(false);
  });

  it('refuses a tool outside the current mode', () => {
    expect(guard.check('INTAKE', 'search_jobs_by_riasec', { riasec_code: 'IRA' })).toEqual({
      allowed: false,
      refusal: {
        code: 'tool_not_in_mode',
        message: 'tool search_jobs_by_riasec is not available in mode INTAKE',
        tool: 'search_jobs_by_riasec',
        mode: 'INTAKE'
      }
    });
    expect(logger.warn).toHaveBeenCalledWith(
      { tool: 'search_jobs_by_riasec', mode: 'INTAKE', code: 'tool_not_in_mode' },
      'Tool call refused'
    );
  });

  it('refuses unknown tools', () => {
    const result = guard.check('LEARNING', 'toString', {});

    expect(result).toEqual({
      allowed: false,
      refusal: { code: 'unknown_tool', message: 'tool toString does not exist', tool: 'toString', mode: 'LEARNING' }
    });
  });

  it('returns parsed arguments with defaults applied', () => {
    const result = guard.check('GOAL_DISCOVERY', 'search_jobs_by_riasec', { riasec_code: ' ira ' });

    expect(result).toEqual({
      allowed: true,
      tool: 'search_jobs_by_riasec',
      args: { riasec_code: 'IRA', primary_type_only: false, limit: 10 }
    });
  });

  it('refuses arguments that fail the schema', () => {
    const result = guard.check('GOAL_DISCOVERY', 'compare_riasec_codes', { learner_riasec: 'IRA', job_riasec: 'IRR' });

    expect(result).toEqual({
      allowed: false,
      refusal: {
        code: 'invalid_arguments',
        message: 'tool compare_riasec_codes received invalid arguments',
        tool: 'compare_riasec_codes',
        mode: 'GOAL_DISCOVERY',
        issues: ['job_riasec: Expected 3 distinct letters from RIASEC']
      }
    });
  });

  it('rejects unknown profile fields', () => {
    const result = guard.check('INTAKE', 'update_learner_profile', {
      learner_id: 'learner-1',
      updates: { favourite_colour: 'green' }
    });

    expect(result.allowed).toBe(false);
    if (!result.allowed) {
      expect(result.refusal.code).toBe('invalid_arguments');
    }
  });

  it('accepts a profile update that completes intake', () => {
    const result = guard.check('INTAKE', 'update_learner_profile', {
      learner_id: 'learner-1',
      updates: { weekly_study_hours: 6, profile_complete: true }
    });

    expect(result).toEqual({
      allowed: true,
      tool: 'update_learner_profile',
      args: { learner_id: 'learner-1', updates: { weekly_study_hours: 6, profile_complete: true } }
    });
  });

  it('treats missing arguments as an empty object', () => {
    const result = guard.check('LEARNING', 'get_current_skill', undefined);

    expect(result.allowed).toBe(false);
    if (!result.allowed) {
      expect(result.refusal.issues).toEqual(['pathway_id: Required']);
    }
  });

  it('describes the tools of a mode', () => {
    expect(guard.describeToolsForMode('INTAKE')[3]).toEqual({
      name: 'add_learner_skill',
      description: "Add a skill to the learner's profile."
    });
  });
});
