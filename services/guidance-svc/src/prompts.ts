import type { ToolName } from './tool-registry';
import type { LearnerSnapshot, Mode } from './types';

const BASE_PROMPT = [
  'You are a career guidance assistant that moves a learner from where they are now to a career goal.',
  'You are one assistant working in four modes; the current mode decides which tools you may call.',
  'Be encouraging but honest, ask one question at a time, and back career choices with data.'
].join('\n');

const MODE_PROMPTS: Readonly<Record<Mode, string>> = {
  INTAKE: [
    'Current mode: INTAKE. Build the learner profile.',
    'Gather background, skills with proficiency, weekly study time and constraints, and their reason for a change.',
    'Set profile_complete once the profile is usable.'
  ].join('\n'),
  GOAL_DISCOVERY: [
    'Current mode: GOAL_DISCOVERY. Find a career direction.',
    'Infer a RIASEC code from the learner skills, explore matching jobs with salary and demand data,',
    'and help the learner commit to one goal.'
  ].join('\n'),
  PATHWAY: [
    'Current mode: PATHWAY. Plan the learning path.',
    'Calculate the skill gap for the target job, order the missing skills, and create the pathway.'
  ].join('\n'),
  LEARNING: [
    'Current mode: LEARNING. Support daily learning.',
    'Focus on the current skill, record progress as skills are completed, and celebrate milestones.'
  ].join('\n')
};

export function buildSystemPrompt(mode: Mode, snapshot: LearnerSnapshot, tools: readonly ToolName[]): string {
  const context = [
    `Learner: ${snapshot.learnerId} (status: ${snapshot.status})`,
    `Profile complete: ${snapshot.profileComplete ? 'yes' : 'no'}`,
    `Goal status: ${snapshot.goalStatus ?? 'none'}`,
    `Active pathway: ${snapshot.hasActivePathway ? 'yes' : 'no'}`
  ];
  if (snapshot.currentPathwaySkill) {
    context.push(`Current skill: ${snapshot.currentPathwaySkill}`);
  }

  return [BASE_PROMPT, MODE_PROMPTS[mode], context.join('\n'), `Available tools: ${tools.join(', ')}`].join('\n\n');
}
