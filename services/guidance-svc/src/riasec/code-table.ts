import type { Logger } from 'pino';

import { InvalidCodeError } from '../errors';
import {
  RIASEC_LETTERS,
  type CodeDescription,
  type CodeLetterBreakdown,
  type CodeRole,
  type FitAssessment,
  type FitLevel,
  type RiasecLetter
} from '../types';
import type { CuratedCombination, RiasecFramework, TypeProfile } from './framework';

export type RiasecCode = [RiasecLetter, RiasecLetter, RiasecLetter];

const ROLES: readonly CodeRole[] = ['core_drive', 'primary_expression', 'supporting_amplifier'];

/** Positional weights for fit scoring; their sum is the maximum possible overlap. */
export const FIT_POSITION_WEIGHTS: readonly [number, number, number] = [3, 2, 1];
const MAX_FIT_WEIGHT = FIT_POSITION_WEIGHTS[0] + FIT_POSITION_WEIGHTS[1] + FIT_POSITION_WEIGHTS[2];

const FIT_LEVELS: ReadonlyArray<{ min: number; level: FitLevel; recommendation: string }> = [
  { min: 0.8, level: 'Excellent', recommendation: 'Strong match - your interests align very well with this role.' },
  { min: 0.5, level: 'Good', recommendation: 'Good match - your primary interests align with this role.' },
  { min: 0.3, level: 'Moderate', recommendation: 'Moderate match - some shared interests but significant differences.' },
  { min: 0, level: 'Low', recommendation: 'Limited match - this role may be quite different from your natural preferences.' }
];

function isRiasecLetter(value: string): value is RiasecLetter {
  return (RIASEC_LETTERS as readonly string[]).includes(value);
}

/**
 * Validates a code as exactly three distinct RIASEC letters. Input is trimmed
 * and upper-cased first, so "ira" is accepted as "IRA".
 */
export function parseRiasecCode(input: string): RiasecCode {
  const normalized = input.trim().toUpperCase();
  if (normalized.length !== 3) {
    throw new InvalidCodeError(input, 'expected exactly 3 letters');
  }

  const letters: RiasecLetter[] = [];
  for (const char of normalized) {
    if (!isRiasecLetter(char)) {
      throw new InvalidCodeError(input, `"${char}" is not one of ${RIASEC_LETTERS.join('')}`);
    }
    if (letters.includes(char)) {
      throw new InvalidCodeError(input, `letter "${char}" is repeated`);
    }
    letters.push(char);
  }

  const [first, second, third] = letters;
  return [first, second, third];
}

export function isValidRiasecCode(input: string): boolean {
  try {
    parseRiasecCode(input);
    return true;
  } catch (error) {
    if (error instanceof InvalidCodeError) {
      return false;
    }
    throw error;
  }
}

function capitalize(text: string): string {
  return text.length === 0 ? text : text[0].toUpperCase() + text.slice(1);
}

function composeThemes(profiles: readonly [TypeProfile, TypeProfile, TypeProfile]): string[] {
  const [first, second, third] = profiles;
  const themes = [...first.themes, second.themes[0], third.themes[0]].filter(
    (theme): theme is string => typeof theme === 'string'
  );
  return Array.from(new Set(themes));
}

function* permutations(): Generator<RiasecCode> {
  for (const first of RIASEC_LETTERS) {
    for (const second of RIASEC_LETTERS) {
      if (second === first) continue;
      for (const third of RIASEC_LETTERS) {
        if (third === first || third === second) continue;
        yield [first, second, third];
      }
    }
  }
}

export class RiasecCodeTable {
  private readonly entries = new Map<string, CodeDescription>();
  private readonly framework: RiasecFramework;

  constructor(framework: RiasecFramework, logger: Logger) {
    this.framework = framework;
    const log = logger.child({ module: 'riasec-code-table' });

    const curated = new Map<string, CuratedCombination>();
    for (const [key, combination] of Object.entries(framework.combinations)) {
      try {
        curated.set(parseRiasecCode(key).join(''), combination);
      } catch (error) {
        log.warn({ key, error }, 'Skipping curated combination with an invalid code');
      }
    }

    for (const letters of permutations()) {
      const code = letters.join('');
      this.entries.set(code, Object.freeze(this.compose(letters, curated.get(code))));
    }

    log.info({ codes: this.entries.size, curated: curated.size }, 'RIASEC code table built');
  }

  get size(): number {
    return this.entries.size;
  }

  typeName(letter: RiasecLetter): string {
    return this.framework.types[letter].name;
  }

  typeNames(): Record<RiasecLetter, string> {
    const { R, I, A, S, E, C } = this.framework.types;
    return { R: R.name, I: I.name, A: A.name, S: S.name, E: E.name, C: C.name };
  }

  describe(code: string): CodeDescription {
    const key = parseRiasecCode(code).join('');
    const entry = this.entries.get(key);
    if (!entry) {
      throw new InvalidCodeError(code, 'code is missing from the reference table');
    }
    return entry;
  }

  /**
   * Position-weighted overlap in [0, 1]: a shared letter in position one counts 3,
   * position two 2, position three 1, divided by the maximum of 6.
   */
  compareFit(learnerCode: string, jobCode: string): number {
    const learner = parseRiasecCode(learnerCode);
    const job = parseRiasecCode(jobCode);

    let weighted = 0;
    learner.forEach((letter, index) => {
      if (job[index] === letter) {
        weighted += FIT_POSITION_WEIGHTS[index];
      }
    });

    return weighted / MAX_FIT_WEIGHT;
  }

  assessFit(learnerCode: string, jobCode: string): FitAssessment {
    const learner = parseRiasecCode(learnerCode);
    const job = parseRiasecCode(jobCode);
    const fitScore = Math.round(this.compareFit(learnerCode, jobCode) * 1000) / 1000;
    const band = FIT_LEVELS.find((candidate) => fitScore >= candidate.min) ?? FIT_LEVELS[FIT_LEVELS.length - 1];

    return {
      learnerCode: learner.join(''),
      jobCode: job.join(''),
      fitScore,
      fitLevel: band.level,
      recommendation: band.recommendation,
      positionMatches: [learner[0] === job[0], learner[1] === job[1], learner[2] === job[2]],
      sharedTypes: learner.filter((letter) => job.includes(letter))
    };
  }

  private compose(letters: RiasecCode, curated?: CuratedCombination): CodeDescription {
    const [first, second, third] = letters;
    const profiles: [TypeProfile, TypeProfile, TypeProfile] = [
      this.framework.types[first],
      this.framework.types[second],
      this.framework.types[third]
    ];

    const types: CodeLetterBreakdown[] = letters.map((letter, index) => ({
      letter,
      name: profiles[index].name,
      title: profiles[index].title,
      role: ROLES[index]
    }));

    const names = profiles.map((profile) => profile.name).join('-');
    const description =
      `${names}: ${capitalize(profiles[0].drive)}, expressed through ${profiles[1].expression} ` +
      `and amplified by ${profiles[2].amplifier}.`;
    const gift = `${capitalize(profiles[0].gift)}, with a talent for ${profiles[1].gift}.`;

    return {
      code: letters.join(''),
      description: curated?.description ?? description,
      gift: curated && curated.gift.length > 0 ? curated.gift : gift,
      themes: curated && curated.themes.length > 0 ? [...curated.themes] : composeThemes(profiles),
      types
    };
  }
}
