import type { Logger } from 'pino';

import {
  EMPTY_INPUT_WARNING,
  type ClassificationResult,
  type ClassificationWarning,
  type RiasecLetter,
  type RiasecScores
} from '../types';
import { normalizeText, type SkillIndicatorTable } from './indicator-table';

/**
 * Canonical order used to break score ties. It is part of the public contract:
 * identical input always ranks identically, and an all-zero input yields "ISE".
 */
export const RIASEC_TIE_BREAK_ORDER: readonly RiasecLetter[] = Object.freeze(['I', 'S', 'E', 'C', 'R', 'A']);

export const DEFAULT_TITLE_BONUS = 2.0;

const CONFIDENCE_EPSILON = 1e-9;

export interface RiasecClassifierDeps {
  table: SkillIndicatorTable;
  typeNames: Readonly<Record<RiasecLetter, string>>;
  logger: Logger;
  titleBonus?: number;
}

function emptyScores(): RiasecScores {
  return { R: 0, I: 0, A: 0, S: 0, E: 0, C: 0 };
}

function roundTo(value: number, decimals: number): number {
  const factor = 10 ** decimals;
  return Math.round(value * factor) / factor;
}

export function rankTypes(scores: RiasecScores): RiasecLetter[] {
  // Array.prototype.sort is stable, so equal scores keep tie-break order.
  return [...RIASEC_TIE_BREAK_ORDER].sort((a, b) => scores[b] - scores[a]);
}

export function computeConfidence(top: number, second: number): number {
  if (top === 0 && second === 0) {
    return 0;
  }

  return roundTo(Math.min(1, top / (top + second + CONFIDENCE_EPSILON)), 3);
}

export class RiasecClassifier {
  private readonly table: SkillIndicatorTable;
  private readonly typeNames: Readonly<Record<RiasecLetter, string>>;
  private readonly logger: Logger;
  private readonly titleBonus: number;

  constructor(deps: RiasecClassifierDeps) {
    this.table = deps.table;
    this.typeNames = deps.typeNames;
    this.logger = deps.logger.child({ module: 'riasec-classifier' });
    this.titleBonus = deps.titleBonus ?? DEFAULT_TITLE_BONUS;
  }

  /**
   * Scores skill phrases (and optionally a job title) against every indicator.
   *
   * Every indicator whose phrase is contained in an input phrase adds its weight,
   * so overlapping indicators such as "data analysis" and "analysis" both count.
   * Each distinct strong or moderate indicator found in the title adds the title bonus once.
   */
  classify(skillPhrases: readonly string[], title?: string): ClassificationResult {
    const phrases = skillPhrases.map(normalizeText).filter((phrase) => phrase.length > 0);
    const normalizedTitle = title ? normalizeText(title) : '';
    const scores = emptyScores();
    const matched = new Map<RiasecLetter, Set<string>>();
    const warnings: ClassificationWarning[] = [];

    const recordMatch = (letter: RiasecLetter, phrase: string) => {
      const bucket = matched.get(letter) ?? new Set<string>();
      bucket.add(phrase);
      matched.set(letter, bucket);
    };

    const indicators = this.table.all();

    for (const phrase of phrases) {
      for (const indicator of indicators) {
        if (phrase.includes(indicator.phrase)) {
          scores[indicator.type] += indicator.weight;
          recordMatch(indicator.type, indicator.phrase);
        }
      }
    }

    if (normalizedTitle.length > 0) {
      for (const indicator of indicators) {
        if (indicator.tier !== 'KEYWORD' && normalizedTitle.includes(indicator.phrase)) {
          scores[indicator.type] += this.titleBonus;
          recordMatch(indicator.type, indicator.phrase);
        }
      }
    }

    if (phrases.length === 0 && matched.size === 0) {
      warnings.push(EMPTY_INPUT_WARNING);
      this.logger.warn({ title: normalizedTitle || undefined }, 'Classification requested with no usable input');
    }

    const ranked = rankTypes(scores);
    const [first, second] = ranked;
    const code = ranked.slice(0, 3).join('');
    const confidence = computeConfidence(scores[first], scores[second]);

    const matchedIndicators: Partial<Record<RiasecLetter, string[]>> = {};
    for (const letter of ranked) {
      const bucket = matched.get(letter);
      if (bucket) {
        matchedIndicators[letter] = Array.from(bucket);
      }
    }

    this.logger.debug({ code, confidence, phraseCount: phrases.length }, 'Classification complete');

    return {
      code,
      primaryType: this.typeNames[first],
      confidence,
      scores,
      matchedIndicators,
      warnings
    };
  }
}
