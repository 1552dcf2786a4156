import type { Logger } from 'pino';

import { RIASEC_LETTERS, TIER_WEIGHTS, type IndicatorTier, type SkillIndicator } from '../types';
import type { RiasecFramework } from './framework';

const SEPARATORS = /[-_/\\.,;:|]/g;

/**
 * Lower-cases, turns separator punctuation into spaces and collapses whitespace,
 * so "Problem-Solving" and "problem solving" compare equal.
 */
export function normalizeText(text: string): string {
  return text.toLowerCase().replace(SEPARATORS, ' ').replace(/\s+/g, ' ').trim();
}

const TIER_SOURCES: ReadonlyArray<[IndicatorTier, 'strong' | 'moderate' | 'keywords']> = [
  ['STRONG', 'strong'],
  ['MODERATE', 'moderate'],
  ['KEYWORD', 'keywords']
];

/**
 * Immutable phrase → indicator index. Built once at startup and shared by
 * every classification call.
 */
export class SkillIndicatorTable {
  private readonly byPhrase: ReadonlyMap<string, SkillIndicator>;
  private readonly entries: readonly SkillIndicator[];

  constructor(indicators: Iterable<SkillIndicator>) {
    const byPhrase = new Map<string, SkillIndicator>();
    for (const indicator of indicators) {
      byPhrase.set(indicator.phrase, Object.freeze({ ...indicator }));
    }

    this.byPhrase = byPhrase;
    this.entries = Object.freeze(Array.from(byPhrase.values()));
  }

  get size(): number {
    return this.entries.length;
  }

  get(phrase: string): SkillIndicator | undefined {
    return this.byPhrase.get(normalizeText(phrase));
  }

  all(): readonly SkillIndicator[] {
    return this.entries;
  }
}

/**
 * Flattens the framework's per-type indicator lists into a table. When two
 * entries normalize to the same phrase the later one wins and the collision is logged.
 */
export function buildIndicatorTable(framework: RiasecFramework, logger: Logger): SkillIndicatorTable {
  const collected = new Map<string, SkillIndicator>();

  for (const letter of RIASEC_LETTERS) {
    const lists = framework.types[letter].indicators;

    for (const [tier, key] of TIER_SOURCES) {
      for (const rawPhrase of lists[key]) {
        const phrase = normalizeText(rawPhrase);
        if (phrase.length === 0) {
          continue;
        }

        const indicator: SkillIndicator = { phrase, type: letter, tier, weight: TIER_WEIGHTS[tier] };
        const existing = collected.get(phrase);
        if (existing) {
          logger.warn(
            { phrase, replaced: { type: existing.type, tier: existing.tier }, replacement: { type: letter, tier } },
            'Duplicate skill indicator phrase; later entry overrides'
          );
          collected.delete(phrase);
        }

        collected.set(phrase, indicator);
      }
    }
  }

  const table = new SkillIndicatorTable(collected.values());
  logger.info({ indicators: table.size }, 'Skill indicator table loaded');
  return table;
}
