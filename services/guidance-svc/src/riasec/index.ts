import type { Logger } from 'pino';

import { RiasecClassifier } from './classifier';
import { RiasecCodeTable } from './code-table';
import { loadRiasecFramework, type RiasecFramework } from './framework';
import { buildIndicatorTable, type SkillIndicatorTable } from './indicator-table';

export { RiasecClassifier, RIASEC_TIE_BREAK_ORDER, DEFAULT_TITLE_BONUS, rankTypes, computeConfidence } from './classifier';
export { RiasecCodeTable, parseRiasecCode, isValidRiasecCode, FIT_POSITION_WEIGHTS, type RiasecCode } from './code-table';
export {
  DEFAULT_FRAMEWORK_PATH,
  loadRiasecFramework,
  parseRiasecFramework,
  type RiasecFramework,
  type TypeProfile
} from './framework';
export { SkillIndicatorTable, buildIndicatorTable, normalizeText } from './indicator-table';

export interface RiasecEngine {
  framework: RiasecFramework;
  table: SkillIndicatorTable;
  classifier: RiasecClassifier;
  codes: RiasecCodeTable;
}

export interface RiasecEngineOptions {
  logger: Logger;
  frameworkPath?: string;
  framework?: RiasecFramework;
  titleBonus?: number;
}

export function createRiasecEngine(options: RiasecEngineOptions): RiasecEngine {
  const framework = options.framework ?? loadRiasecFramework(options.frameworkPath);
  const table = buildIndicatorTable(framework, options.logger);
  const codes = new RiasecCodeTable(framework, options.logger);
  const classifier = new RiasecClassifier({
    table,
    typeNames: codes.typeNames(),
    logger: options.logger,
    titleBonus: options.titleBonus
  });

  return { framework, table, classifier, codes };
}
