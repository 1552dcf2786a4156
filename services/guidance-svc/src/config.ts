import { getConfig as getBaseConfig, parseBoolean, parseNumber, type ServiceConfig } from '@career-guidance/common';

import { DEFAULT_FRAMEWORK_PATH } from './riasec/framework';

export interface GuidanceDatabaseConfig {
  host: string;
  port: number;
  database: string;
  user: string;
  password: string;
  ssl: boolean;
  schema: string;
  poolMax: number;
  statementTimeoutMs: number;
}

export interface GuidanceCorpusConfig {
  jobsTable: string;
  defaultLimit: number;
  maxLimit: number;
}

export interface GuidanceClassifierConfig {
  frameworkPath: string;
  titleBonus: number;
}

export interface GuidanceServiceConfig {
  base: ServiceConfig;
  database: GuidanceDatabaseConfig;
  corpus: GuidanceCorpusConfig;
  classifier: GuidanceClassifierConfig;
  port: number;
}

let cachedConfig: GuidanceServiceConfig | null = null;

const SQL_IDENTIFIER = /^[A-Za-z_][A-Za-z0-9_]*$/;

function parseIdentifier(name: string, value: string | undefined, fallback: string): string {
  const identifier = value?.trim() || fallback;
  if (!SQL_IDENTIFIER.test(identifier)) {
    throw new Error(`${name} must be a plain SQL identifier.`);
  }
  return identifier;
}

function atLeast(value: number, min: number): number {
  return Math.max(min, value);
}

export function getGuidanceServiceConfig(): GuidanceServiceConfig {
  if (cachedConfig) {
    return cachedConfig;
  }

  const base = getBaseConfig();

  const database: GuidanceDatabaseConfig = {
    host: process.env.PG_HOST ?? '127.0.0.1',
    port: parseNumber(process.env.PG_PORT, 5432),
    database: process.env.PG_DATABASE ?? 'career_guidance',
    user: process.env.PG_USER ?? 'guidance',
    password: process.env.PG_PASSWORD ?? '',
    ssl: parseBoolean(process.env.PG_SSL, false),
    schema: parseIdentifier('PG_SCHEMA', process.env.PG_SCHEMA, 'guidance'),
    poolMax: atLeast(parseNumber(process.env.PG_POOL_MAX, 10), 1),
    statementTimeoutMs: atLeast(parseNumber(process.env.PG_STATEMENT_TIMEOUT_MS, 5000), 100)
  } satisfies GuidanceDatabaseConfig;

  const maxLimit = atLeast(parseNumber(process.env.JOB_SEARCH_MAX_LIMIT, 50), 1);
  const corpus: GuidanceCorpusConfig = {
    jobsTable: parseIdentifier('JOBS_TABLE', process.env.JOBS_TABLE, 'jobs'),
    defaultLimit: Math.min(maxLimit, atLeast(parseNumber(process.env.JOB_SEARCH_DEFAULT_LIMIT, 10), 1)),
    maxLimit
  } satisfies GuidanceCorpusConfig;

  const classifier: GuidanceClassifierConfig = {
    frameworkPath: process.env.RIASEC_FRAMEWORK_PATH ?? DEFAULT_FRAMEWORK_PATH,
    titleBonus: atLeast(parseNumber(process.env.CLASSIFIER_TITLE_BONUS, 2), 0)
  } satisfies GuidanceClassifierConfig;

  cachedConfig = {
    base,
    database,
    corpus,
    classifier,
    port: parseNumber(process.env.PORT, 8080)
  } satisfies GuidanceServiceConfig;

  return cachedConfig;
}

export function resetGuidanceServiceConfig(): void {
  cachedConfig = null;
}
