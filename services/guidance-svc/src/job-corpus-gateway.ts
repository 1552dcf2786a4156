import type { Logger } from 'pino';

import type { GuidanceCorpusConfig } from './config';
import type { GuidancePgClient } from './pg-client';
import { parseRiasecCode } from './riasec/code-table';
import type { JobRecord } from './types';

export interface RiasecJobQuery {
  limit?: number;
  primaryTypeOnly?: boolean;
}

/** Read-only access to the job collection. */
export interface JobCorpusGateway {
  findByRiasec(code: string, query?: RiasecJobQuery): Promise<JobRecord[]>;
  findBySkills(skills: readonly string[], limit?: number): Promise<JobRecord[]>;
  getJob(jobLink: string): Promise<JobRecord | null>;
}

interface JobRow {
  job_link: string;
  job_title: string;
  company: string | null;
  job_location: string | null;
  job_level: string | null;
  job_skills: string | null;
  riasec_code: string | null;
  riasec_confidence: string | number | null;
}

const JOB_COLUMNS = `job_link, job_title, company, job_location, job_level, job_skills, riasec_code, riasec_confidence`;

/** Skills beyond this many are ignored when building the candidate filter. */
export const MAX_SKILL_FILTERS = 10;

const COLLABORATOR = 'job-corpus';

function escapeLike(value: string): string {
  return value.replace(/[\\%_]/g, (match) => `\\${match}`);
}

function optionalText(value: string | null): string | undefined {
  return value === null || value.trim().length === 0 ? undefined : value;
}

export function mapJobRow(row: JobRow): JobRecord {
  const confidence = row.riasec_confidence === null ? undefined : Number(row.riasec_confidence);

  return {
    jobLink: row.job_link,
    title: row.job_title,
    company: optionalText(row.company),
    location: optionalText(row.job_location),
    level: optionalText(row.job_level),
    skills: row.job_skills ?? '',
    riasecCode: optionalText(row.riasec_code),
    riasecConfidence: confidence !== undefined && Number.isFinite(confidence) ? confidence : undefined
  };
}

export class PgJobCorpusGateway implements JobCorpusGateway {
  private readonly table: string;

  constructor(
    private readonly client: GuidancePgClient,
    private readonly config: GuidanceCorpusConfig,
    private readonly logger: Logger
  ) {
    this.table = `${client.schema}.${config.jobsTable}`;
  }

  private clampLimit(limit: number | undefined): number {
    const requested = limit ?? this.config.defaultLimit;
    return Math.min(this.config.maxLimit, Math.max(1, Math.floor(requested)));
  }

  async findByRiasec(code: string, query: RiasecJobQuery = {}): Promise<JobRecord[]> {
    const letters = parseRiasecCode(code);
    const limit = this.clampLimit(query.limit);

    const [column, value] = query.primaryTypeOnly
      ? ['primary_riasec_type', letters[0]]
      : ['riasec_code', letters.join('')];

    const rows = await this.client.query<JobRow>(
      COLLABORATOR,
      'findByRiasec',
      `SELECT ${JOB_COLUMNS}
       FROM ${this.table}
       WHERE ${column} = $1
       ORDER BY riasec_confidence DESC NULLS LAST
       LIMIT $2`,
      [value, limit]
    );

    this.logger.debug({ code: letters.join(''), primaryTypeOnly: Boolean(query.primaryTypeOnly), rows: rows.length }, 'Jobs fetched by RIASEC code');
    return rows.map(mapJobRow);
  }

  async findBySkills(skills: readonly string[], limit?: number): Promise<JobRecord[]> {
    const patterns = skills
      .map((skill) => skill.trim())
      .filter((skill) => skill.length > 0)
      .slice(0, MAX_SKILL_FILTERS)
      .map((skill) => `%${escapeLike(skill)}%`);

    if (patterns.length === 0) {
      return [];
    }

    const rows = await this.client.query<JobRow>(
      COLLABORATOR,
      'findBySkills',
      `SELECT ${JOB_COLUMNS}
       FROM ${this.table}
       WHERE job_skills ILIKE ANY($1::text[])
       LIMIT $2`,
      [patterns, this.clampLimit(limit)]
    );

    return rows.map(mapJobRow);
  }

  async getJob(jobLink: string): Promise<JobRecord | null> {
    const rows = await this.client.query<JobRow>(
      COLLABORATOR,
      'getJob',
      `SELECT ${JOB_COLUMNS} FROM ${this.table} WHERE job_link = $1 LIMIT 1`,
      [jobLink]
    );

    const [row] = rows;
    return row ? mapJobRow(row) : null;
  }
}
