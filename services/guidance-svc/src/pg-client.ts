import { Pool, type PoolConfig, type QueryResultRow } from 'pg';
import type { Logger } from 'pino';

import type { GuidanceDatabaseConfig } from './config';
import { CollaboratorUnavailableError } from './errors';

export interface DatabaseHealth {
  status: 'healthy' | 'degraded';
  latencyMs?: number;
  message?: string;
}

/**
 * Lazily created pg pool shared by the learner store and the job corpus
 * gateway. Query failures surface as CollaboratorUnavailableError.
 */
export class GuidancePgClient {
  private pool: Pool | null = null;

  constructor(private readonly config: GuidanceDatabaseConfig, private readonly logger: Logger) {}

  get schema(): string {
    return this.config.schema;
  }

  private createPool(): Pool {
    const poolConfig: PoolConfig = {
      host: this.config.host,
      port: this.config.port,
      user: this.config.user,
      password: this.config.password,
      database: this.config.database,
      ssl: this.config.ssl ? { rejectUnauthorized: false } : undefined,
      max: this.config.poolMax,
      statement_timeout: this.config.statementTimeoutMs
    } satisfies PoolConfig;

    const pool = new Pool(poolConfig);

    pool.on('error', (error) => {
      this.logger.error({ error }, 'PostgreSQL pool error.');
    });

    return pool;
  }

  private ensurePool(): Pool {
    if (!this.pool) {
      this.pool = this.createPool();
    }
    return this.pool;
  }

  async query<T extends QueryResultRow>(
    collaborator: string,
    operation: string,
    text: string,
    values: unknown[] = []
  ): Promise<T[]> {
    const pool = this.ensurePool();
    try {
      const result = await pool.query<T>(text, values);
      return result.rows;
    } catch (error) {
      this.logger.error({ error, collaborator, operation }, 'PostgreSQL query failed.');
      throw new CollaboratorUnavailableError(collaborator, operation, error);
    }
  }

  async healthCheck(): Promise<DatabaseHealth> {
    const pool = this.ensurePool();
    const start = Date.now();
    try {
      await pool.query('SELECT 1');
      return { status: 'healthy', latencyMs: Date.now() - start };
    } catch (error) {
      this.logger.error({ error }, 'PostgreSQL health check failed.');
      return { status: 'degraded', message: error instanceof Error ? error.message : 'Unknown error' };
    }
  }

  async close(): Promise<void> {
    if (!this.pool) {
      return;
    }

    try {
      await this.pool.end();
    } catch (error) {
      this.logger.warn({ error }, 'Failed to close PostgreSQL pool.');
    } finally {
      this.pool = null;
    }
  }
}
