import { buildServer, getLogger } from '@career-guidance/common';

import { getGuidanceServiceConfig } from './config';
import { GuidanceService } from './guidance-service';
import { PgJobCorpusGateway } from './job-corpus-gateway';
import { PgLearnerStore } from './learner-store';
import { GuidancePgClient } from './pg-client';
import { createRiasecEngine } from './riasec';
import { registerRoutes } from './routes';
import { ToolDispatchGuard } from './tool-dispatch-guard';

async function bootstrap(): Promise<void> {
  process.env.SERVICE_NAME = process.env.SERVICE_NAME ?? 'guidance-svc';

  const logger = getLogger({ module: 'guidance-bootstrap' });

  try {
    const config = getGuidanceServiceConfig();
    logger.info('Configuration loaded');

    const engine = createRiasecEngine({
      logger: getLogger({ module: 'riasec' }),
      frameworkPath: config.classifier.frameworkPath,
      titleBonus: config.classifier.titleBonus
    });

    const pgClient = new GuidancePgClient(config.database, getLogger({ module: 'guidance-pg-client' }));
    const service = new GuidanceService({
      store: new PgLearnerStore(pgClient, getLogger({ module: 'learner-store' })),
      corpus: new PgJobCorpusGateway(pgClient, config.corpus, getLogger({ module: 'job-corpus-gateway' })),
      guard: new ToolDispatchGuard(getLogger()),
      config: config.corpus,
      logger: getLogger({ module: 'guidance-service' })
    });

    const server = await buildServer({ disableDefaultHealthRoute: true });
    await registerRoutes(server, {
      engine,
      service,
      serviceName: config.base.runtime.serviceName,
      databaseHealth: () => pgClient.healthCheck()
    });

    server.addHook('onClose', async () => {
      await pgClient.close();
    });

    await server.listen({ port: config.port, host: '0.0.0.0' });
    logger.info({ port: config.port, service: config.base.runtime.serviceName }, 'guidance-svc listening');

    const shutdown = async () => {
      logger.info('Received shutdown signal.');
      try {
        await server.close();
        logger.info('Server closed gracefully.');
        process.exit(0);
      } catch (error) {
        logger.error({ error }, 'Failed to close server gracefully.');
        process.exit(1);
      }
    };

    process.on('SIGTERM', shutdown);
    process.on('SIGINT', shutdown);
  } catch (error) {
    logger.error({ error }, 'Failed to bootstrap guidance-svc.');
    process.exit(1);
  }
}

void bootstrap();
