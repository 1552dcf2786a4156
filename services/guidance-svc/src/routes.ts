import type { FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import { withRequestLogger } from '@career-guidance/common';

import type { GuidanceService } from './guidance-service';
import type { DatabaseHealth } from './pg-client';
import type { RiasecEngine } from './riasec';
import {
  bestFitJobsSchema,
  classifySchema,
  codeDescriptionSchema,
  fitSchema,
  skillGapSchema,
  toolCallSchema,
  turnSchema
} from './schemas';
import { calculateSkillGap } from './skill-gap';
import type {
  BestFitJobsRequestBody,
  ClassifyRequestBody,
  CodeParams,
  FitRequestBody,
  LearnerParams,
  SkillGapRequestBody,
  ToolCallRequestBody
} from './types';

export interface RegisterGuidanceRoutesOptions {
  engine: RiasecEngine;
  service: GuidanceService;
  serviceName: string;
  databaseHealth?: () => Promise<DatabaseHealth>;
}

export async function registerRoutes(app: FastifyInstance, dependencies: RegisterGuidanceRoutesOptions): Promise<void> {
  const { engine, service } = dependencies;

  app.get('/health', async (_request: FastifyRequest, reply: FastifyReply) => {
    const database = dependencies.databaseHealth ? await dependencies.databaseHealth() : undefined;
    const degraded = database !== undefined && database.status !== 'healthy';

    if (degraded) {
      reply.status(503);
    }

    return {
      status: degraded ? 'degraded' : 'ok',
      service: dependencies.serviceName,
      riasecCodes: engine.codes.size,
      indicators: engine.table.size,
      database
    };
  });

  app.post(
    '/v1/riasec/classify',
    { schema: classifySchema },
    async (request: FastifyRequest<{ Body: ClassifyRequestBody }>) => {
      const result = engine.classifier.classify(request.body.skills, request.body.title);
      request.log.debug({ code: result.code, confidence: result.confidence }, 'Skills classified');
      return result;
    }
  );

  app.get(
    '/v1/riasec/codes/:code',
    { schema: codeDescriptionSchema },
    async (request: FastifyRequest<{ Params: CodeParams }>) => engine.codes.describe(request.params.code)
  );

  app.post(
    '/v1/riasec/fit',
    { schema: fitSchema },
    async (request: FastifyRequest<{ Body: FitRequestBody }>) =>
      engine.codes.assessFit(request.body.learnerCode, request.body.jobCode)
  );

  app.post(
    '/v1/skills/gap',
    { schema: skillGapSchema },
    async (request: FastifyRequest<{ Body: SkillGapRequestBody }>) =>
      calculateSkillGap(request.body.learnerSkills, request.body.requiredSkills)
  );

  app.get(
    '/v1/learners/:learnerId/turn',
    { schema: turnSchema },
    async (request: FastifyRequest<{ Params: LearnerParams }>) => service.resolveTurn(request.params.learnerId)
  );

  app.post(
    '/v1/learners/:learnerId/tool-calls',
    { schema: toolCallSchema },
    async (request: FastifyRequest<{ Params: LearnerParams; Body: ToolCallRequestBody }>) => {
      const { learnerId } = request.params;
      const outcome = await service.checkToolCall(learnerId, request.body.toolName, request.body.arguments ?? {});

      const requestLogger = withRequestLogger({
        module: 'guidance-routes',
        requestId: request.requestContext.requestId,
        learnerId
      });
      requestLogger.info(
        { tool: request.body.toolName, mode: outcome.mode, allowed: outcome.result.allowed },
        'Tool call checked.'
      );

      return outcome;
    }
  );

  app.post(
    '/v1/learners/:learnerId/best-fit-jobs',
    { schema: bestFitJobsSchema },
    async (request: FastifyRequest<{ Params: LearnerParams; Body: BestFitJobsRequestBody | undefined }>) =>
      service.findBestFitJobs(request.params.learnerId, request.body ?? {})
  );
}
