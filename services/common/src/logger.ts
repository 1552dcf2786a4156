import { randomUUID } from 'crypto';

import type { FastifyPluginAsync } from 'fastify';
import fp from 'fastify-plugin';
import pino, { type Logger } from 'pino';

import { getConfig } from './config';

const REQUEST_START = Symbol('requestStart');

type ChildLoggerBindings = Record<string, unknown>;

type TimedRequest = { [REQUEST_START]?: bigint };

let rootLogger: Logger | null = null;

function buildRootLogger(): Logger {
  const config = getConfig();
  if (!rootLogger) {
    rootLogger = pino({
      level: config.runtime.logLevel,
      base: {
        service: config.runtime.serviceName
      },
      timestamp: () => `,"timestamp":"${new Date().toISOString()}"`
    });
  }

  return rootLogger;
}

export function getLogger(bindings?: ChildLoggerBindings): Logger {
  const logger = buildRootLogger();
  return bindings ? logger.child(bindings) : logger;
}

export function resetLoggerForTesting(): void {
  rootLogger = null;
}

function headerValueToString(value: unknown): string | undefined {
  if (typeof value === 'string') {
    return value;
  }

  if (Array.isArray(value)) {
    return typeof value[0] === 'string' ? value[0] : undefined;
  }

  return undefined;
}

export const requestLoggingPlugin: FastifyPluginAsync = fp(async (fastify) => {
  const config = getConfig();
  const enableLogging = config.runtime.enableRequestLogging;
  const requestIdHeaderName = config.monitoring.requestIdHeader.toLowerCase();

  fastify.addHook('onRequest', async (request, reply) => {
    const incomingRequestId = headerValueToString(request.headers[requestIdHeaderName]);
    const requestId = incomingRequestId && incomingRequestId.length > 0 ? incomingRequestId : randomUUID();

    request.requestContext = { requestId };
    (request as unknown as TimedRequest)[REQUEST_START] = process.hrtime.bigint();

    request.log = request.log.child({ request_id: requestId });

    if (enableLogging) {
      request.log.info({ path: request.url, method: request.method }, 'request:start');
    }

    reply.header(config.monitoring.requestIdHeader, requestId);
  });

  fastify.addHook('onResponse', async (request, reply) => {
    if (!enableLogging) {
      return;
    }

    const start = (request as unknown as TimedRequest)[REQUEST_START];
    const durationMs = start ? Number(process.hrtime.bigint() - start) / 1_000_000 : undefined;

    request.log.info(
      {
        status_code: reply.statusCode,
        duration_ms: durationMs
      },
      'request:complete'
    );
  });
});

function stringBinding(bindings: ChildLoggerBindings, ...keys: string[]): string | undefined {
  for (const key of keys) {
    const value = bindings[key];
    if (typeof value === 'string' && value.length > 0) {
      return value;
    }
  }

  return undefined;
}

export function withRequestLogger(bindings: ChildLoggerBindings): Logger {
  const base: ChildLoggerBindings = {};

  const requestId = stringBinding(bindings, 'request_id', 'requestId');
  if (requestId) {
    base.request_id = requestId;
  }

  const learnerId = stringBinding(bindings, 'learner_id', 'learnerId');
  if (learnerId) {
    base.learner_id = learnerId;
  }

  const requestLogger = Object.keys(base).length > 0 ? getLogger(base) : getLogger();
  return requestLogger.child(bindings);
}
