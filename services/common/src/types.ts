export type ErrorOrigin = 'core' | 'llm' | 'service';

export interface RequestContext {
  requestId: string;
}

export interface ErrorResponse {
  code: string;
  message: string;
  origin: ErrorOrigin;
  details?: Record<string, unknown>;
}

declare module 'fastify' {
  interface FastifyRequest {
    requestContext: RequestContext;
  }
}
