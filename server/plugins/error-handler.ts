import { FastifyError, FastifyInstance } from 'fastify';
import { ZodError } from 'zod';
import { isAppError } from '../lib/errors';

/**
 * Maps thrown errors to the `{ success: false, error, details }`
 * envelope. Engine errors carry their own status code; zod failures
 * from request parsing are 400s; anything else is logged as a 500.
 */
export function registerErrorHandler(server: FastifyInstance): void {
  server.setErrorHandler((error: FastifyError, request, reply) => {
    if (error instanceof ZodError) {
      const details = error.issues.map((i) => ({ path: i.path.join('.'), message: i.message }));
      request.log.warn({ details }, 'Request validation failed');
      return reply.code(400).send({ success: false, error: 'Validation failed', details });
    }

    if (isAppError(error)) {
      const log = error.statusCode >= 500 ? request.log.error.bind(request.log) : request.log.warn.bind(request.log);
      log({ code: error.code, details: error.details }, error.message);
      return reply.code(error.statusCode).send({
        success: false,
        error: error.message,
        ...(error.details === null ? {} : { details: error.details }),
      });
    }

    if (error.statusCode && error.statusCode < 500) {
      return reply.code(error.statusCode).send({ success: false, error: error.message });
    }

    request.log.error({ err: error }, 'Unhandled error');
    return reply.code(500).send({ success: false, error: 'Internal server error' });
  });

  server.setNotFoundHandler((request, reply) => {
    reply.code(404).send({ success: false, error: `Route ${request.method} ${request.url} not found` });
  });
}
