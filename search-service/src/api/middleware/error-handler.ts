import type { FastifyInstance } from 'fastify';
import { ZodError } from 'zod';
import { SearchQueryError } from 'cts-search';
import { CriteriaTooDeepError } from '../../errors.js';

function hasStatusCode(error: Error): error is Error & { statusCode: number } {
  return 'statusCode' in error && typeof error.statusCode === 'number';
}

export function registerErrorHandler(app: FastifyInstance): void {
  app.setErrorHandler((unknownError, _request, reply) => {
    // Ensure we always deal with an Error object
    const error = unknownError instanceof Error ? unknownError : new Error(String(unknownError));

    // Request body does not match the descriptor schema → 400
    if (error instanceof ZodError) {
      return reply.status(400).send({ error: 'ValidationError', issues: error.issues });
    }

    // Well-formed JSON describing an invalid query → 422
    if (error instanceof SearchQueryError || error instanceof CriteriaTooDeepError) {
      return reply.status(422).send({ error: error.name, message: error.message });
    }

    // Fastify built-in errors have a numeric `statusCode`; pass it through
    if (hasStatusCode(error)) {
      return reply.status(error.statusCode).send({ error: error.name, message: error.message });
    }

    app.log.error(error);
    return reply.status(500).send({ error: 'InternalError', message: 'Internal server error' });
  });
}
