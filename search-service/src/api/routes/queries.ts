import type { FastifyInstance } from 'fastify';
import { compileSearchQuery } from 'cts-search';
import type { Config } from '../../config.js';
import { CompileRequestSchema, assertCriteriaDepth, toSearchQuery } from '../schemas.js';

export async function registerQueryRoutes(
  app: FastifyInstance,
  config: Config,
): Promise<void> {
  // POST /queries/compile: compile a query descriptor into a cts:search expression
  app.post('/queries/compile', async (request, reply) => {
    assertCriteriaDepth(request.body, config.maxCriteriaDepth);
    const body = CompileRequestSchema.parse(request.body);
    const query = toSearchQuery(body, config.maxCriteriaDepth);
    const text = compileSearchQuery(query, { prefixed: body.prefixed ?? config.prefixed });
    request.log.debug({ query: text }, 'compiled search query');
    return reply.status(200).send({ query: text });
  });
}
