import fp from 'fastify-plugin';
import type { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import { countConfigs, listConfigs, listQuerySchema } from '../../application/index.js';

/**
 * Catalog routes.
 *
 * GET /api/v1/configs       : one page of the catalog
 * GET /api/v1/configs/count : total catalog size
 */
async function configRoutes(fastify: FastifyInstance): Promise<void> {

  fastify.get(
    '/api/v1/configs',
    async (request: FastifyRequest<{ Querystring: unknown }>, reply: FastifyReply) => {
      const parsed = listQuerySchema.safeParse(request.query);
      if (!parsed.success) {
        return reply.status(400).send({ error: 'Validation failed', issues: parsed.error.issues });
      }

      const page = await listConfigs(fastify.caseDesk.repository, parsed.data);
      return reply.status(200).send(page);
    },
  );

  fastify.get(
    '/api/v1/configs/count',
    async (_request: FastifyRequest, reply: FastifyReply) => {
      const total = await countConfigs(fastify.caseDesk.repository);
      return reply.status(200).send({ total });
    },
  );
}

export default fp(configRoutes, {
  name: 'config-routes',
  dependencies: ['services'],
  fastify: '5.x',
});
