import fp from 'fastify-plugin';
import type { FastifyBaseLogger, FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import {
  attachConfigsSchema,
  attachConfigsToCase,
  getCase,
  listCaseConfigs,
  listQuerySchema,
  sendCaseConfigs,
  sendCaseConfigsSchema,
} from '../../application/index.js';
import { isUuid } from './validation.js';
import type { AttachmentChangedEvent } from '../../domain/index.js';

type CaseParams = { Params: { case_id: string } };

/**
 * Case routes.
 *
 * GET  /api/v1/cases/:case_id         : case with status
 * GET  /api/v1/cases/:case_id/configs : configs attached to the case
 * POST /api/v1/cases/:case_id/configs : attach catalog entries
 * POST /api/v1/case-configs/send      : submit attached configs, close case
 */
async function caseRoutes(fastify: FastifyInstance): Promise<void> {
  const { repository, sender, notify } = fastify.caseDesk;

  // The response never waits on the side channel.
  function notifyInBackground(log: FastifyBaseLogger, event: AttachmentChangedEvent): void {
    notify(event).catch((err: unknown) => {
      log.error({ err, case_id: event.case_id }, 'Config update notification failed');
    });
  }

  fastify.get(
    '/api/v1/cases/:case_id',
    async (request: FastifyRequest<CaseParams>, reply: FastifyReply) => {
      const { case_id } = request.params;
      if (!isUuid(case_id)) {
        return reply.status(400).send({ error: 'case_id must be a valid UUID' });
      }
      return reply.status(200).send(await getCase(repository, case_id));
    },
  );

  fastify.get(
    '/api/v1/cases/:case_id/configs',
    async (request: FastifyRequest<CaseParams & { Querystring: unknown }>, reply: FastifyReply) => {
      const { case_id } = request.params;
      if (!isUuid(case_id)) {
        return reply.status(400).send({ error: 'case_id must be a valid UUID' });
      }
      const query = listQuerySchema.safeParse(request.query);
      if (!query.success) {
        return reply.status(400).send({ error: 'Validation failed', issues: query.error.issues });
      }

      const data = await listCaseConfigs(repository, case_id, query.data.sort);
      return reply.status(200).send({ data });
    },
  );

  fastify.post(
    '/api/v1/cases/:case_id/configs',
    async (request: FastifyRequest<CaseParams & { Body: unknown }>, reply: FastifyReply) => {
      const { case_id } = request.params;
      if (!isUuid(case_id)) {
        return reply.status(400).send({ error: 'case_id must be a valid UUID' });
      }
      const parsed = attachConfigsSchema.safeParse(request.body);
      if (!parsed.success) {
        return reply.status(400).send({ error: 'Validation failed', issues: parsed.error.issues });
      }

      const result = await attachConfigsToCase(repository, case_id, parsed.data.config_ids);
      request.log.info(
        { case_id, added: result.totalAdded, duplicates: result.totalDuplicates },
        'Configs attached to case',
      );

      if (result.totalAdded > 0) {
        notifyInBackground(request.log, { case_id, source: 'catalog-browser' });
      }

      return reply.status(200).send(result);
    },
  );

  fastify.post(
    '/api/v1/case-configs/send',
    async (request: FastifyRequest<{ Body: unknown }>, reply: FastifyReply) => {
      const parsed = sendCaseConfigsSchema.safeParse(request.body);
      if (!parsed.success) {
        return reply.status(400).send({ error: 'Validation failed', issues: parsed.error.issues });
      }

      const result = await sendCaseConfigs(repository, sender, parsed.data.case_config_ids);
      request.log.info({ case_id: result.case_id, entries: result.entries_sent }, 'Case configs sent, case closed');

      notifyInBackground(request.log, { case_id: result.case_id, source: 'attachment-list' });

      return reply.status(200).send({ status: 'sent', ...result });
    },
  );
}

export default fp(caseRoutes, {
  name: 'case-routes',
  dependencies: ['services'],
  fastify: '5.x',
});
