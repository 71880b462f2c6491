import fp from 'fastify-plugin';
import type { FastifyInstance } from 'fastify';
import type { CaseConfigRepository, CaseConfigSender } from '../../application/index.js';
import type { AttachmentChangedEvent } from '../../domain/index.js';

export interface CaseDeskServices {
  repository: CaseConfigRepository;
  sender: CaseConfigSender;
  /** Best-effort fan-out of attachment changes to other sessions. */
  notify: (event: AttachmentChangedEvent) => Promise<void>;
}

/**
 * Decorates `fastify.caseDesk` with the collaborators routes depend on,
 * so tests can swap in the in-memory store and a stub sender.
 */
async function servicesPlugin(fastify: FastifyInstance, services: CaseDeskServices): Promise<void> {
  fastify.decorate('caseDesk', {
    repository: services.repository,
    sender: services.sender,
    notify: services.notify,
  });
}

export default fp(servicesPlugin, {
  name: 'services',
  fastify: '5.x',
});

declare module 'fastify' {
  interface FastifyInstance {
    caseDesk: CaseDeskServices;
  }
}
