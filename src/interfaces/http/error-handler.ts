import type { FastifyError, FastifyInstance } from 'fastify';
import { DataAccessError, isCaseDeskError } from '../../domain/index.js';
import type { CaseDeskError } from '../../domain/index.js';

/** HTTP status for each application error kind. */
export function statusForError(err: CaseDeskError): number {
  switch (err.kind) {
    case 'not_found': return 404;
    case 'selection': return 400;
    case 'case_closed': return 409;
    case 'external_service': return 502;
    case 'data_access': return err instanceof DataAccessError && err.conflict ? 409 : 500;
  }
}

/**
 * Maps application errors to `{ error, kind }` responses.
 *
 * Fastify's own 4xx errors (bad JSON, body too large) keep their status.
 * Everything else is logged and returned as a 500.
 */
export function registerErrorHandler(fastify: FastifyInstance): void {
  fastify.setErrorHandler((err: FastifyError, request, reply) => {
    if (isCaseDeskError(err)) {
      const status = statusForError(err);
      if (status >= 500) {
        request.log.error({ err, kind: err.kind }, 'Request failed');
      } else {
        request.log.warn({ err, kind: err.kind }, 'Request rejected');
      }
      return reply.status(status).send({ error: err.message, kind: err.kind });
    }

    if (err.statusCode !== undefined && err.statusCode >= 400 && err.statusCode < 500) {
      return reply.status(err.statusCode).send({ error: err.message });
    }

    request.log.error({ err }, 'Unhandled error');
    return reply.status(500).send({ error: 'Internal server error' });
  });
}
