import { ExternalServiceError } from '../../domain/index.js';
import type { CaseConfigPayload, CaseConfigSender } from '../../application/ports.js';
import type { AppConfig } from '../config.js';
import type { Log } from '../logging.js';

/**
 * Builds the outbound collaborator that POSTs case configs to the
 * external endpoint.
 *
 * Only a 200 counts as success. Any other status, a transport failure,
 * a timeout or a missing endpoint is reported as ExternalServiceError.
 */
export function createCaseConfigSender(
  config: AppConfig['caseConfigEndpoint'],
  log: Log,
): CaseConfigSender {
  return async (payload: CaseConfigPayload): Promise<void> => {
    if (!config.url) {
      log.warn({ case_id: payload.caseId }, 'Case config endpoint not configured, refusing to send');
      throw new ExternalServiceError('Case config endpoint is not configured', null);
    }

    let response: Response;
    try {
      response = await fetch(config.url, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify(payload),
        signal: AbortSignal.timeout(config.timeoutMs),
      });
    } catch (err: unknown) {
      const reason = err instanceof Error ? err.message : String(err);
      log.warn({ err, case_id: payload.caseId }, 'Case config request failed');
      throw new ExternalServiceError(`Failed to reach case config endpoint: ${reason}`, null, { cause: err });
    }

    if (response.status !== 200) {
      log.warn(
        { status: response.status, case_id: payload.caseId },
        'Case config endpoint returned non-200 status',
      );
      throw new ExternalServiceError(
        `Case config endpoint responded ${response.status} ${response.statusText}`.trim(),
        response.status,
      );
    }

    log.info(
      { case_id: payload.caseId, entries: payload.entries.length },
      'Case configs sent',
    );
  };
}
