export type ErrorKind =
  | 'not_found'
  | 'selection'
  | 'case_closed'
  | 'data_access'
  | 'external_service';

/**
 * Base class for every failure the application layer raises.
 *
 * `kind` is the discriminant the HTTP layer maps to a status code.
 */
export abstract class CaseDeskError extends Error {
  abstract readonly kind: ErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/** Referenced case or entries do not exist. */
export class NotFoundError extends CaseDeskError {
  readonly kind = 'not_found';
}

/** Submit was invoked with nothing selected. */
export class SelectionError extends CaseDeskError {
  readonly kind = 'selection';

  constructor(message = 'Select at least one record to send.') {
    super(message);
  }
}

/** Attach or submit attempted against a Closed case. */
export class CaseClosedError extends CaseDeskError {
  readonly kind = 'case_closed';
  readonly caseId: string;

  constructor(caseId: string) {
    super(`Case ${caseId} is closed`);
    this.caseId = caseId;
  }
}

/**
 * Query or insert failure in the record store.
 *
 * `conflict` is set when the store rejected a row on a uniqueness
 * constraint (two sessions attaching the same label at once).
 */
export class DataAccessError extends CaseDeskError {
  readonly kind = 'data_access';
  readonly conflict: boolean;

  constructor(message: string, options: { cause?: unknown; conflict?: boolean } = {}) {
    super(message, { cause: options.cause });
    this.conflict = options.conflict ?? false;
  }
}

/**
 * Non-200 response or transport failure on the outbound call.
 * `status` is null when no response was received.
 */
export class ExternalServiceError extends CaseDeskError {
  readonly kind = 'external_service';
  readonly status: number | null;

  constructor(message: string, status: number | null, options?: { cause?: unknown }) {
    super(message, options);
    this.status = status;
  }
}

export function isCaseDeskError(err: unknown): err is CaseDeskError {
  return err instanceof CaseDeskError;
}
