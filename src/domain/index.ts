export type {
  CaseStatus,
  CatalogEntry,
  AttachedEntry,
  CaseRecord,
  SortDirection,
} from './case-config.js';
export { CASE_STATUSES, isClosed } from './case-config.js';
export type { AttachmentChangedEvent, UpdateSource } from './attachment-event.js';
export {
  CaseDeskError,
  NotFoundError,
  SelectionError,
  CaseClosedError,
  DataAccessError,
  ExternalServiceError,
  isCaseDeskError,
} from './errors.js';
export type { ErrorKind } from './errors.js';
