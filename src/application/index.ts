export type {
  CaseConfigRepository,
  CaseConfigSender,
  CaseConfigPayload,
  NewAttachedEntry,
  PaginationParams,
} from './ports.js';
export {
  attachConfigsToCase,
  planAttachment,
  summarizeAttachment,
  ALL_ADDED_MESSAGE,
  NONE_ADDED_MESSAGE,
} from './attach-configs.js';
export type { AttachResult, AttachPlan } from './attach-configs.js';
export { sendCaseConfigs, buildCaseConfigPayload } from './send-case-configs.js';
export type { SendResult } from './send-case-configs.js';
export { listConfigs, countConfigs, getCase, listCaseConfigs, DEFAULT_PAGE_SIZE } from './query-configs.js';
export type { ListConfigsParams, ConfigPage } from './query-configs.js';
export { attachConfigsSchema, sendCaseConfigsSchema, listQuerySchema } from './request-schema.js';
export type { AttachConfigsInput, SendCaseConfigsInput, ListQuery } from './request-schema.js';
