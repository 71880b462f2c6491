export { UpdateBrokerProvider, useUpdateBroker } from './UpdateBrokerContext.js';
export {
  catalogReducer,
  initialCatalogState,
  pageOffset,
  isPrevDisabled,
  isNextDisabled,
  isAddDisabled,
  totalPagesFor,
  PAGE_SIZE,
} from './catalog-state.js';
export type { CatalogState, CatalogAction } from './catalog-state.js';
export { attachmentReducer, initialAttachmentState, isSendDisabled } from './attachment-state.js';
export type { AttachmentState, AttachmentAction } from './attachment-state.js';
export { errorMessage, GENERIC_ERROR } from './error-message.js';
export { nextSortDirection, sortByCreatedAt } from './sorting.js';
export { publishChange, shouldRefresh } from './refresh.js';
