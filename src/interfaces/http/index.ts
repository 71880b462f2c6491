export { default as servicesPlugin } from './services-plugin.js';
export type { CaseDeskServices } from './services-plugin.js';
export { default as configRoutes } from './config-routes.js';
export { default as caseRoutes } from './case-routes.js';
export { default as healthRoutes } from './health-routes.js';
export { registerErrorHandler, statusForError } from './error-handler.js';
