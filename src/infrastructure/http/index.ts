export { createCaseConfigSender } from './case-config-sender.js';
