export { EmailNotifier } from './email.js';
export type { EmailConfig } from './email.js';
