/**
 * Authenticated E*TRADE sessions
 */

export { EtradeSession } from './etrade-session.js';
export { SessionFacade } from './session-facade.js';
export type { AuthorizationPrompt, SessionFacadeDeps } from './session-facade.js';
export type * from './types.js';
