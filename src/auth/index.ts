/**
 * E*TRADE OAuth 1.0a authentication
 */

export { AccountResolver, accountListSchema } from './account-resolver.js';
export { EASTERN_TIME_ZONE, easternDateKey, isSameEasternDay } from './eastern-time.js';
export * from './errors.js';
export { OAuthSessionController } from './handshake.js';
export type { HandshakeResult } from './handshake.js';
export { EtradeOAuth } from './oauth.js';
export { OAuth1Signer, parseTokenResponse } from './oauth1.js';
export type { OAuthProtocolParams, TokenPair } from './oauth1.js';
export { TokenManager } from './token-manager.js';
export type { TokenManagerOptions, TokenState } from './token-manager.js';
export { ConsoleVerifierSource, PendingVerifierSource } from './verifier.js';
export type { ConsoleVerifierOptions, VerifierSource } from './verifier.js';
