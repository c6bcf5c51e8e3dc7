/**
 * Local simulated portfolio and user preferences
 */

export { PortfolioStore } from './portfolio-store.js';
export { reconcilePortfolio } from './reconcile.js';
export { Simulator } from './simulator.js';
export { UserConfigStore, isRiskProfile } from './user-config.js';
export * from './types.js';
