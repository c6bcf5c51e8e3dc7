export * from './types.js';
export { buildAnalysisPrompt } from './prompt.js';
export { parseRecommendation, normalizeConfidence, normalizeRiskLevel, normalizeAction } from './parser.js';
export { OpenAICompatibleEngine, describeBackend } from './engine.js';
export type { ChatClient } from './engine.js';
export { RecommendationService, exceedsRiskProfile } from './service.js';
