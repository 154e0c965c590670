/**
 * Detection Engine - Main exports
 */

// Types
export type {
  EmailMessage,
  EmailAddress,
  ThreatCategory,
  IndicatorSource,
  ThreatIndicator,
  RuleBasedResult,
  AIAnalysisResult,
  RiskLevel,
  RiskReport,
  ModelCall,
  ModelCallOptions,
  DetectionConfig,
} from './types';

export {
  DEFAULT_DETECTION_CONFIG,
  THREAT_CATEGORIES,
  RULE_WEIGHT,
  AI_WEIGHT,
  MEDIUM_RISK_THRESHOLD,
  HIGH_RISK_THRESHOLD,
} from './types';

// Parsing
export { normalizeEmail, parseEmailAddress, getHeader, extractUrls } from './parser';

// Detection layers
export { extractFeatures, calculateScore } from './deterministic';
export { DETECTION_RULES, type DetectionRule } from './rules';
export {
  runLLMAnalysis,
  buildAnalysisPrompt,
  parseAnalysisResponse,
  extractJsonObject,
  normalizeCategory,
  type LLMAnalysisOptions,
} from './llm';
export { fuseScores, classifyRiskLevel, confidenceFactor } from './scoring';

// Main pipeline
export { analyzeEmail, type AnalyzeOptions } from './pipeline';

// Model capability
export { ModelCallError, ModelErrorKind, isModelCallError, toModelCallError } from './errors';
export { LLMRateLimiter, withDailyLimit, type RateLimitConfig, type RateLimitResult } from './llm-rate-limiter';
export {
  createAnthropicModelCall,
  createModelCallFromConfig,
  classifyAnthropicError,
  type AnthropicModelCallConfig,
  type MessagesClient,
} from './providers/anthropic';
