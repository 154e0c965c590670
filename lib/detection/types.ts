/**
 * Core types for the phishing detection engine
 */

// Raw email as supplied by the caller
export interface EmailMessage {
  subject: string;
  body: string;
  sender: string; // "Display Name" <address@domain> or a bare address
  headers?: Record<string, string>;
}

// Sender after parsing the From text
export interface EmailAddress {
  address: string;
  displayName?: string;
  domain: string;
}

export type ThreatCategory =
  | 'linguistic_manipulation'
  | 'technical_indicator'
  | 'social_engineering';

export const THREAT_CATEGORIES: readonly ThreatCategory[] = [
  'linguistic_manipulation',
  'technical_indicator',
  'social_engineering',
];

export type IndicatorSource = 'rule_based' | 'ai_analysis';

export interface ThreatIndicator {
  category: ThreatCategory;
  description: string;
  source: IndicatorSource;
  weight: number; // 0-1
  ruleId?: string;
}

// Output of the deterministic layer
export interface RuleBasedResult {
  score: number; // 0-1, capped
  indicators: ThreatIndicator[];
}

// Validated model verdict
export interface AIAnalysisResult {
  score: number; // 0-1
  confidence: number; // 0-1
  indicators: ThreatIndicator[];
  rationale: string;
  recommendedActions: string[];
}

export type RiskLevel = 'low' | 'medium' | 'high';

// Final verdict
export interface RiskReport {
  finalScore: number; // 0-1
  riskLevel: RiskLevel;
  indicators: ThreatIndicator[];
  rationale: string;
  ruleScore: number;
  aiScore: number | null;
  aiConfidence: number | null;
  aiAvailable: boolean;
  recommendedActions: string[];
  correlationId?: string;
  analyzedAt?: string;
}

/**
 * Injected model capability: prompt in, raw text out.
 * Implementations should honour `signal` when given.
 */
export type ModelCall = (prompt: string, options?: ModelCallOptions) => Promise<string>;

export interface ModelCallOptions {
  signal?: AbortSignal;
}

// Detection configuration
export interface DetectionConfig {
  // LLM settings
  llmModel: string;
  llmMaxTokens: number;
  llmTimeoutMs: number;
  llmMaxAttempts: number;
  llmRetryBaseDelayMs: number;
  llmDailyLimit?: number;

  // Prompt construction
  maxBodyChars: number;
}

export const DEFAULT_DETECTION_CONFIG: DetectionConfig = {
  llmModel: 'claude-3-5-haiku-20241022',
  llmMaxTokens: 1024,
  llmTimeoutMs: 15000,
  llmMaxAttempts: 2,
  llmRetryBaseDelayMs: 500,
  maxBodyChars: 4000,
};

// Fusion weights and risk bands
export const RULE_WEIGHT = 0.3;
export const AI_WEIGHT = 0.7;
export const MEDIUM_RISK_THRESHOLD = 0.3;
export const HIGH_RISK_THRESHOLD = 0.6;
