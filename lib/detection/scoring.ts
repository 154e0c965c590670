/**
 * Score Fusion
 *
 * Blends the rule-based score with the model's score, damps the blend by the
 * model's confidence and maps the result onto a risk level. Total over its
 * inputs: a missing AI result degrades to the rule score alone.
 */

import type {
  AIAnalysisResult,
  RiskLevel,
  RiskReport,
  RuleBasedResult,
  ThreatCategory,
} from './types';
import { AI_WEIGHT, HIGH_RISK_THRESHOLD, MEDIUM_RISK_THRESHOLD, RULE_WEIGHT } from './types';
import { clamp01 } from './math';

const CATEGORY_LABELS: Record<ThreatCategory, string> = {
  linguistic_manipulation: 'linguistic manipulation',
  technical_indicator: 'technical indicator',
  social_engineering: 'social engineering',
};

export const AI_UNAVAILABLE_NOTE = 'AI analysis unavailable; score is based on rule-based analysis only.';

export function fuseScores(rule: RuleBasedResult, ai: AIAnalysisResult | null): RiskReport {
  const ruleScore = clamp01(rule.score);

  let finalScore = ruleScore;
  if (ai) {
    const blended = RULE_WEIGHT * ruleScore + AI_WEIGHT * clamp01(ai.score);
    finalScore = clamp01(blended * confidenceFactor(ai.confidence));
  }

  return {
    finalScore,
    riskLevel: classifyRiskLevel(finalScore),
    indicators: [...rule.indicators, ...(ai?.indicators ?? [])],
    rationale: buildRationale(rule, ai),
    ruleScore,
    aiScore: ai ? clamp01(ai.score) : null,
    aiConfidence: ai ? clamp01(ai.confidence) : null,
    aiAvailable: ai !== null,
    recommendedActions: ai ? [...ai.recommendedActions] : [],
  };
}

/**
 * 0.5 at zero confidence, 1.0 at full confidence
 */
export function confidenceFactor(confidence: number): number {
  return 0.5 + 0.5 * clamp01(confidence);
}

/**
 * [0, 0.3) low, [0.3, 0.6) medium, [0.6, 1] high
 */
export function classifyRiskLevel(score: number): RiskLevel {
  if (score >= HIGH_RISK_THRESHOLD) return 'high';
  if (score >= MEDIUM_RISK_THRESHOLD) return 'medium';
  return 'low';
}

export function summarizeRuleFindings(rule: RuleBasedResult): string {
  const count = rule.indicators.length;
  if (count === 0) {
    return 'Rule-based analysis matched no known phishing patterns.';
  }

  const categories = [...new Set(rule.indicators.map((indicator) => indicator.category))]
    .map((category) => CATEGORY_LABELS[category]);
  const noun = count === 1 ? 'indicator' : 'indicators';

  return `Rule-based analysis matched ${count} ${noun} (${categories.join(', ')}).`;
}

function buildRationale(rule: RuleBasedResult, ai: AIAnalysisResult | null): string {
  const summary = summarizeRuleFindings(rule);

  if (!ai) {
    return `${summary} ${AI_UNAVAILABLE_NOTE}`;
  }
  return ai.rationale ? `${summary} AI analysis: ${ai.rationale}` : summary;
}
