/**
 * Deterministic Detection Layer
 * Fast, rule-based checks that don't require external APIs
 */

import type { EmailMessage, RuleBasedResult, ThreatIndicator } from './types';
import { normalizeEmail } from './parser';
import { DETECTION_RULES, buildRuleContext, evaluateRule, type DetectionRule } from './rules';

/**
 * Run the rule catalog over an email.
 * Pure: the same message always yields the same result, and malformed
 * fields are read as empty text.
 */
export function extractFeatures(
  email: EmailMessage,
  rules: readonly DetectionRule[] = DETECTION_RULES
): RuleBasedResult {
  const context = buildRuleContext(normalizeEmail(email));
  const indicators: ThreatIndicator[] = [];

  for (const rule of rules) {
    const detail = evaluateRule(rule, context);
    if (detail === null) continue;

    indicators.push({
      category: rule.category,
      description: detail,
      source: 'rule_based',
      weight: rule.weight,
      ruleId: rule.id,
    });
  }

  return {
    score: calculateScore(indicators),
    indicators,
  };
}

/**
 * Sum of matched weights, capped at 1.0
 */
export function calculateScore(indicators: ThreatIndicator[]): number {
  const total = indicators.reduce((sum, indicator) => sum + indicator.weight, 0);
  return Math.min(1, total);
}
