/**
 * Detection Pipeline
 * Runs the rule layer, then the LLM layer, then fuses both into a RiskReport
 */

import type { AIAnalysisResult, EmailMessage, ModelCall, RiskReport } from './types';
import { normalizeEmail } from './parser';
import { extractFeatures } from './deterministic';
import { runLLMAnalysis, type LLMAnalysisOptions } from './llm';
import { fuseScores } from './scoring';
import { generateCorrelationId, loggers, type Logger } from '@/lib/logging/logger';

export interface AnalyzeOptions {
  retry?: LLMAnalysisOptions['retry'];
  maxBodyChars?: number;
  correlationId?: string;
  logger?: Logger;
}

/**
 * Analyze an email. Always resolves: a failing model call only removes the
 * AI contribution from the report.
 *
 * `timeoutMs` bounds the model call, retries included. A value of zero or
 * less skips the model and yields the rule-only report.
 */
export async function analyzeEmail(
  email: EmailMessage,
  modelCall: ModelCall,
  timeoutMs: number,
  options: AnalyzeOptions = {}
): Promise<RiskReport> {
  const startTime = performance.now();
  const correlationId = options.correlationId ?? generateCorrelationId();
  const logger = (options.logger ?? loggers.detection).withCorrelationId(correlationId);

  const message = normalizeEmail(email);
  const ruleResult = extractFeatures(message);

  let aiResult: AIAnalysisResult | null;
  try {
    aiResult = await runLLMAnalysis(message, modelCall, {
      timeoutMs,
      retry: options.retry,
      maxBodyChars: options.maxBodyChars,
      logger,
    });
  } catch (error) {
    logger.error('LLM layer failed unexpectedly', error instanceof Error ? error : new Error(String(error)));
    aiResult = null;
  }

  const report: RiskReport = {
    ...fuseScores(ruleResult, aiResult),
    correlationId,
    analyzedAt: new Date().toISOString(),
  };

  logger.info('Email analyzed', {
    finalScore: report.finalScore,
    riskLevel: report.riskLevel,
    ruleScore: report.ruleScore,
    aiAvailable: report.aiAvailable,
    indicatorCount: report.indicators.length,
    duration: Math.round(performance.now() - startTime),
  });

  return report;
}
