/**
 * LLM Analysis Layer
 * Asks an injected model for a JSON verdict and validates it into an AIAnalysisResult
 */

import { z } from 'zod';
import type {
  AIAnalysisResult,
  EmailMessage,
  ModelCall,
  ThreatCategory,
  ThreatIndicator,
} from './types';
import { DEFAULT_DETECTION_CONFIG, THREAT_CATEGORIES } from './types';
import { normalizeEmail, getHeader } from './parser';
import { ModelCallError, ModelErrorKind, toModelCallError } from './errors';
import { clamp01 } from './math';
import { RetryError, retryWithBackoff } from '@/lib/performance/retry';
import { loggers, type Logger } from '@/lib/logging/logger';

export interface LLMAnalysisOptions {
  /**
   * Overall budget for the model call, retries included. Zero or negative
   * skips the call and reports a timeout; unset uses the configured default.
   */
  timeoutMs?: number;
  /** Bounded retry for transient failures; omitted means a single attempt */
  retry?: {
    maxAttempts: number;
    baseDelayMs?: number;
  };
  maxBodyChars?: number;
  logger?: Logger;
}

// Headers worth showing the model besides From/Subject
const CONTEXT_HEADERS = ['reply-to', 'return-path', 'authentication-results', 'received'];

const SEVERITY_WEIGHTS = new Map<string, number>([
  ['critical', 0.9],
  ['high', 0.8],
  ['warning', 0.5],
  ['medium', 0.5],
  ['low', 0.3],
  ['info', 0.2],
]);

const DEFAULT_INDICATOR_WEIGHT = 0.5;

// Keyword prefixes used to map free-form categories onto the three known ones
const CATEGORY_KEYWORDS: Record<ThreatCategory, string[]> = {
  linguistic_manipulation: ['linguistic', 'language', 'urgen', 'tone', 'emotion', 'pressure', 'grammar', 'wording', 'deadline'],
  technical_indicator: ['technical', 'link', 'url', 'domain', 'header', 'sender', 'spoof', 'attachment', 'ip', 'spf', 'dkim', 'dmarc', 'redirect'],
  social_engineering: ['social', 'impersonat', 'authority', 'credential', 'password', 'payment', 'financial', 'fear', 'threat', 'scam', 'request'],
};

const numeric = z
  .union([z.number(), z.string().trim().min(1).transform(Number)])
  .pipe(z.number().finite());

// Only score and confidence decide usability; a malformed secondary field is dropped
const optionalNumeric = numeric.optional().catch(undefined);
const optionalList = z.array(z.unknown()).optional().catch(undefined);

const responseSchema = z.object({
  score: optionalNumeric,
  risk_score: optionalNumeric,
  confidence: optionalNumeric,
  indicators: optionalList,
  threat_indicators: optionalList,
  rationale: z.unknown().optional(),
  reasoning: z.unknown().optional(),
  recommended_actions: z.unknown().optional(),
  recommendedActions: z.unknown().optional(),
});

const indicatorSchema = z.object({
  category: z.string().optional(),
  type: z.string().optional(),
  description: z.string().optional(),
  detail: z.string().optional(),
  weight: optionalNumeric,
  severity: z.string().optional().catch(undefined),
});

/**
 * Run LLM analysis on an email.
 * Resolves to null whenever the model is unavailable or its answer is unusable.
 */
export async function runLLMAnalysis(
  email: EmailMessage,
  modelCall: ModelCall,
  options: LLMAnalysisOptions = {}
): Promise<AIAnalysisResult | null> {
  const logger = options.logger ?? loggers.llm;
  const timeoutMs = resolveTimeout(options.timeoutMs);
  if (timeoutMs <= 0) {
    logger.warn('LLM analysis unavailable', {
      kind: ModelErrorKind.TIMEOUT,
      reason: `No time budget for the model call (${timeoutMs}ms)`,
    });
    return null;
  }

  const prompt = buildAnalysisPrompt(normalizeEmail(email), options.maxBodyChars);

  let text: string;
  try {
    text = await callModel(modelCall, prompt, timeoutMs, options, logger);
  } catch (error) {
    const failure = toModelCallError(error instanceof RetryError ? error.lastError : error);
    logger.warn('LLM analysis unavailable', { kind: failure.kind, reason: failure.message });
    return null;
  }

  const result = parseAnalysisResponse(text);
  if (!result) {
    logger.warn('LLM analysis unavailable', {
      kind: ModelErrorKind.INVALID_RESPONSE,
      reason: 'Response did not contain a usable JSON verdict',
      responseLength: text.length,
    });
  }
  return result;
}

async function callModel(
  modelCall: ModelCall,
  prompt: string,
  timeoutMs: number,
  options: LLMAnalysisOptions,
  logger: Logger
): Promise<string> {
  const controller = new AbortController();
  let timer: ReturnType<typeof setTimeout> | undefined;

  const expired = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      reject(new ModelCallError(ModelErrorKind.TIMEOUT, `Model call timed out after ${timeoutMs}ms`));
      controller.abort();
    }, timeoutMs);
  });

  const attempt = async (): Promise<string> => {
    let text: string;
    try {
      text = await modelCall(prompt, { signal: controller.signal });
    } catch (error) {
      throw toModelCallError(error);
    }
    if (typeof text !== 'string') {
      throw new ModelCallError(ModelErrorKind.INVALID_RESPONSE, 'Model returned a non-text response');
    }
    return text;
  };

  const maxAttempts = options.retry?.maxAttempts ?? 1;
  const call =
    maxAttempts > 1
      ? retryWithBackoff(attempt, {
          maxAttempts,
          baseDelay: options.retry?.baseDelayMs ?? DEFAULT_DETECTION_CONFIG.llmRetryBaseDelayMs,
          signal: controller.signal,
          onRetry: (error, attemptNumber, delayMs) => {
            logger.debug('Retrying model call', { attempt: attemptNumber, delayMs, reason: error.message });
          },
        })
      : attempt();

  try {
    return await Promise.race([call, expired]);
  } finally {
    clearTimeout(timer);
  }
}

// Unset or non-finite means the default budget; zero or less means no budget at all
function resolveTimeout(timeoutMs: number | undefined): number {
  if (timeoutMs !== undefined && Number.isFinite(timeoutMs)) {
    return timeoutMs;
  }
  return DEFAULT_DETECTION_CONFIG.llmTimeoutMs;
}

/**
 * Format the instruction prompt with the email embedded
 */
export function buildAnalysisPrompt(
  email: EmailMessage,
  maxBodyChars: number = DEFAULT_DETECTION_CONFIG.maxBodyChars
): string {
  const parts: string[] = [];

  parts.push('Analyze this email for phishing attempts. Respond with a single JSON object and nothing else, in this shape:');
  parts.push(`{
  "score": <number between 0 and 1, overall phishing risk>,
  "confidence": <number between 0 and 1, confidence in the score>,
  "indicators": [
    {
      "category": ${THREAT_CATEGORIES.map((c) => `"${c}"`).join(' | ')},
      "description": "<specific suspicious element>",
      "weight": <number between 0 and 1>
    }
  ],
  "rationale": "<two or three sentences explaining the verdict>",
  "recommended_actions": ["<what the recipient should do>"]
}`);
  parts.push('');
  parts.push('Consider:');
  parts.push('1. Linguistic patterns and urgency');
  parts.push('2. Technical indicators (links, headers)');
  parts.push('3. Social engineering tactics');
  parts.push('4. Credential harvesting attempts');
  parts.push('');

  parts.push('=== EMAIL TO ANALYZE ===');
  parts.push(`From: ${email.sender}`);
  parts.push(`Subject: ${email.subject}`);
  for (const name of CONTEXT_HEADERS) {
    const value = getHeader(email, name);
    if (value) {
      parts.push(`${formatHeaderName(name)}: ${value}`);
    }
  }
  parts.push('');

  parts.push('=== EMAIL BODY ===');
  const body = email.body.length > maxBodyChars
    ? email.body.substring(0, maxBodyChars) + '\n[... truncated ...]'
    : email.body;
  parts.push(body);
  parts.push('=== END EMAIL ===');

  return parts.join('\n');
}

function formatHeaderName(name: string): string {
  return name
    .split('-')
    .map((part) => part.charAt(0).toUpperCase() + part.slice(1))
    .join('-');
}

/**
 * Parse a raw model reply into a validated result; null when unusable
 */
export function parseAnalysisResponse(text: string): AIAnalysisResult | null {
  const json = extractJsonObject(text);
  if (!json) return null;

  const parsed = responseSchema.safeParse(json);
  if (!parsed.success) return null;

  const data = parsed.data;
  const score = data.score ?? data.risk_score;
  if (score === undefined || data.confidence === undefined) return null;

  const rawIndicators = data.indicators ?? data.threat_indicators ?? [];

  return {
    score: clamp01(score),
    confidence: clamp01(data.confidence),
    indicators: rawIndicators
      .map(toIndicator)
      .filter((indicator): indicator is ThreatIndicator => indicator !== null),
    rationale: toText(data.rationale ?? data.reasoning),
    recommendedActions: toTextList(data.recommended_actions ?? data.recommendedActions),
  };
}

/**
 * Parse the whole text as a JSON object, or else the first balanced {...}
 * substring that parses (replies wrapped in prose or markdown fences).
 */
export function extractJsonObject(text: string): Record<string, unknown> | null {
  const fenced = text.match(/```(?:json)?\s*([\s\S]*?)```/i);
  const candidates = fenced ? [fenced[1], text] : [text];

  for (const candidate of candidates) {
    const whole = tryParseObject(candidate.trim());
    if (whole) return whole;

    for (let start = candidate.indexOf('{'); start !== -1; start = candidate.indexOf('{', start + 1)) {
      const end = findClosingBrace(candidate, start);
      if (end === -1) continue;

      const parsed = tryParseObject(candidate.slice(start, end + 1));
      if (parsed) return parsed;
    }
  }

  return null;
}

function tryParseObject(text: string): Record<string, unknown> | null {
  try {
    const value: unknown = JSON.parse(text);
    return isPlainObject(value) ? value : null;
  } catch {
    return null;
  }
}

// Index of the brace closing the one at `start`, skipping string literals
function findClosingBrace(text: string, start: number): number {
  let depth = 0;
  let inString = false;
  let escaped = false;

  for (let i = start; i < text.length; i++) {
    const ch = text[i];

    if (inString) {
      if (escaped) escaped = false;
      else if (ch === '\\') escaped = true;
      else if (ch === '"') inString = false;
      continue;
    }

    if (ch === '"') inString = true;
    else if (ch === '{') depth++;
    else if (ch === '}') {
      depth--;
      if (depth === 0) return i;
    }
  }

  return -1;
}

/**
 * Map a free-form category label onto a ThreatCategory; null when nothing fits
 */
export function normalizeCategory(label: string): ThreatCategory | null {
  const compact = label.toLowerCase().replace(/[^a-z]/g, '');
  const exact = THREAT_CATEGORIES.find((category) => category.replace(/_/g, '') === compact);
  if (exact) return exact;

  const tokens = label.toLowerCase().split(/[^a-z0-9]+/).filter(Boolean);
  for (const category of THREAT_CATEGORIES) {
    if (CATEGORY_KEYWORDS[category].some((keyword) => tokens.some((token) => token.startsWith(keyword)))) {
      return category;
    }
  }

  return null;
}

function toIndicator(entry: unknown): ThreatIndicator | null {
  if (typeof entry === 'string') {
    const category = normalizeCategory(entry);
    return category
      ? { category, description: entry.trim(), source: 'ai_analysis', weight: DEFAULT_INDICATOR_WEIGHT }
      : null;
  }

  const parsed = indicatorSchema.safeParse(entry);
  if (!parsed.success) return null;

  const { category: label, type, description, detail, weight, severity } = parsed.data;
  const text = description ?? detail ?? '';
  const category = normalizeCategory(label ?? type ?? '') ?? (text ? normalizeCategory(text) : null);
  if (!category) return null;

  return {
    category,
    description: text.trim() || (label ?? type ?? category),
    source: 'ai_analysis',
    weight: weight !== undefined
      ? clamp01(weight)
      : SEVERITY_WEIGHTS.get(severity?.toLowerCase() ?? '') ?? DEFAULT_INDICATOR_WEIGHT,
  };
}

function toText(value: unknown): string {
  if (typeof value === 'string') return value.trim();
  return toTextList(value).join(' ');
}

function toTextList(value: unknown): string[] {
  if (typeof value === 'string') return value.trim() ? [value.trim()] : [];
  if (!Array.isArray(value)) return [];
  return value
    .filter((item): item is string => typeof item === 'string')
    .map((item) => item.trim())
    .filter(Boolean);
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
