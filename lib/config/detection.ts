/**
 * Detection Configuration
 *
 * Reads PHISH_* environment variables into a validated DetectionConfig.
 * Unset or empty variables fall back to DEFAULT_DETECTION_CONFIG.
 */

import { z } from 'zod';
import { DEFAULT_DETECTION_CONFIG, type DetectionConfig } from '@/lib/detection/types';

export class ConfigError extends Error {
  constructor(
    message: string,
    public readonly issues: Array<{ field: string; message: string }>
  ) {
    super(message);
    this.name = 'ConfigError';
  }
}

const emptyToUndefined = (value: unknown) => (value === '' ? undefined : value);

const positiveInt = (fallback: number) =>
  z.preprocess(emptyToUndefined, z.coerce.number().int().positive().default(fallback));

const envSchema = z.object({
  PHISH_LLM_MODEL: z.preprocess(emptyToUndefined, z.string().min(1).default(DEFAULT_DETECTION_CONFIG.llmModel)),
  PHISH_LLM_MAX_TOKENS: positiveInt(DEFAULT_DETECTION_CONFIG.llmMaxTokens),
  PHISH_LLM_TIMEOUT_MS: positiveInt(DEFAULT_DETECTION_CONFIG.llmTimeoutMs),
  PHISH_LLM_MAX_ATTEMPTS: positiveInt(DEFAULT_DETECTION_CONFIG.llmMaxAttempts),
  PHISH_LLM_RETRY_BASE_DELAY_MS: z.preprocess(
    emptyToUndefined,
    z.coerce.number().int().nonnegative().default(DEFAULT_DETECTION_CONFIG.llmRetryBaseDelayMs)
  ),
  PHISH_LLM_DAILY_LIMIT: z.preprocess(emptyToUndefined, z.coerce.number().int().positive().optional()),
  PHISH_MAX_BODY_CHARS: positiveInt(DEFAULT_DETECTION_CONFIG.maxBodyChars),
});

/**
 * Load detection config from the environment
 *
 * @throws ConfigError listing every invalid variable
 */
export function loadDetectionConfig(env: Record<string, string | undefined> = process.env): DetectionConfig {
  const parsed = envSchema.safeParse(env);

  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => ({
      field: issue.path.join('.'),
      message: issue.message,
    }));
    throw new ConfigError(
      `Invalid detection configuration: ${issues.map((i) => `${i.field} (${i.message})`).join(', ')}`,
      issues
    );
  }

  const values = parsed.data;
  return {
    llmModel: values.PHISH_LLM_MODEL,
    llmMaxTokens: values.PHISH_LLM_MAX_TOKENS,
    llmTimeoutMs: values.PHISH_LLM_TIMEOUT_MS,
    llmMaxAttempts: values.PHISH_LLM_MAX_ATTEMPTS,
    llmRetryBaseDelayMs: values.PHISH_LLM_RETRY_BASE_DELAY_MS,
    ...(values.PHISH_LLM_DAILY_LIMIT !== undefined && { llmDailyLimit: values.PHISH_LLM_DAILY_LIMIT }),
    maxBodyChars: values.PHISH_MAX_BODY_CHARS,
  };
}
