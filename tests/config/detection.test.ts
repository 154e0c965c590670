/**
 * Detection Configuration Tests
 */

import { describe, it, expect } from 'vitest';
import { loadDetectionConfig, ConfigError } from '@/lib/config/detection';
import { DEFAULT_DETECTION_CONFIG } from '@/lib/detection/types';

describe('loadDetectionConfig', () => {
  it('should use the defaults when nothing is set', () => {
    expect(loadDetectionConfig({})).toEqual(DEFAULT_DETECTION_CONFIG);
  });

  it('should treat empty variables as unset', () => {
    expect(loadDetectionConfig({ PHISH_LLM_MODEL: '', PHISH_LLM_DAILY_LIMIT: '' })).toEqual(
      DEFAULT_DETECTION_CONFIG
    );
  });

  it('should read every variable', () => {
    const config = loadDetectionConfig({
      PHISH_LLM_MODEL: 'claude-test',
      PHISH_LLM_MAX_TOKENS: '2048',
      PHISH_LLM_TIMEOUT_MS: '5000',
      PHISH_LLM_MAX_ATTEMPTS: '3',
      PHISH_LLM_RETRY_BASE_DELAY_MS: '0',
      PHISH_LLM_DAILY_LIMIT: '100',
      PHISH_MAX_BODY_CHARS: '8000',
    });

    expect(config).toEqual({
      llmModel: 'claude-test',
      llmMaxTokens: 2048,
      llmTimeoutMs: 5000,
      llmMaxAttempts: 3,
      llmRetryBaseDelayMs: 0,
      llmDailyLimit: 100,
      maxBodyChars: 8000,
    });
  });

  it('should ignore unrelated variables', () => {
    expect(loadDetectionConfig({ PATH: '/usr/bin', ANTHROPIC_API_KEY: 'test-key' })).toEqual(
      DEFAULT_DETECTION_CONFIG
    );
  });

  it('should reject values that are not positive integers', () => {
    const error = (() => {
      try {
        loadDetectionConfig({ PHISH_LLM_TIMEOUT_MS: 'soon', PHISH_LLM_MAX_ATTEMPTS: '0' });
        return null;
      } catch (e) {
        return e;
      }
    })();

    expect(error).toBeInstanceOf(ConfigError);
    if (error instanceof ConfigError) {
      expect(error.issues.map((issue) => issue.field)).toEqual(['PHISH_LLM_TIMEOUT_MS', 'PHISH_LLM_MAX_ATTEMPTS']);
      expect(error.message).toMatch(/^Invalid detection configuration: PHISH_LLM_TIMEOUT_MS \(/);
    }
  });

  it('should reject fractional values', () => {
    expect(() => loadDetectionConfig({ PHISH_MAX_BODY_CHARS: '12.5' })).toThrow(ConfigError);
  });
});
