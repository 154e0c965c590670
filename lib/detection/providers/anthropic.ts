/**
 * Anthropic model provider
 * Adapts the Messages API to the ModelCall capability the analysis layer consumes
 */

import Anthropic from '@anthropic-ai/sdk';
import type { DetectionConfig, ModelCall } from '../types';
import { DEFAULT_DETECTION_CONFIG } from '../types';
import { ModelCallError, ModelErrorKind, toModelCallError } from '../errors';
import { LLMRateLimiter, withDailyLimit } from '../llm-rate-limiter';

const SYSTEM_PROMPT =
  'You are a cybersecurity expert specializing in phishing detection. Provide analysis in valid JSON format only.';

/**
 * The slice of the SDK client this provider uses
 */
export interface MessagesClient {
  messages: {
    create(
      params: Anthropic.MessageCreateParamsNonStreaming,
      options?: { signal?: AbortSignal }
    ): PromiseLike<{ content: Array<{ type: string; text?: string }> }>;
  };
}

export interface AnthropicModelCallConfig {
  client?: MessagesClient;
  apiKey?: string;
  model?: string;
  maxTokens?: number;
}

export function createAnthropicModelCall(config: AnthropicModelCallConfig = {}): ModelCall {
  const client: MessagesClient = config.client ?? new Anthropic(config.apiKey ? { apiKey: config.apiKey } : {});
  const model = config.model ?? DEFAULT_DETECTION_CONFIG.llmModel;
  const maxTokens = config.maxTokens ?? DEFAULT_DETECTION_CONFIG.llmMaxTokens;

  return async (prompt, options) => {
    let response: { content: Array<{ type: string; text?: string }> };
    try {
      response = await client.messages.create(
        {
          model,
          max_tokens: maxTokens,
          system: SYSTEM_PROMPT,
          messages: [{ role: 'user', content: prompt }],
        },
        { signal: options?.signal }
      );
    } catch (error) {
      throw classifyAnthropicError(error);
    }

    const textContent = response.content.find((c) => c.type === 'text');
    if (!textContent || typeof textContent.text !== 'string') {
      throw new ModelCallError(ModelErrorKind.INVALID_RESPONSE, 'No text response from LLM');
    }
    return textContent.text;
  };
}

/**
 * Map SDK errors onto the model error taxonomy
 */
export function classifyAnthropicError(error: unknown): ModelCallError {
  if (error instanceof ModelCallError) return error;

  if (error instanceof Anthropic.APIConnectionTimeoutError || error instanceof Anthropic.APIUserAbortError) {
    return new ModelCallError(ModelErrorKind.TIMEOUT, error.message, { cause: error });
  }
  if (error instanceof Anthropic.RateLimitError) {
    return new ModelCallError(ModelErrorKind.RATE_LIMITED, error.message, { status: 429, cause: error });
  }
  if (error instanceof Anthropic.APIError) {
    return new ModelCallError(ModelErrorKind.PROVIDER_ERROR, error.message, {
      status: error.status ?? undefined,
      cause: error,
    });
  }

  return toModelCallError(error);
}

/**
 * Provider built from configuration, with the daily limit applied when set
 */
export function createModelCallFromConfig(
  config: DetectionConfig,
  overrides: Pick<AnthropicModelCallConfig, 'client' | 'apiKey'> = {}
): ModelCall {
  const modelCall = createAnthropicModelCall({
    ...overrides,
    model: config.llmModel,
    maxTokens: config.llmMaxTokens,
  });

  if (config.llmDailyLimit === undefined) {
    return modelCall;
  }
  return withDailyLimit(modelCall, new LLMRateLimiter({ dailyLimit: config.llmDailyLimit }));
}
