/**
 * Google Gemini LLM Provider
 *
 * Implements LLMProvider against the Gemini REST API (generateContent) over
 * the shared axios client, with a per-request timeout.
 */

import axios, { type AxiosInstance } from 'axios';
import { z } from 'zod';
import type { LLMProvider, LLMMessage, LLMGenerateOptions, LLMResponse } from './LLMProvider.js';
import { logger } from '../../utils/logger.js';
import { createHttpClient, HTTP_TIMEOUTS } from '../../config/httpClient.js';
import { CancellationError, ConfigurationError, GenerationError, errorMessage } from '../../types/errors.js';

export const GEMINI_BASE_URL = 'https://generativelanguage.googleapis.com';

// Gemini can be slow with large contexts, so we use a longer default
const DEFAULT_GEMINI_TIMEOUT = HTTP_TIMEOUTS.VERY_LONG;

const generateContentResponseSchema = z.object({
  candidates: z
    .array(
      z.object({
        content: z
          .object({
            parts: z.array(z.object({ text: z.string().optional() })).optional(),
          })
          .optional(),
        finishReason: z.string().optional(),
      })
    )
    .optional(),
  usageMetadata: z
    .object({
      promptTokenCount: z.number().optional(),
      candidatesTokenCount: z.number().optional(),
      totalTokenCount: z.number().optional(),
    })
    .optional(),
  modelVersion: z.string().optional(),
});

export interface GeminiProviderConfig {
  apiKey?: string;
  defaultModel?: string;
  timeout?: number;
  httpClient?: AxiosInstance; // Injected in tests
}

/**
 * Gemini takes a single prompt here: the system message leads, followed by
 * the remaining messages separated by blank lines.
 */
export function toGeminiPrompt(messages: LLMMessage[]): string {
  const systemMessage = messages.find((m) => m.role === 'system');
  const userContent = messages
    .filter((m) => m.role !== 'system')
    .map((m) => m.content)
    .join('\n\n');

  return systemMessage ? `${systemMessage.content}\n\n${userContent}` : userContent;
}

export class GeminiProvider implements LLMProvider {
  private readonly apiKey: string;
  private readonly defaultModel: string;
  private readonly timeout: number;
  private readonly client: AxiosInstance;

  constructor(config: GeminiProviderConfig = {}) {
    if (!config.apiKey) {
      throw new ConfigurationError('gemini', ['GEMINI_API_KEY']);
    }

    this.apiKey = config.apiKey;
    this.defaultModel = config.defaultModel || 'gemini-2.0-flash';
    this.timeout = config.timeout || DEFAULT_GEMINI_TIMEOUT;
    this.client =
      config.httpClient ??
      createHttpClient({
        baseURL: GEMINI_BASE_URL,
        timeout: this.timeout,
        headers: {
          'Content-Type': 'application/json',
        },
      });
  }

  getName(): string {
    return 'gemini';
  }

  async generate(
    messages: LLMMessage[],
    options?: LLMGenerateOptions
  ): Promise<LLMResponse> {
    const model = options?.model || this.defaultModel;
    const temperature = options?.temperature ?? 0.3;

    const requestBody = {
      contents: [
        {
          parts: [{ text: toGeminiPrompt(messages) }],
        },
      ],
      generationConfig: {
        temperature,
        maxOutputTokens: options?.max_tokens,
      },
    };

    let data: unknown;
    try {
      const response = await this.client.post<unknown>(
        `/v1beta/models/${model}:generateContent`,
        requestBody,
        {
          timeout: this.timeout,
          headers: { 'x-goog-api-key': this.apiKey },
          signal: options?.signal,
        }
      );
      data = response.data;
    } catch (error) {
      throw this.translateError(error, model);
    }

    const parsed = generateContentResponseSchema.safeParse(data);
    if (!parsed.success) {
      throw new GenerationError('gemini', 'Malformed response from Gemini', {
        reason: 'malformed_response',
        model,
        issues: parsed.error.issues.map((issue) => issue.message),
      });
    }

    const candidate = parsed.data.candidates?.[0];
    const content = candidate?.content?.parts
      ?.map((part) => part.text ?? '')
      .join('')
      .trim();
    if (!content) {
      throw new GenerationError('gemini', 'Empty response from Gemini', {
        reason: 'empty_response',
        model,
        finishReason: candidate?.finishReason,
      });
    }

    const usageMetadata = parsed.data.usageMetadata;
    return {
      content,
      model: parsed.data.modelVersion || model,
      usage: usageMetadata
        ? {
            promptTokens: usageMetadata.promptTokenCount || 0,
            completionTokens: usageMetadata.candidatesTokenCount || 0,
            totalTokens: usageMetadata.totalTokenCount || 0,
          }
        : undefined,
    };
  }

  private translateError(error: unknown, model: string): Error {
    if (axios.isCancel(error)) {
      return new CancellationError('Gemini request cancelled', { model });
    }

    if (axios.isAxiosError(error)) {
      if (error.code === 'ECONNABORTED') {
        logger.error({ model, timeout: this.timeout }, 'Gemini API timeout');
        return new GenerationError(
          'gemini',
          `Gemini API call timed out after ${this.timeout}ms. Consider increasing GEMINI_TIMEOUT or using a faster model.`,
          { reason: 'timeout', model, timeout: this.timeout },
          error
        );
      }

      const status = error.response?.status;
      logger.error({ model, status, message: error.message }, 'Error calling Gemini API');
      return new GenerationError(
        'gemini',
        status ? `Gemini API returned status ${status}` : error.message,
        { reason: 'request_failed', model, status },
        error
      );
    }

    logger.error({ error, model }, 'Error calling Gemini API');
    return new GenerationError('gemini', errorMessage(error), { reason: 'request_failed', model }, error);
  }
}
