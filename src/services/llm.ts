/**
 * LLM integration layer using Vercel AI SDK.
 *
 * One completion per call: the prompt goes in as the only user message and
 * the raw response text comes back unparsed. Failures surface immediately as
 * ProviderError; nothing here retries.
 */

import { generateText } from 'ai';
import type { LanguageModel } from 'ai';
import { createAnthropic } from '@ai-sdk/anthropic';
import { createOpenAI } from '@ai-sdk/openai';
import type { LLMConfig } from '../config.js';
import { ProviderError } from '../types/errors.js';
import { errorMessage } from '../types/utils.js';
import type { Logger } from '../utils/logger.js';

export const SYSTEM_PROMPT =
  'You are a helpful assistant that translates natural language questions into SQL queries for a PostgreSQL database.';

/** Low temperature keeps the output literal rather than creative. */
export const TEMPERATURE = 0.1;

/** Enough for a short statement plus its explanation. */
export const MAX_OUTPUT_TOKENS = 500;

export interface TextGenerationRequest {
  model: LanguageModel;
  system: string;
  prompt: string;
  temperature: number;
  maxOutputTokens: number;
  maxRetries: number;
}

export interface TextGenerationResponse {
  text: string;
  usage?: {
    inputTokens?: number;
    outputTokens?: number;
  };
}

export type TextGenerator = (request: TextGenerationRequest) => Promise<TextGenerationResponse>;

const defaultGenerator: TextGenerator = (request) => generateText(request);

export interface TranslationClientOptions {
  llm: LLMConfig;
  logger: Logger;
  generate?: TextGenerator;
}

/**
 * Service for sending translation prompts to the configured provider.
 */
export class TranslationClient {
  private readonly config: LLMConfig;
  private readonly logger: Logger;
  private readonly generate: TextGenerator;

  constructor(options: TranslationClientOptions) {
    this.config = options.llm;
    this.logger = options.logger;
    this.generate = options.generate ?? defaultGenerator;
  }

  /**
   * @param modelName Overrides the configured default model
   * @returns The model's response text, untouched
   * @throws ProviderError on any provider failure
   */
  async translate(prompt: string, modelName?: string): Promise<string> {
    const modelId = modelName ?? this.config.model;
    const model = this.resolveModel(modelId);

    try {
      const result = await this.generate({
        model,
        system: SYSTEM_PROMPT,
        prompt,
        temperature: TEMPERATURE,
        maxOutputTokens: MAX_OUTPUT_TOKENS,
        maxRetries: 0,
      });

      if (result.usage) {
        this.logger.info(
          `LLM API call successful (${this.config.provider}/${modelId}) - ` +
            `Input: ${result.usage.inputTokens}, ` +
            `Output: ${result.usage.outputTokens}`
        );
      }
      this.logger.debug(`Model response length: ${result.text.length}`);

      return result.text;
    } catch (error) {
      this.logger.error(`LLM API call failed: ${errorMessage(error)}`);
      throw new ProviderError(
        `LLM API call failed: ${errorMessage(error)}`,
        this.config.provider,
        modelId,
        { cause: error }
      );
    }
  }

  /**
   * Build a model handle for this call. Handles are not cached between calls.
   */
  private resolveModel(modelId: string): LanguageModel {
    const apiKey = this.config.apiKey;
    if (!apiKey) {
      throw new ProviderError('LLM_API_KEY is not configured', this.config.provider, modelId);
    }

    switch (this.config.provider) {
      case 'openai':
        return createOpenAI({ apiKey }).chat(modelId);
      case 'anthropic':
        return createAnthropic({ apiKey })(modelId);
    }
  }
}
