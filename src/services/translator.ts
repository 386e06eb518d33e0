/**
 * Natural language to SQL translation pipeline.
 *
 * schema fetch -> prompt -> model call -> response parsing, strictly in
 * sequence. Schema and parsing problems are recovered by their stages and
 * reported through the `fallback` flags; a provider failure propagates.
 */

import type {
  ProcessedQuery,
  Question,
  TranslationRequest,
  TranslationResult,
} from '../types/models.js';
import type { Recoverable } from '../types/utils.js';
import type { Logger } from '../utils/logger.js';
import type { TranslationClient } from './llm.js';
import { parseModelResponse } from './parser.js';
import { buildPrompt } from './prompt.js';
import type { SchemaProvider } from './schema.js';

export interface TranslatorDeps {
  schemaProvider: SchemaProvider;
  client: TranslationClient;
  logger: Logger;
}

export class Translator {
  constructor(private readonly deps: TranslatorDeps) {}

  /**
   * @throws ProviderError when the model call fails
   */
  async process(input: Question): Promise<ProcessedQuery> {
    const schema = await this.deps.schemaProvider.fetch();
    const parsed = await this.translate({ ...input, schema: schema.value });

    this.deps.logger.info(
      `Processed query: '${input.question}' -> SQL: '${parsed.value.sqlQuery}'`
    );

    return {
      ...parsed.value,
      schemaFallback: schema.status === 'fallback',
      sqlFallback: parsed.status === 'fallback',
    };
  }

  /**
   * Translate against an already-resolved schema.
   *
   * @throws ProviderError when the model call fails
   */
  async translate(request: TranslationRequest): Promise<Recoverable<TranslationResult>> {
    const prompt = buildPrompt(request.question, request.schema);
    const raw = await this.deps.client.translate(prompt, request.modelName);
    const parsed = parseModelResponse(raw);

    if (parsed.status === 'fallback') {
      this.deps.logger.warn(
        `Could not extract SQL from LLM response (${parsed.reason}), using fallback query`
      );
    }

    return parsed;
  }
}
