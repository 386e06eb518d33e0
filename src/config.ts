/**
 * Configuration management using Zod for validation.
 *
 * The configuration is parsed once at process start and handed to every
 * service constructor. Nothing else in the codebase reads `process.env`.
 */

import { z } from 'zod';
import { ConfigurationError } from './types/errors.js';

const PortSchema = z.coerce.number().int().min(1).max(65535);

/**
 * Configuration schema with validation and defaults.
 */
const ConfigSchema = z.object({
  // Database Configuration
  DATABASE_URL: z
    .string()
    .trim()
    .optional()
    .transform((value) => (value ? value : undefined))
    .describe('PostgreSQL connection string; unset means "no database"'),

  // LLM Provider Configuration
  LLM_PROVIDER: z.enum(['openai', 'anthropic']).default('openai'),
  LLM_MODEL: z.string().min(1).default('gpt-4'),
  LLM_API_KEY: z.string().optional(),

  // Server Configuration
  HOST: z.string().default('0.0.0.0'),
  LLM_ENGINE_PORT: PortSchema.default(8001),
  FORMATTER_PORT: PortSchema.default(8002),
  QUERY_RUNNER_PORT: PortSchema.default(8003),
  QUERY_ROUTER_PORT: PortSchema.default(8004),
  LOG_LEVEL: z
    .enum(['DEBUG', 'INFO', 'WARN', 'ERROR', 'FATAL'])
    .default('INFO'),
  NODE_ENV: z.string().default('development'),
});

type BaseConfig = z.infer<typeof ConfigSchema>;

export type LLMProvider = BaseConfig['LLM_PROVIDER'];
export type LogLevel = BaseConfig['LOG_LEVEL'];

export interface LLMConfig {
  readonly provider: LLMProvider;
  readonly model: string;
  readonly apiKey?: string;
}

export interface ServicePorts {
  readonly llmEngine: number;
  readonly formatter: number;
  readonly queryRunner: number;
  readonly queryRouter: number;
}

/**
 * Process-wide configuration value.
 */
export interface Config {
  readonly databaseUrl?: string;
  readonly llm: LLMConfig;
  readonly host: string;
  readonly ports: ServicePorts;
  readonly logLevel: LogLevel;
  /** Human-readable log output (everything except production). */
  readonly prettyLogs: boolean;
}

/**
 * Parse and validate configuration from an environment map.
 *
 * @throws ConfigurationError listing every invalid key
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const parsed = ConfigSchema.safeParse(env);

  if (!parsed.success) {
    const issues = parsed.error.issues.map(
      (issue) => `${issue.path.join('.')}: ${issue.message}`
    );
    throw new ConfigurationError('Configuration validation failed', issues);
  }

  const base = parsed.data;

  return Object.freeze({
    databaseUrl: base.DATABASE_URL,
    llm: Object.freeze({
      provider: base.LLM_PROVIDER,
      model: base.LLM_MODEL,
      apiKey: base.LLM_API_KEY,
    }),
    host: base.HOST,
    ports: Object.freeze({
      llmEngine: base.LLM_ENGINE_PORT,
      formatter: base.FORMATTER_PORT,
      queryRunner: base.QUERY_RUNNER_PORT,
      queryRouter: base.QUERY_ROUTER_PORT,
    }),
    logLevel: base.LOG_LEVEL,
    prettyLogs: base.NODE_ENV !== 'production',
  });
}
