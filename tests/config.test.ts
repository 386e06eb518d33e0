import { describe, it, expect } from 'vitest';
import { loadConfig } from '../src/config.js';
import { ConfigurationError } from '../src/types/errors.js';

describe('loadConfig', () => {
  it('applies defaults to an empty environment', () => {
    const config = loadConfig({});

    expect(config).toEqual({
      databaseUrl: undefined,
      llm: { provider: 'openai', model: 'gpt-4', apiKey: undefined },
      host: '0.0.0.0',
      ports: { llmEngine: 8001, formatter: 8002, queryRunner: 8003, queryRouter: 8004 },
      logLevel: 'INFO',
      prettyLogs: true,
    });
  });

  it('reads every key', () => {
    const config = loadConfig({
      DATABASE_URL: ' postgres://lucidata:test-secret@db:5432/lucidata ',
      LLM_PROVIDER: 'anthropic',
      LLM_MODEL: 'claude-3-5-sonnet-latest',
      LLM_API_KEY: 'test-secret',
      HOST: '127.0.0.1',
      LLM_ENGINE_PORT: '9001',
      FORMATTER_PORT: '9002',
      QUERY_RUNNER_PORT: '9003',
      QUERY_ROUTER_PORT: '9004',
      LOG_LEVEL: 'DEBUG',
      NODE_ENV: 'production',
    });

    expect(config.databaseUrl).toBe('postgres://lucidata:test-secret@db:5432/lucidata');
    expect(config.llm).toEqual({
      provider: 'anthropic',
      model: 'claude-3-5-sonnet-latest',
      apiKey: 'test-secret',
    });
    expect(config.host).toBe('127.0.0.1');
    expect(config.ports).toEqual({ llmEngine: 9001, formatter: 9002, queryRunner: 9003, queryRouter: 9004 });
    expect(config.logLevel).toBe('DEBUG');
    expect(config.prettyLogs).toBe(false);
  });

  it('treats a blank DATABASE_URL as unset', () => {
    expect(loadConfig({ DATABASE_URL: '   ' }).databaseUrl).toBeUndefined();
  });

  it('returns a frozen value', () => {
    const config = loadConfig({});

    expect(Object.isFrozen(config)).toBe(true);
    expect(Object.isFrozen(config.llm)).toBe(true);
    expect(Object.isFrozen(config.ports)).toBe(true);
  });

  it('lists every invalid key', () => {
    let caught: unknown;
    try {
      loadConfig({ LLM_PROVIDER: 'cohere', FORMATTER_PORT: 'eighty' });
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(ConfigurationError);
    if (!(caught instanceof ConfigurationError)) return;
    expect(caught.issues).toHaveLength(2);
    expect(caught.issues[0]).toMatch(/^LLM_PROVIDER: /);
    expect(caught.issues[1]).toMatch(/^FORMATTER_PORT: /);
    expect(caught.message).toMatch(/^Configuration validation failed:\n {2}- LLM_PROVIDER: /);
  });
});
