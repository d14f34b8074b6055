import { afterEach, describe, it, expect } from 'vitest';
import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { ConfigurationError } from '../core/errors.js';
import { DEFAULTS } from './defaults.js';
import { loadConfig, type Env } from './app-config.js';

const NO_FILE: Env = { PLANNER_CONFIG_PATH: '/nonexistent/planner.config.json' };

const tempDirs: string[] = [];

function writeConfigFile(contents: string): string {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'planner-config-'));
  tempDirs.push(dir);
  const file = path.join(dir, 'planner.config.json');
  fs.writeFileSync(file, contents);
  return file;
}

afterEach(() => {
  for (const dir of tempDirs.splice(0)) {
    fs.rmSync(dir, { recursive: true, force: true });
  }
});

describe('loadConfig', () => {
  it('falls back to defaults', () => {
    const config = loadConfig(NO_FILE);

    expect(config.model).toEqual({
      provider: 'groq',
      modelName: undefined,
      temperature: DEFAULTS.TEMPERATURE,
      maxTokens: DEFAULTS.MAX_TOKENS,
      baseUrl: undefined,
    });
    expect(config.agent.maxIterations).toBe(10);
    expect(config.server).toEqual({
      host: '0.0.0.0',
      port: 8000,
      corsOrigins: ['*'],
      frontendUrl: 'http://localhost:8080',
    });
    expect(config.query).toEqual({ maxQuestionLength: 2000, timeoutMs: 120_000 });
    expect(config.logLevel).toBe('info');
  });

  it('reads environment overrides', () => {
    const config = loadConfig({
      ...NO_FILE,
      LLM_PROVIDER: 'claude',
      LLM_MODEL: 'claude-test-model',
      LLM_TEMPERATURE: '0.7',
      AGENT_MAX_ITERATIONS: '4',
      PORT: '9090',
      CORS_ORIGINS: 'http://localhost:8080, https://planner.example.com',
      QUERY_TIMEOUT_MS: '30000',
    });

    expect(config.model.provider).toBe('claude');
    expect(config.model.modelName).toBe('claude-test-model');
    expect(config.model.temperature).toBe(0.7);
    expect(config.agent.maxIterations).toBe(4);
    expect(config.server.port).toBe(9090);
    expect(config.server.corsOrigins).toEqual(['http://localhost:8080', 'https://planner.example.com']);
    expect(config.query.timeoutMs).toBe(30_000);
  });

  it('layers the config file under the environment', () => {
    const file = writeConfigFile(
      JSON.stringify({
        model: { provider: 'ollama', baseUrl: 'http://localhost:11434' },
        agent: { maxIterations: 6 },
        query: { maxQuestionLength: 500 },
      })
    );

    const config = loadConfig({ PLANNER_CONFIG_PATH: file, AGENT_MAX_ITERATIONS: '3' });

    expect(config.model.provider).toBe('ollama');
    expect(config.model.baseUrl).toBe('http://localhost:11434');
    expect(config.agent.maxIterations).toBe(3);
    expect(config.query.maxQuestionLength).toBe(500);
  });

  it('ignores a config file that does not parse', () => {
    const file = writeConfigFile('{ not json');

    expect(loadConfig({ PLANNER_CONFIG_PATH: file }).model.provider).toBe('groq');
  });

  it('ignores a config file with the wrong shape', () => {
    const file = writeConfigFile(JSON.stringify({ agent: { maxIterations: 'many' } }));

    expect(loadConfig({ PLANNER_CONFIG_PATH: file }).agent.maxIterations).toBe(10);
  });

  it('rejects malformed numbers', () => {
    expect(() => loadConfig({ ...NO_FILE, PORT: 'eighty' })).toThrow('Invalid number value for PORT: eighty');
  });

  it('rejects out-of-range values', () => {
    expect(() => loadConfig({ ...NO_FILE, LLM_TEMPERATURE: '1.5' })).toThrow(ConfigurationError);
    expect(() => loadConfig({ ...NO_FILE, AGENT_MAX_ITERATIONS: '0' })).toThrow(
      'maxIterations must be a positive integer, got 0'
    );
    expect(() => loadConfig({ ...NO_FILE, PORT: '70000' })).toThrow('port must be between 0 and 65535, got 70000');
  });

  it('rejects log levels pino does not know', () => {
    expect(() => loadConfig({ ...NO_FILE, LOG_LEVEL: 'verbose' })).toThrow(
      new ConfigurationError('logLevel must be one of fatal, error, warn, info, debug, trace, silent, got verbose')
    );
    expect(loadConfig({ ...NO_FILE, LOG_LEVEL: 'debug' }).logLevel).toBe('debug');
  });
});
