import { describe, it, expect } from 'vitest';
import { mkdtempSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { ValidationError } from '@dataherd/core';
import { loadConfig } from './config.js';

function writeConfigFile(content: string): string {
  const dir = mkdtempSync(join(tmpdir(), 'dataherd-config-'));
  const path = join(dir, 'config.yaml');
  writeFileSync(path, content, 'utf-8');
  return path;
}

describe('loadConfig', () => {
  it('should fall back to defaults', () => {
    const config = loadConfig({});

    expect(config.port).toBe(3000);
    expect(config.logLevel).toBe('info');
    expect(config.ruleOrdering).toBe('priority_then_recency');
    expect(config.rulesDir).toBeNull();
    expect(config.database).toEqual({
      host: 'localhost',
      port: 5432,
      database: 'dataherd',
      user: 'dataherd',
      password: 'dataherd',
      max: 10,
    });
    expect(config.llm).toEqual({ model: 'claude-3-5-haiku-latest', timeoutMs: 10_000, maxRetries: 1, temperature: 0 });
  });

  it('should read environment variables', () => {
    const config = loadConfig({
      PORT: '8080',
      LOG_LEVEL: 'debug',
      RULE_ORDERING: 'recency',
      DB_HOST: 'db',
      DB_PORT: '6543',
      LLM_API_KEY: 'test-key',
      LLM_TIMEOUT_MS: '2500',
    });

    expect(config.port).toBe(8080);
    expect(config.logLevel).toBe('debug');
    expect(config.ruleOrdering).toBe('recency');
    expect(config.database.host).toBe('db');
    expect(config.database.port).toBe(6543);
    expect(config.llm.apiKey).toBe('test-key');
    expect(config.llm.timeoutMs).toBe(2500);
  });

  it('should treat blank variables as unset', () => {
    expect(loadConfig({ PORT: '  ' }).port).toBe(3000);
  });

  it('should layer environment variables over the config file', () => {
    const path = writeConfigFile(
      ['port: 4000', 'rules_dir: /srv/rules', 'database:', '  name: herd', 'llm:', '  max_retries: 0'].join('\n'),
    );

    const config = loadConfig({ DATAHERD_CONFIG: path, PORT: '5000' });

    expect(config.port).toBe(5000);
    expect(config.rulesDir).toBe('/srv/rules');
    expect(config.database.database).toBe('herd');
    expect(config.llm.maxRetries).toBe(0);
  });

  it('should reject unknown keys in the config file', () => {
    const path = writeConfigFile('listen_port: 4000\n');

    expect(() => loadConfig({ DATAHERD_CONFIG: path })).toThrow(ValidationError);
  });

  it('should reject an invalid value', () => {
    expect(() => loadConfig({ RULE_ORDERING: 'random' })).toThrow(/^Invalid configuration: ruleOrdering/);
  });

  it('should reject a missing config file', () => {
    expect(() => loadConfig({ DATAHERD_CONFIG: join(tmpdir(), 'dataherd-missing', 'config.yaml') })).toThrow(
      /^Cannot read config file/,
    );
  });
});
