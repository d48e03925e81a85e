import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import {
  ConfigError,
  credentialsFromEnv,
  deepMerge,
  loadConfig,
  resolveConfigPath,
  substituteEnvVars,
} from './config';

let stateDir: string;

beforeEach(() => {
  stateDir = mkdtempSync(join(tmpdir(), 'topic-share-config-'));
});

afterEach(() => {
  rmSync(stateDir, { recursive: true, force: true });
});

function writeConfig(contents: string, name = 'config.json'): string {
  const path = join(stateDir, name);
  writeFileSync(path, contents, 'utf-8');
  return path;
}

function load(env: Record<string, string> = {}, path?: string) {
  return loadConfig({ env: { TOPIC_SHARE_STATE_DIR: stateDir, ...env }, path, loadEnvFiles: false });
}

describe('loadConfig', () => {
  it('returns defaults when no config file exists', () => {
    const config = load();
    expect(config.analysis).toEqual({
      location: 2840,
      language: 'en',
      serpDepth: 10,
      keywordsPerSource: 700,
      keywordsToAnalyze: 100,
      minSearchVolume: 10,
      maxSpend: 5,
      sources: ['related_terms', 'topic_ideas'],
    });
    expect(config.market.concentratedTop5).toBe(Number.POSITIVE_INFINITY);
    expect(config.market.monopolisticTop3).toBe(0.75);
    expect(config.dashboard.port).toBe(8787);
  });

  it('deep-merges the config file over defaults', () => {
    writeConfig(JSON.stringify({ analysis: { maxSpend: 2, sources: ['autocomplete'] }, market: { concentratedTop5: 0.6 } }));
    const config = load();
    expect(config.analysis.maxSpend).toBe(2);
    expect(config.analysis.sources).toEqual(['autocomplete']);
    expect(config.analysis.location).toBe(2840);
    expect(config.market.concentratedTop5).toBe(0.6);
  });

  it('substitutes ${VAR} references from the environment', () => {
    writeConfig(JSON.stringify({ api: { baseUrl: '${SANDBOX_URL}' } }));
    const config = load({ SANDBOX_URL: 'https://sandbox.example.test/v3' });
    expect(config.api.baseUrl).toBe('https://sandbox.example.test/v3');
  });

  it('honours TOPIC_SHARE_CONFIG_PATH', () => {
    const path = writeConfig(JSON.stringify({ dashboard: { port: 9000 } }), 'custom.json');
    expect(load({ TOPIC_SHARE_CONFIG_PATH: path }).dashboard.port).toBe(9000);
  });

  it('rejects values that fail validation', () => {
    writeConfig(JSON.stringify({ analysis: { serpDepth: 30 } }));
    expect(() => load()).toThrow(ConfigError);
    expect(() => load()).toThrow(/analysis\.serpDepth/);
  });

  it('rejects files that are not JSON objects', () => {
    writeConfig('{ not json');
    expect(() => load()).toThrow(/Failed to parse config file/);

    writeConfig('[1, 2]');
    expect(() => load()).toThrow(/must contain a JSON object/);
  });

  it('requires an explicit path to exist', () => {
    expect(() => load({}, join(stateDir, 'missing.json'))).toThrow(/Config file not found/);
  });
});

describe('resolveConfigPath', () => {
  it('defaults to config.json in the state dir', () => {
    expect(resolveConfigPath({ TOPIC_SHARE_STATE_DIR: stateDir })).toBe(join(stateDir, 'config.json'));
  });
});

describe('deepMerge', () => {
  it('merges nested objects and replaces arrays', () => {
    expect(deepMerge({ a: { x: 1, y: 2 }, list: [1, 2] }, { a: { y: 3 }, list: [9] })).toEqual({
      a: { x: 1, y: 3 },
      list: [9],
    });
  });

  it('skips prototype keys', () => {
    const merged = deepMerge({}, JSON.parse('{"__proto__": {"polluted": true}}'));
    expect(Object.keys(merged)).toEqual([]);
    expect(Object.prototype.hasOwnProperty.call(Object.prototype, 'polluted')).toBe(false);
  });
});

describe('substituteEnvVars', () => {
  it('replaces known variables and blanks unknown ones', () => {
    expect(substituteEnvVars({ a: ['${ONE}', 'x${TWO}y'], n: 3 }, { ONE: '1' })).toEqual({ a: ['1', 'xy'], n: 3 });
  });
});

describe('credentialsFromEnv', () => {
  it('reads and trims both values', () => {
    expect(credentialsFromEnv({ DATAFORSEO_LOGIN: ' test-login ', DATAFORSEO_PASSWORD: 'test-secret' })).toEqual({
      login: 'test-login',
      password: 'test-secret',
    });
  });

  it('returns null when either is missing', () => {
    expect(credentialsFromEnv({ DATAFORSEO_LOGIN: 'test-login' })).toBeNull();
    expect(credentialsFromEnv({ DATAFORSEO_LOGIN: 'test-login', DATAFORSEO_PASSWORD: '  ' })).toBeNull();
  });
});
