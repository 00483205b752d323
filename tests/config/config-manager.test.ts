/**
 * Config Loader Tests
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { configFromEnv, deepMergeConfigs, loadConfig } from '../../src/config/config-manager.js';
import { configuredModels, defaultConfig, resolveModelName } from '../../src/config/schema.js';

describe('loadConfig', () => {
  let root: string;
  let userDir: string;
  let projectDir: string;
  let env: NodeJS.ProcessEnv;

  const writeUser = (content: string) => {
    mkdirSync(join(userDir, 'roundloop'), { recursive: true });
    writeFileSync(join(userDir, 'roundloop', 'config.json'), content);
  };
  const writeProject = (content: string) => {
    mkdirSync(join(projectDir, '.roundloop'), { recursive: true });
    writeFileSync(join(projectDir, '.roundloop', 'config.json'), content);
  };

  beforeEach(() => {
    root = mkdtempSync(join(tmpdir(), 'roundloop-config-'));
    userDir = join(root, 'xdg');
    projectDir = join(root, 'project');
    mkdirSync(projectDir, { recursive: true });
    env = { XDG_CONFIG_HOME: userDir };
  });

  afterEach(() => {
    rmSync(root, { recursive: true, force: true });
  });

  it('should return defaults when no file exists', () => {
    const result = loadConfig({ cwd: projectDir, env });

    expect(result.config).toEqual(defaultConfig());
    expect(result.warnings).toEqual([]);
    expect(result.sources.map((s) => [s.level, s.loaded])).toEqual([
      ['user', false],
      ['project', false],
      ['env', false],
    ]);
  });

  it('should layer user, project and environment settings', () => {
    writeUser(JSON.stringify({ model: 'openai/o3', tools: { maxParallel: 4 } }));
    writeProject(JSON.stringify({ tools: { maxErrors: 10 } }));
    env.ROUNDLOOP_MAX_ROUNDS = '7';

    const { config } = loadConfig({ cwd: projectDir, env });

    expect(config.model).toBe('openai/o3');
    expect(config.tools.maxParallel).toBe(4);
    expect(config.tools.maxErrors).toBe(10);
    expect(config.tools.resultMaxChars).toBe(15_000);
    expect(config.maxRounds).toBe(7);
  });

  it('should skip an invalid file with a warning', () => {
    writeUser(JSON.stringify({ model: 'openai/o3' }));
    writeProject(JSON.stringify({ tools: { bogus: 1 } }));

    const result = loadConfig({ cwd: projectDir, env });
    const projectPath = join(projectDir, '.roundloop', 'config.json');

    expect(result.config.model).toBe('openai/o3');
    expect(result.config.tools.maxErrors).toBe(25);
    expect(result.warnings).toEqual([`${projectPath}: tools: Unrecognized key(s) in object: 'bogus'`]);
  });

  it('should skip a file that is not JSON', () => {
    writeProject('{ not json');

    const result = loadConfig({ cwd: projectDir, env });

    expect(result.warnings).toHaveLength(1);
    expect(result.warnings[0]?.startsWith(`${join(projectDir, '.roundloop', 'config.json')}: failed to parse JSON: `)).toBe(
      true
    );
  });

  it('should keep file settings when an environment value is invalid', () => {
    writeProject(JSON.stringify({ maxRounds: 12 }));
    env.ROUNDLOOP_LOG_LEVEL = 'loud';

    const result = loadConfig({ cwd: projectDir, env });

    expect(result.config.maxRounds).toBe(12);
    expect(result.config.logging.level).toBe('info');
    expect(result.warnings.some((w) => w.startsWith('environment: logging.level: '))).toBe(true);
  });

  it('should honour skip flags', () => {
    writeUser(JSON.stringify({ model: 'openai/o3' }));

    const result = loadConfig({ cwd: projectDir, env, skipUser: true, skipProject: true });

    expect(result.config.model).toBe('anthropic/claude-sonnet-4.6');
    expect(result.sources.map((s) => s.level)).toEqual(['env']);
  });
});

describe('configFromEnv', () => {
  it('should read model, fallback list and tier overrides', () => {
    expect(
      configFromEnv({
        ROUNDLOOP_MODEL: 'openai/o3',
        ROUNDLOOP_MODEL_FALLBACK_LIST: 'a/one, b/two,,c/three',
        ROUNDLOOP_PAID_TIER: 'TRUE',
      })
    ).toEqual({
      model: 'openai/o3',
      fallbackModels: ['a/one', 'b/two', 'c/three'],
      routing: { paidTier: true },
    });
  });

  it('should warn about a malformed round limit', () => {
    const warnings: string[] = [];
    expect(configFromEnv({ ROUNDLOOP_MAX_ROUNDS: 'abc' }, warnings)).toEqual({});
    expect(warnings).toEqual(["ROUNDLOOP_MAX_ROUNDS: expected a positive integer, got 'abc'"]);
  });
});

describe('deepMergeConfigs', () => {
  it('should merge nested objects and replace arrays', () => {
    expect(
      deepMergeConfigs({ tools: { maxParallel: 2, maxErrors: 5 }, fallbackModels: ['a'] }, { tools: { maxErrors: 9 }, fallbackModels: ['b'] })
    ).toEqual({ tools: { maxParallel: 2, maxErrors: 9 }, fallbackModels: ['b'] });
  });
});

describe('configuredModels', () => {
  it('should list main, code, light and fallback models once each', () => {
    const config = defaultConfig({
      model: 'vendor/main',
      codeModel: 'vendor/coder',
      lightModel: 'vendor/main',
      fallbackModels: ['vendor/backup', 'vendor/coder'],
    });

    expect(configuredModels(config)).toEqual(['vendor/main', 'vendor/coder', 'vendor/backup']);
  });

  it('should skip unset role models', () => {
    expect(configuredModels(defaultConfig({ model: 'vendor/main' }))).toEqual(['vendor/main']);
  });
});

describe('resolveModelName', () => {
  const config = defaultConfig({ codeModel: 'vendor/coder' });

  it('should map role names to the configured role model', () => {
    expect(resolveModelName(config, 'code')).toBe('vendor/coder');
    expect(resolveModelName(config, 'light')).toBeUndefined();
  });

  it('should return any other name unchanged', () => {
    expect(resolveModelName(config, 'openai/o3')).toBe('openai/o3');
  });
});
