/**
 * CLI Tests
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { CliUsageError, VERSION, parseArgs, runCli, type CliIO } from '../../src/cli.js';
import { MemorySink, configureLogger } from '../../src/integrations/utilities/logger.js';

// =============================================================================
// ARGUMENT PARSING
// =============================================================================

describe('parseArgs', () => {
  it('should default to help', () => {
    expect(parseArgs([])).toEqual({ command: 'help' });
    expect(parseArgs(['--help'])).toEqual({ command: 'help' });
    expect(parseArgs(['-v'])).toEqual({ command: 'version' });
  });

  it('should parse a run with options', () => {
    expect(
      parseArgs(['run', 'fix', 'the', 'tests', '--model', 'openai/o3', '--budget', '1.5', '--max-rounds', '9', '--effort', 'high', '--json'])
    ).toEqual({
      command: 'run',
      json: true,
      text: 'fix the tests',
      type: 'user',
      model: 'openai/o3',
      budget: 1.5,
      maxRounds: 9,
      effort: 'high',
      dryRun: false,
    });
  });

  it('should parse price arguments', () => {
    expect(parseArgs(['price', 'openai/o3', '1000', '500'])).toEqual({
      command: 'price',
      json: false,
      model: 'openai/o3',
      promptTokens: 1000,
      completionTokens: 500,
      cachedTokens: 0,
    });
  });

  it('should parse health directories', () => {
    expect(parseArgs(['health', '--repo', 'r', '--drive', 'd'])).toEqual({
      command: 'health',
      json: false,
      repo: 'r',
      drive: 'd',
    });
  });

  it('should reject malformed input', () => {
    expect(() => parseArgs(['deploy'])).toThrow("Unknown command 'deploy'");
    expect(() => parseArgs(['run'])).toThrow('run needs task text');
    expect(() => parseArgs(['run', 'x', '--model'])).toThrow('--model needs a value');
    expect(() => parseArgs(['run', 'x', '--budget', '-1'])).toThrow(CliUsageError);
    expect(() => parseArgs(['run', 'x', '--max-rounds', '0'])).toThrow('--max-rounds must be at least 1');
    expect(() => parseArgs(['run', 'x', '--effort', 'max'])).toThrow('--effort must be one of');
    expect(() => parseArgs(['run', 'x', '--verbose'])).toThrow("Unknown option '--verbose'");
    expect(() => parseArgs(['price', 'openai/o3', '10', 'many'])).toThrow(
      "completion must be a non-negative integer, got 'many'"
    );
  });
});

// =============================================================================
// COMMANDS
// =============================================================================

describe('runCli', () => {
  let dir: string;
  let stdout: string[];
  let stderr: string[];
  let io: CliIO;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'roundloop-cli-'));
    stdout = [];
    stderr = [];
    io = {
      stdout: (text) => stdout.push(text),
      stderr: (text) => stderr.push(text),
      env: { XDG_CONFIG_HOME: join(dir, 'xdg'), XDG_STATE_HOME: join(dir, 'state'), ROUNDLOOP_LOG_LEVEL: 'silent' },
      cwd: dir,
    };
  });

  afterEach(() => {
    configureLogger({ level: 'silent', sinks: [new MemorySink()] });
    rmSync(dir, { recursive: true, force: true });
  });

  it('should print the version', async () => {
    expect(await runCli(['--version'], io)).toBe(0);
    expect(stdout).toEqual([`${VERSION}\n`]);
  });

  it('should exit 2 on a usage error', async () => {
    expect(await runCli(['run'], io)).toBe(2);
    expect(stderr[0]).toContain('run needs task text');
  });

  it('should price a model from the static table', async () => {
    expect(await runCli(['price', 'openai/o3', '1000', '500'], io, { fetchPricing: null })).toBe(0);
    expect(stdout).toEqual(['openai/o3: $0.006000\n']);
  });

  it('should print price as JSON', async () => {
    await runCli(['price', 'openai/o3', '1000', '500', '--json'], io, { fetchPricing: null });

    expect(JSON.parse(stdout.join(''))).toEqual({
      model: 'openai/o3',
      promptTokens: 1000,
      completionTokens: 500,
      cachedTokens: 0,
      cost: 0.006,
      priced: true,
    });
  });

  it('should complete a dry run without a network', async () => {
    const code = await runCli(['run', 'look around', '--dry-run', '--json'], io, { persist: false });

    expect(code).toBe(0);
    const outcome = JSON.parse(stdout.join(''));
    expect(outcome.status).toBe('success');
    expect(outcome.rounds).toBe(2);
    expect(outcome.text).toBe('Dry run finished: context was built, one tool ran, and the loop returned.');
  });

  it('should report health findings as JSON', async () => {
    expect(await runCli(['health', '--json'], io)).toBe(0);
    expect(Array.isArray(JSON.parse(stdout.join('')).findings)).toBe(true);
  });

  describe('role models', () => {
    it('should run with the configured code model for --model code', async () => {
      io.env.ROUNDLOOP_MODEL_CODE = 'openai/o3';

      const code = await runCli(['run', 'look around', '--model', 'code', '--dry-run', '--json'], io, { persist: false });

      expect(code).toBe(0);
      expect(JSON.parse(stdout.join('')).model).toBe('openai/o3');
    });

    it('should exit 2 when the named role has no model', async () => {
      expect(await runCli(['run', 'look around', '--model', 'light', '--dry-run'], io, { persist: false })).toBe(2);
      expect(stderr[0]).toContain('--model light: no light model configured');
      expect(stdout).toEqual([]);
    });

    it('should price the configured code model', async () => {
      io.env.ROUNDLOOP_MODEL_CODE = 'openai/o3';

      expect(await runCli(['price', 'code', '1000', '500'], io, { fetchPricing: null })).toBe(0);
      expect(stdout).toEqual(['openai/o3: $0.006000\n']);
    });

    it('should validate every configured model', async () => {
      mkdirSync(join(dir, '.roundloop'), { recursive: true });
      writeFileSync(
        join(dir, '.roundloop', 'config.json'),
        JSON.stringify({
          routing: {
            directProviders: { acme: { baseUrl: 'https://acme.test/v1', apiKeyEnv: 'ACME_KEY', modelIds: ['pro-1'] } },
          },
        })
      );
      io.env.ROUNDLOOP_MODEL_CODE = 'vendor/coder-1';
      io.env.ROUNDLOOP_MODEL_LIGHT = 'acme/lite';
      io.env.ROUNDLOOP_MODEL_FALLBACK_LIST = 'vendor/backup';

      expect(await runCli(['models', '--json'], io)).toBe(0);
      expect(JSON.parse(stdout.join(''))).toEqual({
        models: [
          { role: 'main', model: 'anthropic/claude-sonnet-4.6', ok: true },
          { role: 'code', model: 'vendor/coder-1', ok: true },
          { role: 'light', model: 'acme/lite', ok: false, reason: "'lite' is not a acme model" },
          { role: 'fallback', model: 'vendor/backup', ok: true },
        ],
      });
    });
  });
});
