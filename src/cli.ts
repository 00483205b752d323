/**
 * CLI Argument Parsing and Commands
 *
 *   roundloop run "<text>" [options]
 *   roundloop price <model> <prompt> <completion> [cached]
 *   roundloop health [--repo dir] [--drive dir]
 *   roundloop models
 *
 * `runCli` returns the exit code instead of exiting, so it can be tested:
 * 0 success or budget exhausted, 1 fatal termination, 2 usage error.
 */

import { randomUUID } from 'node:crypto';
import chalk from 'chalk';
import { loadConfig } from './config/config-manager.js';
import { REASONING_EFFORTS, resolveModelName, type LoopConfig } from './config/schema.js';
import { PricingCache, STATIC_PRICING, type PricingFetcher } from './costs/pricing.js';
import { createGatewayPricingFetcher } from './costs/gateway-pricing.js';
import { ContextBuilder } from './core/context-builder.js';
import type { TaskOutcome } from './core/execution-loop.js';
import { formatError } from './errors/index.js';
import { ConsoleSink, FileSink, configureLogger, createComponentLogger } from './integrations/utilities/logger.js';
import { FileEnvironment, FileMemoryStore } from './memory/file-memory-store.js';
import { CompositeEventLog, JsonlEventLog } from './persistence/event-log.js';
import { openEventStore } from './persistence/event-store.js';
import { getEventDbPath } from './paths.js';
import { ScriptedProvider, textReply, toolCallReply } from './providers/adapters/mock.js';
import type { LLMProvider } from './providers/types.js';
import { createLoopRuntime } from './runtime.js';
import type { ReasoningEffort, Task, TaskType } from './types.js';

const log = createComponentLogger('CLI');

export const VERSION = '0.4.0';

// =============================================================================
// ARGUMENTS
// =============================================================================

export class CliUsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CliUsageError';
  }
}

interface CommonArgs {
  repo?: string;
  drive?: string;
  json: boolean;
}

export interface RunArgs extends CommonArgs {
  command: 'run';
  text: string;
  type: TaskType;
  model?: string;
  budget?: number;
  maxRounds?: number;
  effort?: ReasoningEffort;
  dryRun: boolean;
}

export interface PriceArgs extends CommonArgs {
  command: 'price';
  model: string;
  promptTokens: number;
  completionTokens: number;
  cachedTokens: number;
}

export interface HealthArgs extends CommonArgs {
  command: 'health';
}

export interface ModelsArgs extends CommonArgs {
  command: 'models';
}

export type CLIArgs = RunArgs | PriceArgs | HealthArgs | ModelsArgs | { command: 'help' } | { command: 'version' };

function parseCount(value: string | undefined, name: string): number {
  const n = Number(value);
  if (value === undefined || !Number.isInteger(n) || n < 0) {
    throw new CliUsageError(`${name} must be a non-negative integer, got '${value ?? ''}'`);
  }
  return n;
}

function parseEffort(value: string | undefined): ReasoningEffort {
  for (const effort of REASONING_EFFORTS) {
    if (effort === value) return effort;
  }
  throw new CliUsageError(`--effort must be one of ${REASONING_EFFORTS.join(', ')}`);
}

/**
 * Parse `argv` (without node and script path).
 */
export function parseArgs(argv: readonly string[]): CLIArgs {
  const [command, ...rest] = argv;
  if (command === undefined || command === 'help' || command === '--help' || command === '-h') {
    return { command: 'help' };
  }
  if (command === '--version' || command === '-v') {
    return { command: 'version' };
  }
  if (command !== 'run' && command !== 'price' && command !== 'health' && command !== 'models') {
    throw new CliUsageError(`Unknown command '${command}'`);
  }

  const positional: string[] = [];
  const flags: { repo?: string; drive?: string; json: boolean } = { json: false };
  let type: TaskType = 'user';
  let model: string | undefined;
  let budget: number | undefined;
  let maxRounds: number | undefined;
  let effort: ReasoningEffort | undefined;
  let dryRun = false;

  const value = (i: number, flag: string): string => {
    const v = rest[i];
    if (v === undefined || v.startsWith('--')) throw new CliUsageError(`${flag} needs a value`);
    return v;
  };

  for (let i = 0; i < rest.length; i++) {
    const arg = rest[i];
    if (arg === undefined) continue;
    if (arg === '--json') {
      flags.json = true;
    } else if (arg === '--dry-run') {
      dryRun = true;
    } else if (arg === '--repo') {
      flags.repo = value(++i, arg);
    } else if (arg === '--drive') {
      flags.drive = value(++i, arg);
    } else if (arg === '--type') {
      type = value(++i, arg);
    } else if (arg === '--model' || arg === '-m') {
      model = value(++i, arg);
    } else if (arg === '--budget') {
      budget = Number(value(++i, arg));
      if (!Number.isFinite(budget) || budget <= 0) throw new CliUsageError('--budget must be a positive number');
    } else if (arg === '--max-rounds') {
      maxRounds = parseCount(value(++i, arg), '--max-rounds');
      if (maxRounds === 0) throw new CliUsageError('--max-rounds must be at least 1');
    } else if (arg === '--effort') {
      effort = parseEffort(value(++i, arg));
    } else if (arg.startsWith('--')) {
      throw new CliUsageError(`Unknown option '${arg}'`);
    } else {
      positional.push(arg);
    }
  }

  if (command === 'health' || command === 'models') {
    return { command, ...flags };
  }

  if (command === 'price') {
    const [priceModel, prompt, completion, cached] = positional;
    if (priceModel === undefined) throw new CliUsageError('price needs <model> <prompt> <completion> [cached]');
    return {
      command,
      ...flags,
      model: priceModel,
      promptTokens: parseCount(prompt, 'prompt'),
      completionTokens: parseCount(completion, 'completion'),
      cachedTokens: cached === undefined ? 0 : parseCount(cached, 'cached'),
    };
  }

  const text = positional.join(' ');
  if (text.trim() === '') throw new CliUsageError('run needs task text');
  return { command, ...flags, text, type, model, budget, maxRounds, effort, dryRun };
}

export function helpText(): string {
  return `
${chalk.bold('roundloop')} ${chalk.dim(`v${VERSION}`)} - autonomous model/tool round loop

${chalk.bold('USAGE:')}
  roundloop run "<text>" [OPTIONS]
  roundloop price <model> <prompt> <completion> [cached]
  roundloop health [--repo DIR] [--drive DIR]
  roundloop models    List configured models and whether they validate

${chalk.bold('RUN OPTIONS:')}
  --type TYPE         Task type: user (default) or evolution
  -m, --model MODEL   Model identifier, or code / light for the configured role model
  --budget USD        Budget ceiling for this task
  --max-rounds N      Round limit
  --effort LEVEL      ${REASONING_EFFORTS.join(' | ')}
  --repo DIR          Repository directory (default: cwd)
  --drive DIR         Drive directory for memory, state and logs (default: cwd)
  --dry-run           Use a scripted provider; no network
  --json              Print the outcome as JSON

${chalk.bold('ENVIRONMENT:')}
  OPENROUTER_API_KEY, ROUNDLOOP_MODEL, ROUNDLOOP_MODEL_CODE, ROUNDLOOP_MODEL_LIGHT,
  ROUNDLOOP_MODEL_FALLBACK_LIST,
  ROUNDLOOP_MAX_ROUNDS, ROUNDLOOP_PAID_TIER, ROUNDLOOP_LOG_LEVEL

${chalk.bold('EXIT CODES:')}
  0 success or budget exhausted, 1 fatal termination, 2 usage error
`;
}

// =============================================================================
// COMMANDS
// =============================================================================

export interface CliIO {
  stdout: (text: string) => void;
  stderr: (text: string) => void;
  env: NodeJS.ProcessEnv;
  cwd: string;
}

export interface CliDeps {
  /** Provider for non-dry runs; defaults to the HTTP provider */
  provider?: LLMProvider;
  /** Remote pricing source; `null` disables it */
  fetchPricing?: PricingFetcher | null;
  /** Persist events to SQLite and JSONL (default: true) */
  persist?: boolean;
}

function defaultIO(): CliIO {
  return {
    stdout: (text) => process.stdout.write(text),
    stderr: (text) => process.stderr.write(text),
    env: process.env,
    cwd: process.cwd(),
  };
}

/** Scripted conversation for `--dry-run`: one directory listing, then an answer */
export function dryRunProvider(): ScriptedProvider {
  return new ScriptedProvider(
    [
      toolCallReply([{ id: 'dry-run-1', name: 'repo_list', args: { dir: '.' } }]),
      textReply('Dry run finished: context was built, one tool ran, and the loop returned.'),
    ],
    { fallbackReply: 'Dry run finished.' }
  );
}

function withFlags(config: LoopConfig, args: CommonArgs & Partial<Pick<RunArgs, 'model' | 'maxRounds'>>, cwd: string): LoopConfig {
  let model = config.model;
  if (args.model !== undefined) {
    const resolved = resolveModelName(config, args.model);
    if (resolved === undefined) throw new CliUsageError(`--model ${args.model}: no ${args.model} model configured`);
    model = resolved;
  }
  return {
    ...config,
    model,
    maxRounds: args.maxRounds ?? config.maxRounds,
    repoDir: args.repo ?? config.repoDir ?? cwd,
    driveDir: args.drive ?? config.driveDir ?? cwd,
  };
}

export function formatOutcome(outcome: TaskOutcome): string {
  const paint =
    outcome.status === 'success' ? chalk.green : outcome.status === 'budget_exhausted' ? chalk.yellow : chalk.red;
  const meta = [
    `status: ${paint(outcome.status)}`,
    `rounds: ${outcome.rounds}`,
    `model: ${outcome.model}`,
    `cost: $${outcome.usage.cost.toFixed(6)}`,
    `tokens: ${outcome.usage.promptTokens} in / ${outcome.usage.completionTokens} out`,
  ].join(' | ');
  return `${outcome.text}\n\n${chalk.dim(meta)}\n`;
}

async function runCommand(args: RunArgs, config: LoopConfig, io: CliIO, deps: CliDeps): Promise<number> {
  const driveDir = config.driveDir ?? io.cwd;
  const store = deps.persist === false ? undefined : openEventStore({ dbPath: getEventDbPath(io.env) });
  const eventLog = store
    ? new CompositeEventLog([store, new JsonlEventLog(driveDir)])
    : undefined;

  try {
    const runtime = createLoopRuntime({
      config,
      provider: args.dryRun ? dryRunProvider() : deps.provider,
      log: eventLog,
      env: io.env,
      fetchPricing: args.dryRun ? null : deps.fetchPricing,
    });

    const task: Task = {
      id: `task-${randomUUID().slice(0, 8)}`,
      type: args.type,
      text: args.text,
      ...(args.effort && { reasoningEffort: args.effort }),
      ...(args.budget !== undefined && { budgetUsd: args.budget }),
    };

    const outcome = await runtime.orchestrator.run(task);
    if (args.json) {
      io.stdout(
        JSON.stringify(
          {
            taskId: outcome.taskId,
            status: outcome.status,
            text: outcome.text,
            rounds: outcome.rounds,
            model: outcome.model,
            usage: outcome.usage,
            toolErrors: outcome.toolErrors,
            capReports: outcome.capReports,
            ...(outcome.error && { error: outcome.error.message }),
          },
          null,
          2
        ) + '\n'
      );
    } else {
      io.stdout(formatOutcome(outcome));
    }
    return outcome.status === 'success' || outcome.status === 'budget_exhausted' ? 0 : 1;
  } finally {
    store?.close();
  }
}

async function priceCommand(args: PriceArgs, config: LoopConfig, io: CliIO, deps: CliDeps): Promise<number> {
  const remote =
    deps.fetchPricing === null
      ? undefined
      : deps.fetchPricing ??
        (config.pricing.remote
          ? createGatewayPricingFetcher({
              baseUrl: config.routing.gateway.baseUrl,
              apiKey: io.env[config.routing.gateway.apiKeyEnv],
            })
          : undefined);

  const pricing = new PricingCache({
    staticTable: { ...STATIC_PRICING },
    fetchPricing: remote,
    minLiveEntries: config.pricing.minLiveEntries,
    decimals: config.pricing.decimals,
  });
  await pricing.refresh();

  // Role aliases were resolved into config.model
  const model = config.model;

  const cost = pricing.estimateCost(model, args.promptTokens, args.completionTokens, args.cachedTokens);
  const priced = pricing.lookup(model) !== undefined;
  if (args.json) {
    io.stdout(
      JSON.stringify({
        model,
        promptTokens: args.promptTokens,
        completionTokens: args.completionTokens,
        cachedTokens: args.cachedTokens,
        cost,
        priced,
      }) + '\n'
    );
  } else {
    io.stdout(`${model}: $${cost.toFixed(config.pricing.decimals)}${priced ? '' : ' (no pricing entry)'}\n`);
  }
  return 0;
}

async function healthCommand(config: LoopConfig, args: HealthArgs, io: CliIO): Promise<number> {
  const repoDir = config.repoDir ?? io.cwd;
  const driveDir = config.driveDir ?? io.cwd;
  const builder = new ContextBuilder({
    env: new FileEnvironment(repoDir, driveDir),
    memory: new FileMemoryStore(driveDir),
    context: config.context,
  });
  const findings = await builder.healthFindings();

  if (args.json) {
    io.stdout(JSON.stringify({ findings }) + '\n');
  } else if (findings.length === 0) {
    io.stdout('No health findings.\n');
  } else {
    io.stdout(findings.map((f) => `${chalk.yellow('!')} ${f}`).join('\n') + '\n');
  }
  return 0;
}

interface ModelEntry {
  role: 'main' | 'code' | 'light' | 'fallback';
  model: string;
}

function modelEntries(config: LoopConfig): ModelEntry[] {
  const entries: ModelEntry[] = [{ role: 'main', model: config.model }];
  if (config.codeModel) entries.push({ role: 'code', model: config.codeModel });
  if (config.lightModel) entries.push({ role: 'light', model: config.lightModel });
  for (const model of config.fallbackModels) entries.push({ role: 'fallback', model });
  return entries;
}

function modelsCommand(args: ModelsArgs, config: LoopConfig, io: CliIO, deps: CliDeps): number {
  const { router } = createLoopRuntime({ config, provider: deps.provider, env: io.env, fetchPricing: null });
  const rows = modelEntries(config).map((entry) => ({ ...entry, verdict: router.validate(entry.model) }));

  if (args.json) {
    io.stdout(
      JSON.stringify({
        models: rows.map(({ role, model, verdict }) => ({ role, model, ...verdict })),
      }) + '\n'
    );
    return 0;
  }

  for (const { role, model, verdict } of rows) {
    const status = verdict.ok
      ? chalk.green(verdict.bypass ? `ok (${verdict.bypass})` : 'ok')
      : chalk.red(`rejected: ${verdict.reason}`);
    io.stdout(`${role.padEnd(9)}${model}  ${status}\n`);
  }
  return 0;
}

function usageFailure(err: unknown, io: CliIO): number {
  if (!(err instanceof CliUsageError)) throw err;
  io.stderr(`${chalk.red('Error:')} ${err.message}\n${helpText()}`);
  return 2;
}

/**
 * Parse, configure and run one command. Returns the process exit code.
 */
export async function runCli(argv: readonly string[], io: CliIO = defaultIO(), deps: CliDeps = {}): Promise<number> {
  let args: CLIArgs;
  try {
    args = parseArgs(argv);
  } catch (err) {
    return usageFailure(err, io);
  }

  if (args.command === 'help') {
    io.stdout(helpText());
    return 0;
  }
  if (args.command === 'version') {
    io.stdout(`${VERSION}\n`);
    return 0;
  }

  const loaded = loadConfig({ cwd: io.cwd, env: io.env });
  let config: LoopConfig;
  try {
    config = withFlags(loaded.config, args, io.cwd);
  } catch (err) {
    return usageFailure(err, io);
  }

  configureLogger({
    level: config.logging.level,
    sinks: [
      new ConsoleSink({ stderrOnly: true }),
      ...(config.logging.file ? [new FileSink(config.logging.file)] : []),
    ],
  });
  for (const warning of loaded.warnings) {
    log.warn('Config warning', { warning });
  }

  try {
    switch (args.command) {
      case 'run':
        return await runCommand(args, config, io, deps);
      case 'price':
        return await priceCommand(args, config, io, deps);
      case 'health':
        return await healthCommand(config, args, io);
      case 'models':
        return modelsCommand(args, config, io, deps);
    }
  } catch (err) {
    log.error('Command failed', { command: args.command, error: formatError(err) });
    io.stderr(`${chalk.red('Error:')} ${formatError(err)}\n`);
    return 1;
  }
}
