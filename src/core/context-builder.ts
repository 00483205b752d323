/**
 * Context Builder
 *
 * Assembles the opening message list for a task. The system message is
 * split into three blocks by how often they change, each with its own
 * cache hint:
 *
 *   static       base instructions + reference document      (1h cache)
 *   semi-stable  scratchpad + identity + knowledge index     (5m cache)
 *   dynamic      state snapshot, runtime metadata, health    (not cached)
 *
 * Every layer is clipped to its own ceiling. Missing files become short
 * fallback text, never an error.
 */

import type { ContextConfig } from '../config/schema.js';
import { createComponentLogger } from '../integrations/utilities/logger.js';
import { clipText } from '../integrations/utilities/text.js';
import type { CapReport, ContentBlock, Message, Task, TextBlock } from '../types.js';
import { capMessages, softCapFor } from './context-cap.js';
import { checkHealthInvariants } from './health.js';

const log = createComponentLogger('ContextBuilder');

// =============================================================================
// COLLABORATORS
// =============================================================================

/** Read-only views of the repository and drive */
export interface EnvironmentAccessors {
  readRepoFile(relPath: string): Promise<string | undefined>;
  readDriveFile(relPath: string): Promise<string | undefined>;
  /** Short description of the checked-out commit */
  repoHead(): Promise<string | undefined>;
  now(): number;
}

/** Long-lived agent memory, opaque text */
export interface MemoryStore {
  readScratchpad(): Promise<string | undefined>;
  readIdentity(): Promise<string | undefined>;
  identityUpdatedAt(): Promise<number | undefined>;
  readKnowledgeIndex(): Promise<string | undefined>;
  readState(): Promise<string | undefined>;
}

export const FALLBACK_TEXT = {
  systemPrompt: 'You are an autonomous agent. Work through the task with the tools available and finish with a clear answer.',
  bible: '(no reference document)',
  scratchpad: '(scratchpad is empty)',
  identity: '(no identity recorded yet)',
  knowledgeIndex: '(knowledge base is empty)',
  state: '{}',
  userMessage: '(empty message)',
} as const;

export const SYSTEM_PROMPT_PATH = 'prompts/SYSTEM.md';
export const BIBLE_PATH = 'BIBLE.md';

// =============================================================================
// BUILDER
// =============================================================================

export interface BuildOptions {
  model: string;
  /** Remaining currency for the task, shown in runtime metadata */
  budgetRemainingUsd?: number;
}

export interface BuiltContext {
  messages: Message[];
  softCap: number;
  report: CapReport;
  healthFindings: string[];
}

export interface ContextBuilderConfig {
  env: EnvironmentAccessors;
  memory: MemoryStore;
  context: ContextConfig;
}

export class ContextBuilder {
  private env: EnvironmentAccessors;
  private memory: MemoryStore;
  private config: ContextConfig;

  constructor(config: ContextBuilderConfig) {
    this.env = config.env;
    this.memory = config.memory;
    this.config = config.context;
  }

  async build(task: Task, options: BuildOptions): Promise<BuiltContext> {
    const clip = this.config.clip;

    const [systemPrompt, bible, scratchpad, identity, knowledgeIndex, state, repoHead, healthFindings] =
      await Promise.all([
        this.env.readRepoFile(SYSTEM_PROMPT_PATH),
        this.env.readRepoFile(BIBLE_PATH),
        this.memory.readScratchpad(),
        this.memory.readIdentity(),
        this.memory.readKnowledgeIndex(),
        this.memory.readState(),
        this.env.repoHead(),
        this.healthFindings(),
      ]);

    const staticText = [
      clipText(orFallback(systemPrompt, FALLBACK_TEXT.systemPrompt), clip.systemPrompt),
      '## BIBLE.md',
      clipText(orFallback(bible, FALLBACK_TEXT.bible), clip.bible),
    ].join('\n\n');

    const semiStableText = [
      '## Scratchpad',
      clipText(orFallback(scratchpad, FALLBACK_TEXT.scratchpad), clip.scratchpad),
      '## Identity',
      clipText(orFallback(identity, FALLBACK_TEXT.identity), clip.identity),
      '## Knowledge index',
      clipText(orFallback(knowledgeIndex, FALLBACK_TEXT.knowledgeIndex), clip.knowledgeIndex),
    ].join('\n\n');

    const runtime = {
      utc_now: new Date(this.env.now()).toISOString(),
      repo_head: repoHead ?? 'unknown',
      budget_remaining_usd: options.budgetRemainingUsd ?? null,
      task: { id: task.id, type: task.type },
    };
    const dynamicParts = [
      '## Drive state',
      clipText(orFallback(state, FALLBACK_TEXT.state), clip.state),
      '## Runtime context',
      '```json\n' + JSON.stringify(runtime, null, 2) + '\n```',
    ];
    if (healthFindings.length > 0) {
      dynamicParts.push('## Health invariants', healthFindings.map((f) => `- ${f}`).join('\n'));
    }

    const system: Message = {
      role: 'system',
      content: [
        textBlock(staticText, { type: 'ephemeral', ttl: '1h' }),
        textBlock(semiStableText, { type: 'ephemeral' }),
        textBlock(dynamicParts.join('\n\n')),
      ],
    };

    const softCap = softCapFor(options.model, task.type, this.config);
    const capped = capMessages([system, buildUserMessage(task)], softCap);
    if (capped.report.trimmed) {
      log.warn('Opening context exceeds soft cap', { ...capped.report, model: options.model });
    }

    return { messages: capped.messages, softCap, report: capped.report, healthFindings };
  }

  /**
   * Cap an in-flight history for the next round.
   */
  cap(messages: readonly Message[], model: string, taskType: Task['type']): { messages: Message[]; report: CapReport } {
    return capMessages(messages, softCapFor(model, taskType, this.config));
  }

  async healthFindings(): Promise<string[]> {
    return checkHealthInvariants(
      {
        readRepoFile: (p) => this.env.readRepoFile(p),
        identityUpdatedAt: () => this.memory.identityUpdatedAt(),
        now: () => this.env.now(),
      },
      this.config.staleIdentityHours
    );
  }
}

// =============================================================================
// HELPERS
// =============================================================================

function orFallback(value: string | undefined, fallback: string): string {
  return value === undefined || value.trim() === '' ? fallback : value;
}

function textBlock(text: string, cacheControl?: TextBlock['cache_control']): TextBlock {
  return cacheControl ? { type: 'text', text, cache_control: cacheControl } : { type: 'text', text };
}

/**
 * The user turn: plain text, or a text block followed by an inline image.
 */
export function buildUserMessage(task: Task): Message {
  if (!task.image) {
    return { role: 'user', content: task.text.trim() === '' ? FALLBACK_TEXT.userMessage : task.text };
  }

  const caption = [task.image.caption, task.text].filter((s): s is string => Boolean(s && s.trim())).join('\n\n');
  const content: ContentBlock[] = [
    { type: 'text', text: caption === '' ? FALLBACK_TEXT.userMessage : caption },
    { type: 'image_url', image_url: { url: `data:${task.image.mimeType};base64,${task.image.base64}` } },
  ];
  return { role: 'user', content };
}

export function createContextBuilder(config: ContextBuilderConfig): ContextBuilder {
  return new ContextBuilder(config);
}
