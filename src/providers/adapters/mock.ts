/**
 * Scripted Provider
 *
 * Replays a fixed list of steps, one per call: a response, an error to
 * throw, or a function of the request. Used by tests and by `--dry-run`.
 * Every request is kept for inspection.
 */

import type { ToolCallResponse } from '../../types.js';
import type { RawUsage } from '../../costs/usage-accountant.js';
import type { ChatRequest, ChatResponse, LLMProvider } from '../types.js';

// =============================================================================
// TYPES
// =============================================================================

export type ScriptStep = ChatResponse | Error | ((request: ChatRequest) => ChatResponse | Promise<ChatResponse>);

export interface ScriptedProviderConfig {
  /** Returned once the script is exhausted; throws when absent */
  fallbackReply?: string;
}

// =============================================================================
// RESPONSE BUILDERS
// =============================================================================

const DEFAULT_USAGE: RawUsage = { promptTokens: 100, completionTokens: 20 };

export function textReply(text: string, usage: Partial<RawUsage> = {}): ChatResponse {
  return {
    message: { role: 'assistant', content: text },
    finishReason: 'stop',
    usage: { ...DEFAULT_USAGE, ...usage },
  };
}

export function toolCallReply(
  calls: Array<{ id: string; name: string; args: Record<string, unknown> | string }>,
  usage: Partial<RawUsage> = {},
  text: string | null = null
): ChatResponse {
  const toolCalls: ToolCallResponse[] = calls.map((c) => ({
    id: c.id,
    type: 'function',
    function: {
      name: c.name,
      arguments: typeof c.args === 'string' ? c.args : JSON.stringify(c.args),
    },
  }));
  return {
    message: { role: 'assistant', content: text, tool_calls: toolCalls },
    finishReason: 'tool_calls',
    usage: { ...DEFAULT_USAGE, ...usage },
  };
}

// =============================================================================
// PROVIDER
// =============================================================================

export class ScriptedProvider implements LLMProvider {
  readonly name = 'scripted';
  readonly requests: ChatRequest[] = [];

  private steps: ScriptStep[];
  private fallbackReply?: string;

  constructor(steps: ScriptStep[] = [], config: ScriptedProviderConfig = {}) {
    this.steps = [...steps];
    this.fallbackReply = config.fallbackReply;
  }

  push(...steps: ScriptStep[]): this {
    this.steps.push(...steps);
    return this;
  }

  get remaining(): number {
    return this.steps.length;
  }

  /** Models requested, in call order */
  get modelsCalled(): string[] {
    return this.requests.map((r) => r.route.model);
  }

  async chat(request: ChatRequest): Promise<ChatResponse> {
    this.requests.push({ ...request, messages: [...request.messages] });

    const step = this.steps.shift();
    if (step === undefined) {
      if (this.fallbackReply !== undefined) return textReply(this.fallbackReply);
      throw new Error(`ScriptedProvider: no step left for call ${this.requests.length}`);
    }
    if (step instanceof Error) throw step;
    if (typeof step === 'function') return step(request);
    return step;
  }
}
