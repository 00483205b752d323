/**
 * OpenAI-Compatible HTTP Adapter
 *
 * Talks to any `/chat/completions` endpoint: the gateway and direct
 * providers differ only in the base URL and credential the router hands
 * over. Usage accounting is requested inline so the gateway reports the
 * measured cost.
 */

import { z } from 'zod';
import { ProviderError, formatError } from '../../errors/index.js';
import { createComponentLogger } from '../../integrations/utilities/logger.js';
import type { Message, ToolCallResponse } from '../../types.js';
import type { ChatRequest, ChatResponse, LLMProvider } from '../types.js';

const log = createComponentLogger('OpenAICompatible');

// =============================================================================
// WIRE SCHEMA
// =============================================================================

const WireToolCallSchema = z.object({
  id: z.string(),
  type: z.literal('function').default('function'),
  function: z.object({
    name: z.string(),
    arguments: z.union([z.string(), z.record(z.string(), z.unknown())]).default(''),
  }),
});

const CompletionSchema = z.object({
  id: z.string().optional(),
  model: z.string().optional(),
  choices: z
    .array(
      z.object({
        message: z.object({
          content: z.string().nullable().optional(),
          tool_calls: z.array(WireToolCallSchema).nullable().optional(),
        }),
        finish_reason: z.string().nullable().optional(),
      })
    )
    .default([]),
  usage: z
    .object({
      prompt_tokens: z.number().default(0),
      completion_tokens: z.number().default(0),
      cost: z.number().optional(),
      prompt_tokens_details: z
        .object({
          cached_tokens: z.number().optional(),
          cache_write_tokens: z.number().optional(),
        })
        .nullable()
        .optional(),
    })
    .optional(),
});

type WireToolCall = z.infer<typeof WireToolCallSchema>;

// =============================================================================
// ADAPTER
// =============================================================================

export interface OpenAICompatibleConfig {
  fetchImpl?: typeof fetch;
}

/** Content blocks go out as-is so text blocks keep their cache hints */
function toWireMessage(m: Message): Record<string, unknown> {
  const wire: Record<string, unknown> = { role: m.role, content: m.content };
  if (m.tool_calls && m.tool_calls.length > 0) wire.tool_calls = m.tool_calls;
  if (m.tool_call_id) wire.tool_call_id = m.tool_call_id;
  if (m.name) wire.name = m.name;
  return wire;
}

/** Some models emit arguments as an object instead of a JSON string */
function normalizeToolCall(tc: WireToolCall): ToolCallResponse {
  const args = tc.function.arguments;
  return {
    id: tc.id,
    type: 'function',
    function: {
      name: tc.function.name,
      arguments: typeof args === 'string' ? args : JSON.stringify(args),
    },
  };
}

export class OpenAICompatibleProvider implements LLMProvider {
  readonly name = 'openai-compatible';

  private fetchImpl: typeof fetch;

  constructor(config: OpenAICompatibleConfig = {}) {
    this.fetchImpl = config.fetchImpl ?? fetch;
  }

  async chat(request: ChatRequest): Promise<ChatResponse> {
    const { route } = request;

    const body: Record<string, unknown> = {
      model: route.wireModel,
      messages: request.messages.map(toWireMessage),
      max_tokens: request.maxTokens,
      usage: { include: true },
    };
    if (request.reasoningEffort !== 'none') {
      body.reasoning = { effort: request.reasoningEffort };
    }
    if (request.tools && request.tools.length > 0) {
      body.tools = request.tools;
      body.tool_choice = 'auto';
    }

    const headers: Record<string, string> = {
      'Content-Type': 'application/json',
      ...route.headers,
    };
    if (route.apiKey) headers.Authorization = `Bearer ${route.apiKey}`;

    let response: Response;
    try {
      response = await this.fetchImpl(`${route.baseUrl}/chat/completions`, {
        method: 'POST',
        headers,
        body: JSON.stringify(body),
        signal: AbortSignal.timeout(request.timeoutMs),
      });
    } catch (error) {
      throw ProviderError.network(route.provider, error instanceof Error ? error : new Error(String(error)));
    }

    if (!response.ok) {
      const text = await response.text();
      log.warn('Model call rejected', { provider: route.provider, model: route.model, status: response.status });
      throw ProviderError.fromStatus(route.provider, response.status, text);
    }

    let payload: unknown;
    try {
      payload = await response.json();
    } catch (error) {
      throw ProviderError.fromStatus(route.provider, 502, `malformed completion: ${formatError(error)}`);
    }

    const parsed = CompletionSchema.safeParse(payload);
    if (!parsed.success) {
      throw ProviderError.fromStatus(route.provider, 502, `malformed completion: ${parsed.error.message}`);
    }

    const data = parsed.data;
    const choice = data.choices[0];
    if (!choice) {
      throw ProviderError.emptyResponse(route.provider, route.model);
    }

    const toolCalls = (choice.message.tool_calls ?? []).map(normalizeToolCall);
    const message: Message = {
      role: 'assistant',
      content: choice.message.content ?? null,
      ...(toolCalls.length > 0 && { tool_calls: toolCalls }),
    };

    return {
      message,
      finishReason: choice.finish_reason ?? 'unknown',
      model: data.model,
      usage: {
        promptTokens: data.usage?.prompt_tokens ?? 0,
        completionTokens: data.usage?.completion_tokens ?? 0,
        cachedTokens: data.usage?.prompt_tokens_details?.cached_tokens,
        cacheWriteTokens: data.usage?.prompt_tokens_details?.cache_write_tokens,
        cost: data.usage?.cost,
      },
    };
  }
}
