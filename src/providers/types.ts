/**
 * Provider Types
 *
 * The model-call contract: one request in, one assistant message plus a
 * usage block out. Failures surface as ProviderError with the HTTP status.
 */

import type { RawUsage } from '../costs/usage-accountant.js';
import type { Message, ReasoningEffort } from '../types.js';

// =============================================================================
// TOOL SCHEMAS
// =============================================================================

/** Tool definition in the OpenAI function-calling shape */
export interface ToolDefinitionSchema {
  type: 'function';
  function: {
    name: string;
    description: string;
    parameters: Record<string, unknown>;
  };
}

// =============================================================================
// ROUTING
// =============================================================================

/** Where a model call goes, as decided by the router */
export interface ResolvedRoute {
  /** Provider name (gateway or direct provider) */
  provider: string;
  baseUrl: string;
  /** Credential, when the endpoint's environment variable is set */
  apiKey?: string;
  /** Model identifier as the caller named it */
  model: string;
  /** Model identifier sent on the wire (prefix stripped for direct providers) */
  wireModel: string;
  headers?: Record<string, string>;
}

// =============================================================================
// REQUEST / RESPONSE
// =============================================================================

export interface ChatRequest {
  route: ResolvedRoute;
  messages: Message[];
  tools?: ToolDefinitionSchema[];
  maxTokens: number;
  reasoningEffort: ReasoningEffort;
  /** Request timeout in milliseconds */
  timeoutMs: number;
}

export interface ChatResponse {
  /** Assistant message: text and/or tool calls */
  message: Message;
  finishReason: string;
  usage: RawUsage;
  /** Model identifier reported by the provider, if any */
  model?: string;
}

export interface LLMProvider {
  readonly name: string;
  chat(request: ChatRequest): Promise<ChatResponse>;
}
