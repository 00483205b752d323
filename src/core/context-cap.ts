/**
 * Soft token cap for the outbound message list.
 *
 * The cap comes from the model and task type. When the history is over
 * the cap, the system message stays and the oldest turns go first.
 */

import type { ContextConfig } from '../config/schema.js';
import { estimateTokens } from '../integrations/utilities/text.js';
import type { CapReport, Message, TaskType } from '../types.js';

export type CapConfig = Pick<ContextConfig, 'defaultCap' | 'evolutionCap' | 'lowThroughputCaps'>;

/**
 * Cap for `model`: the first matching low-throughput prefix, else the
 * default. Evolution tasks take the stricter of that and the evolution cap.
 */
export function softCapFor(model: string, taskType: TaskType, config: CapConfig): number {
  const match = config.lowThroughputCaps.find((entry) => model.startsWith(entry.prefix));
  const modelCap = match?.cap ?? config.defaultCap;
  return taskType === 'evolution' ? Math.min(modelCap, config.evolutionCap) : modelCap;
}

function messageText(message: Message): string {
  let text = '';
  if (typeof message.content === 'string') {
    text = message.content;
  } else if (message.content) {
    for (const block of message.content) {
      if (block.type === 'text') text += block.text;
    }
  }
  for (const call of message.tool_calls ?? []) {
    text += call.function.name + call.function.arguments;
  }
  return text;
}

export function estimateMessageTokens(message: Message): number {
  return estimateTokens(messageText(message));
}

export function estimateTotalTokens(messages: readonly Message[]): number {
  return messages.reduce((sum, m) => sum + estimateMessageTokens(m), 0);
}

export interface CapResult {
  messages: Message[];
  report: CapReport;
}

/**
 * Trim `messages` to `cap` estimated tokens.
 *
 * Keeps the leading system message, then takes the newest messages while
 * they fit and stops at the first one that does not. Tool responses left
 * at the head without their assistant call are dropped as well.
 */
export function capMessages(messages: readonly Message[], cap: number): CapResult {
  const originalTokens = estimateTotalTokens(messages);
  if (originalTokens <= cap) {
    return {
      messages: [...messages],
      report: { requestedCap: cap, actualTokens: originalTokens, originalTokens, droppedMessages: 0, trimmed: false },
    };
  }

  const [first, ...others] = messages;
  const system = first?.role === 'system' ? first : undefined;
  const history = system ? others : [...messages];

  let total = system ? estimateMessageTokens(system) : 0;
  let start = history.length;
  for (let i = history.length - 1; i >= 0; i--) {
    const message = history[i];
    if (message === undefined) break;
    const tokens = estimateMessageTokens(message);
    if (total + tokens > cap) break;
    total += tokens;
    start = i;
  }

  let kept = history.slice(start);
  while (kept[0]?.role === 'tool') {
    const orphan = kept[0];
    total -= estimateMessageTokens(orphan);
    kept = kept.slice(1);
  }

  const result = system ? [system, ...kept] : kept;
  return {
    messages: result,
    report: {
      requestedCap: cap,
      actualTokens: total,
      originalTokens,
      droppedMessages: messages.length - result.length,
      trimmed: true,
    },
  };
}
