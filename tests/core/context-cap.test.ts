/**
 * Context Cap Tests
 */

import { describe, it, expect } from 'vitest';
import { defaultConfig } from '../../src/config/schema.js';
import {
  capMessages,
  estimateMessageTokens,
  estimateTotalTokens,
  softCapFor,
} from '../../src/core/context-cap.js';
import type { Message } from '../../src/types.js';

const contextConfig = defaultConfig().context;

function createMockMessage(role: Message['role'], chars: number, fill = 'x'): Message {
  return { role, content: fill.repeat(chars) };
}

// =============================================================================
// SOFT CAP
// =============================================================================

describe('softCapFor', () => {
  it('should use the default cap for unlisted models', () => {
    expect(softCapFor('anthropic/claude-sonnet-4.6', 'user', contextConfig)).toBe(200_000);
  });

  it('should use the first matching low-throughput prefix', () => {
    expect(softCapFor('google/gemini-x', 'user', contextConfig)).toBe(4096);
    expect(softCapFor('qwen/qwen3.5-plus-02-15', 'user', contextConfig)).toBe(8192);
  });

  it('should take the stricter cap for evolution tasks', () => {
    expect(softCapFor('google/gemini-x', 'evolution', contextConfig)).toBe(4096);
    expect(softCapFor('qwen/qwen3.5-plus-02-15', 'evolution', contextConfig)).toBe(4096);
    expect(softCapFor('openai/o3', 'evolution', contextConfig)).toBe(4096);
  });

  it('should honour configured prefixes in order', () => {
    const config = { ...contextConfig, lowThroughputCaps: [{ prefix: 'a/', cap: 100 }, { prefix: 'a/b', cap: 50 }] };
    expect(softCapFor('a/b-model', 'user', config)).toBe(100);
  });
});

// =============================================================================
// ESTIMATION
// =============================================================================

describe('estimateMessageTokens', () => {
  it('should count a quarter token per character, rounded up', () => {
    expect(estimateMessageTokens(createMockMessage('user', 9))).toBe(3);
  });

  it('should count tool call names and arguments', () => {
    const message: Message = {
      role: 'assistant',
      content: null,
      tool_calls: [{ id: 'c1', type: 'function', function: { name: 'repo_read', arguments: '{"path":"a"}' } }],
    };
    expect(estimateMessageTokens(message)).toBe(6);
  });

  it('should count text blocks and skip images', () => {
    const message: Message = {
      role: 'user',
      content: [
        { type: 'text', text: 'abcd' },
        { type: 'image_url', image_url: { url: 'data:image/png;base64,' + 'A'.repeat(4000) } },
      ],
    };
    expect(estimateMessageTokens(message)).toBe(1);
  });
});

// =============================================================================
// CAPPING
// =============================================================================

describe('capMessages', () => {
  it('should leave a history under the cap untouched', () => {
    const messages = [createMockMessage('system', 40), createMockMessage('user', 40)];
    const result = capMessages(messages, 100);

    expect(result.messages).toEqual(messages);
    expect(result.report).toEqual({
      requestedCap: 100,
      actualTokens: 20,
      originalTokens: 20,
      droppedMessages: 0,
      trimmed: false,
    });
  });

  it('should keep the system message and the newest turns that fit', () => {
    const system = createMockMessage('system', 40, 's');
    const newest = createMockMessage('user', 40, 'v');
    const messages = [
      system,
      createMockMessage('user', 40, 'u'),
      createMockMessage('assistant', 40, 'a'),
      createMockMessage('tool', 40, 't'),
      newest,
    ];

    const result = capMessages(messages, 30);

    // The tool response fits but loses its assistant call, so it goes too.
    expect(result.messages).toEqual([system, newest]);
    expect(result.report).toEqual({
      requestedCap: 30,
      actualTokens: 20,
      originalTokens: 50,
      droppedMessages: 3,
      trimmed: true,
    });
  });

  it('should stop at the first message that does not fit', () => {
    const messages = [
      createMockMessage('system', 40),
      createMockMessage('user', 8),
      createMockMessage('assistant', 400),
      createMockMessage('user', 40),
    ];

    const result = capMessages(messages, 30);

    expect(result.messages.map((m) => m.role)).toEqual(['system', 'user']);
    expect(result.messages[1]).toBe(messages[3]);
  });

  it('should trim a history of twice the evolution cap for a low-throughput model', () => {
    const cap = softCapFor('google/gemini-x', 'evolution', contextConfig);
    const messages: Message[] = [createMockMessage('system', 400)];
    for (let i = 0; i < 20; i++) {
      messages.push(createMockMessage(i % 2 === 0 ? 'user' : 'assistant', 1600));
    }
    expect(estimateTotalTokens(messages)).toBe(8100);

    const result = capMessages(messages, cap);

    expect(result.messages[0]).toBe(messages[0]);
    expect(result.messages).toHaveLength(10);
    expect(result.report.actualTokens).toBe(3700);
    expect(result.report.actualTokens).toBeLessThanOrEqual(cap);
    expect(result.report.droppedMessages).toBe(11);
    expect(estimateTotalTokens(result.messages)).toBe(result.report.actualTokens);
  });

  it('should cap histories without a system message', () => {
    const messages = [createMockMessage('user', 40), createMockMessage('assistant', 40)];
    const result = capMessages(messages, 10);

    expect(result.messages).toEqual([messages[1]]);
    expect(result.report.droppedMessages).toBe(1);
  });
});
