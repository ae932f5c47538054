/**
 * Anthropic backend with a mocked SDK client
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';
import { AnthropicBackend } from '../../../src/llm-engine/anthropic-backend.js';
import { BackendTransportError } from '../../../src/shared/errors.js';
import type { GenerationRequest } from '../../../src/shared/types/llm.js';

const { createMock } = vi.hoisted(() => ({ createMock: vi.fn() }));

vi.mock('@anthropic-ai/sdk', () => {
  return {
    default: class MockAnthropic {
      messages = {
        create: createMock,
      };
    },
  };
});

const request: GenerationRequest = {
  model: 'test-model',
  systemPrompt: 'You are helpful.',
  userPrompt: 'Hello?',
  params: { temperature: 0.7, maxTokens: 500 },
};

describe('AnthropicBackend', () => {
  let backend: AnthropicBackend;

  beforeEach(() => {
    createMock.mockReset();
    backend = new AnthropicBackend({ apiKey: 'test-secret' });
  });

  it('passes the system prompt separately and joins text blocks', async () => {
    createMock.mockResolvedValue({
      content: [
        { type: 'text', text: 'Hello' },
        { type: 'tool_use', id: 'tool_1', name: 'lookup', input: {} },
        { type: 'text', text: ' world' },
      ],
    });

    await expect(backend.generate(request)).resolves.toBe('Hello world');
    expect(createMock).toHaveBeenCalledWith({
      model: 'test-model',
      max_tokens: 500,
      temperature: 0.7,
      system: 'You are helpful.',
      messages: [{ role: 'user', content: 'Hello?' }],
    });
  });

  it('wraps SDK failures in a transport error', async () => {
    createMock.mockRejectedValue(new Error('overloaded'));

    const failure = backend.generate(request);
    await expect(failure).rejects.toBeInstanceOf(BackendTransportError);
    await expect(failure).rejects.toThrow('anthropic request failed: overloaded');
  });

  it('treats a reply without text as a failure', async () => {
    createMock.mockResolvedValue({ content: [] });

    await expect(backend.generate(request)).rejects.toThrow('anthropic request failed: response contained no text');
  });
});
