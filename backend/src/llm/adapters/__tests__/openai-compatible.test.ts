import { describe, it, expect } from 'vitest';
import { OpenAICompatibleAdapter } from '../openai-compatible';
import { LLMError } from '../../types';

const adapter = new OpenAICompatibleAdapter({
  id: 'together',
  baseUrl: 'https://together.example.test/v1',
  apiKey: 'test-key',
});

describe('OpenAICompatibleAdapter', () => {
  it('omits the system message and optional fields when not provided', () => {
    const request = adapter.buildRequest({
      provider: 'together',
      model: 'm',
      systemPrompt: '',
      messages: [
        { role: 'user', content: 'a' },
        { role: 'assistant', content: 'b' },
      ],
    });

    expect(request.url).toBe('https://together.example.test/v1/chat/completions');
    expect(request.body).toEqual({
      model: 'm',
      messages: [
        { role: 'user', content: 'a' },
        { role: 'assistant', content: 'b' },
      ],
    });
  });

  it('maps a length finish reason and tolerates missing usage', () => {
    const response = adapter.parseResponse({
      choices: [{ message: { content: null }, finish_reason: 'length' }],
    });

    expect(response).toEqual({
      provider: 'together',
      text: '',
      finishReason: 'max_tokens',
      usage: { inputTokens: 0, outputTokens: 0, totalTokens: 0 },
    });
  });

  it('rejects bodies without choices', () => {
    expect(() => adapter.parseResponse({ choices: [] })).toThrow(LLMError);
  });

  it('converts error bodies into LLMErrors', () => {
    const structured = adapter.convertError(429, { error: { message: 'rate limited', type: 'requests' } });
    expect(structured).toMatchObject({ message: 'rate limited', statusCode: 429, retryable: true, provider: 'together' });

    const plain = adapter.convertError(401, { error: 'invalid key' });
    expect(plain).toMatchObject({ message: 'invalid key', statusCode: 401, retryable: false });

    const text = adapter.convertError(502, 'Bad Gateway');
    expect(text.message).toBe('together API error (HTTP 502): Bad Gateway');
    expect(text.retryable).toBe(true);
  });
});
