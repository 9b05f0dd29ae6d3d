import { describe, it, expect, beforeEach, vi } from 'vitest';
import { OpenAIClassificationProvider } from '../../src/providers/OpenAIClassificationProvider.js';
import { AIProviderError } from '../../src/errors.js';

const { create, clientOptions } = vi.hoisted(() => ({
  create: vi.fn(),
  clientOptions: [] as unknown[],
}));

vi.mock('openai', () => ({
  default: class {
    chat = { completions: { create } };
    constructor(options: unknown) {
      clientOptions.push(options);
    }
  },
}));

function completion(content: string | null) {
  return { choices: [{ message: { content }, finish_reason: 'stop' }] };
}

describe('OpenAIClassificationProvider', () => {
  let provider: OpenAIClassificationProvider;

  beforeEach(() => {
    create.mockReset();
    clientOptions.length = 0;
    provider = new OpenAIClassificationProvider({ apiKey: 'test-key' });
  });

  it('should disable SDK retries', () => {
    expect(clientOptions[0]).toEqual({ apiKey: 'test-key', baseURL: undefined, maxRetries: 0 });
  });

  it('should send the prompt as system message and the item as user message', async () => {
    create.mockResolvedValueOnce(completion('{"taxonomy":"non_intelligence"}'));
    const controller = new AbortController();

    const reply = await provider.complete({
      prompt: 'Classify.',
      text: 'Item text',
      signal: controller.signal,
    });

    expect(reply).toBe('{"taxonomy":"non_intelligence"}');
    expect(create).toHaveBeenCalledWith(
      {
        model: 'gpt-4o-mini',
        temperature: 0,
        response_format: { type: 'json_object' },
        messages: [
          { role: 'system', content: 'Classify.' },
          { role: 'user', content: 'Item text' },
        ],
      },
      { signal: controller.signal }
    );
  });

  it('should honour a per-request model', async () => {
    create.mockResolvedValueOnce(completion('{}'));
    await provider.complete({ prompt: 'p', text: 't', model: 'gpt-4o' });

    expect(create.mock.calls[0][0].model).toBe('gpt-4o');
  });

  it('should wrap SDK failures in AIProviderError and flag rate limits', async () => {
    create.mockRejectedValueOnce(Object.assign(new Error('Too many requests'), { status: 429 }));

    const err = await provider.complete({ prompt: 'p', text: 't' }).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(AIProviderError);
    expect(err instanceof AIProviderError && err.message).toBe('AI request failed: Too many requests');
    expect(err instanceof AIProviderError && err.details).toEqual({
      provider: 'openai',
      model: 'gpt-4o-mini',
      status: 429,
      rateLimited: true,
    });
  });

  it('should report an aborted request as a timeout', async () => {
    const controller = new AbortController();
    controller.abort();
    create.mockRejectedValueOnce(new Error('Request was aborted.'));

    await expect(
      provider.complete({ prompt: 'p', text: 't', signal: controller.signal })
    ).rejects.toThrow('AI request aborted');
  });

  it('should reject an empty reply', async () => {
    create.mockResolvedValueOnce(completion(null));

    await expect(provider.complete({ prompt: 'p', text: 't' })).rejects.toThrow(
      'AI reply was empty'
    );
  });

  it('should record a custom provider name', () => {
    const local = new OpenAIClassificationProvider({
      apiKey: 'test-key',
      baseURL: 'http://localhost:11434/v1',
      name: 'ollama',
      model: 'qwen2.5',
    });
    expect(local.name).toBe('ollama');
    expect(local.model).toBe('qwen2.5');
  });
});
