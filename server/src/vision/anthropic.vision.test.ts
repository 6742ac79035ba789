import { beforeEach, describe, expect, it, vi } from 'vitest';
import { AnthropicVisionClient } from './anthropic.vision.js';
import { JPEG_BYTES } from '../test_support/stubs.js';

const create = vi.hoisted(() => vi.fn());

vi.mock('@anthropic-ai/sdk', () => ({
  default: class {
    messages = { create };
  }
}));

const config = { model: 'claude-3-5-sonnet-latest', maxTokens: 300, timeoutMs: 1000 };
const image = { data: JPEG_BYTES, mime: 'image/jpeg' as const, capturedAt: 1 };

describe('AnthropicVisionClient', () => {
  beforeEach(() => {
    create.mockReset();
  });

  it('is not ready without an API key', async () => {
    const client = new AnthropicVisionClient(config);

    expect(client.isReady()).toBe(false);
    await expect(client.describe(image, 'prompt')).rejects.toThrow('Anthropic API key missing');
    expect(create).not.toHaveBeenCalled();
  });

  it('sends the prompt with a base64 image block', async () => {
    create.mockResolvedValue({ content: [{ type: 'text', text: '  I can see a mug  ' }] });
    const client = new AnthropicVisionClient({ ...config, apiKey: 'test-secret' });

    await expect(client.describe(image, 'Describe it.')).resolves.toBe('I can see a mug');

    expect(create).toHaveBeenCalledWith({
      model: 'claude-3-5-sonnet-latest',
      max_tokens: 300,
      messages: [
        {
          role: 'user',
          content: [
            { type: 'text', text: 'Describe it.' },
            {
              type: 'image',
              source: { type: 'base64', media_type: 'image/jpeg', data: JPEG_BYTES.toString('base64') }
            }
          ]
        }
      ]
    });
  });

  it('keeps only text blocks from the reply', async () => {
    create.mockResolvedValue({
      content: [
        { type: 'text', text: 'I can see a desk.' },
        { type: 'tool_use', id: 'tool-1', name: 'noop', input: {} },
        { type: 'text', text: 'There is a lamp on it.' }
      ]
    });
    const client = new AnthropicVisionClient({ ...config, apiKey: 'test-secret' });

    await expect(client.describe(image, 'prompt')).resolves.toBe('I can see a desk.\nThere is a lamp on it.');
  });
});
