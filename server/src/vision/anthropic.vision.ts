import Anthropic from '@anthropic-ai/sdk';
import type { CapturedImage } from './vision.types.js';
import type { VisionProvider } from './vision.router.js';

export type AnthropicVisionConfig = {
  apiKey?: string;
  model: string;
  maxTokens: number;
  timeoutMs: number;
};

export class AnthropicVisionClient implements VisionProvider {
  readonly name = 'claude';
  private readonly client?: Anthropic;
  private readonly config: AnthropicVisionConfig;

  constructor(config: AnthropicVisionConfig) {
    this.config = config;
    if (config.apiKey) {
      // retries are decided by the router
      this.client = new Anthropic({ apiKey: config.apiKey, timeout: config.timeoutMs, maxRetries: 0 });
    }
  }

  isReady(): boolean {
    return Boolean(this.client);
  }

  async describe(image: CapturedImage, prompt: string): Promise<string> {
    if (!this.client) {
      throw new Error('Anthropic API key missing');
    }
    const message = await this.client.messages.create({
      model: this.config.model,
      max_tokens: this.config.maxTokens,
      messages: [
        {
          role: 'user',
          content: [
            { type: 'text', text: prompt },
            {
              type: 'image',
              source: { type: 'base64', media_type: image.mime, data: image.data.toString('base64') }
            }
          ]
        }
      ]
    });
    const texts: string[] = [];
    for (const block of message.content) {
      if (block.type === 'text') texts.push(block.text);
    }
    return texts.join('\n').trim();
  }
}
