import OpenAI from 'openai';
import type { CapturedImage } from './vision.types.js';
import type { VisionProvider } from './vision.router.js';

export type OpenAIVisionConfig = {
  apiKey?: string;
  model: string;
  maxTokens: number;
  timeoutMs: number;
};

export class OpenAIVisionClient implements VisionProvider {
  readonly name = 'openai';
  private readonly client?: OpenAI;
  private readonly config: OpenAIVisionConfig;

  constructor(config: OpenAIVisionConfig) {
    this.config = config;
    if (config.apiKey) {
      // retries are decided by the router
      this.client = new OpenAI({ apiKey: config.apiKey, timeout: config.timeoutMs, maxRetries: 0 });
    }
  }

  isReady(): boolean {
    return Boolean(this.client);
  }

  async describe(image: CapturedImage, prompt: string): Promise<string> {
    if (!this.client) {
      throw new Error('OpenAI API key missing');
    }
    const response = await this.client.chat.completions.create({
      model: this.config.model,
      max_tokens: this.config.maxTokens,
      messages: [
        {
          role: 'user',
          content: [
            { type: 'text', text: prompt },
            {
              type: 'image_url',
              image_url: { url: `data:${image.mime};base64,${image.data.toString('base64')}` }
            }
          ]
        }
      ]
    });
    return (response.choices[0]?.message?.content ?? '').trim();
  }
}
