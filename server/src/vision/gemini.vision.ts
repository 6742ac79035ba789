import { GoogleGenerativeAI } from '@google/generative-ai';
import type { CapturedImage } from './vision.types.js';
import type { VisionProvider } from './vision.router.js';

export type GeminiVisionConfig = {
  apiKey?: string;
  model: string;
  maxOutputTokens: number;
  temperature: number;
  timeoutMs: number;
};

export class GeminiVisionClient implements VisionProvider {
  readonly name = 'gemini';
  private readonly client?: GoogleGenerativeAI;
  private readonly config: GeminiVisionConfig;

  constructor(config: GeminiVisionConfig) {
    this.config = config;
    if (config.apiKey) {
      this.client = new GoogleGenerativeAI(config.apiKey);
    }
  }

  isReady(): boolean {
    return Boolean(this.client);
  }

  async describe(image: CapturedImage, prompt: string): Promise<string> {
    if (!this.client) {
      throw new Error('Gemini API key missing');
    }
    const model = this.client.getGenerativeModel(
      {
        model: this.config.model,
        generationConfig: {
          maxOutputTokens: this.config.maxOutputTokens,
          temperature: this.config.temperature
        }
      },
      { timeout: this.config.timeoutMs }
    );
    const result = await model.generateContent([
      { text: prompt },
      { inlineData: { data: image.data.toString('base64'), mimeType: image.mime } }
    ]);
    return result.response.text().trim();
  }
}
