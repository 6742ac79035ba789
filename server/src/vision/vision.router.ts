import type { Logger } from 'pino';
import { AnalysisError, errorMessage } from './errors.js';
import type { CapturedImage, Inference, VisionAnalyzer } from './vision.types.js';

export interface VisionProvider {
  readonly name: string;
  isReady(): boolean;
  describe(image: CapturedImage, prompt: string): Promise<string>;
}

export type VisionRouterOptions = {
  // extra attempts per provider after the first one fails
  maxRetries: number;
  logger: Logger;
};

/**
 * Tries each ready provider in priority order and returns the first
 * non-empty description.
 */
export class VisionRouter implements VisionAnalyzer {
  private readonly providers: VisionProvider[];
  private readonly maxRetries: number;
  private readonly log: Logger;

  constructor(providers: VisionProvider[], options: VisionRouterOptions) {
    this.providers = providers;
    this.maxRetries = Math.max(0, Math.floor(options.maxRetries));
    this.log = options.logger.child({ component: 'vision-router' });
  }

  isReady(): boolean {
    return this.providers.some((provider) => provider.isReady());
  }

  readyProviders(): string[] {
    return this.providers.filter((provider) => provider.isReady()).map((provider) => provider.name);
  }

  async infer(image: CapturedImage, prompt: string): Promise<Inference> {
    const ready = this.providers.filter((provider) => provider.isReady());
    if (ready.length === 0) {
      throw new AnalysisError('no_provider', 'No vision provider is configured (missing API keys)');
    }

    const failures: string[] = [];
    for (const provider of ready) {
      for (let attempt = 0; attempt <= this.maxRetries; attempt += 1) {
        try {
          const text = (await provider.describe(image, prompt)).trim();
          if (text) {
            this.log.info({ provider: provider.name, attempt }, 'Vision provider succeeded');
            return { text, provider: provider.name };
          }
          failures.push(`${provider.name}: empty response`);
        } catch (error) {
          failures.push(`${provider.name}: ${errorMessage(error)}`);
          this.log.warn({ provider: provider.name, attempt, err: error }, 'Vision provider failed');
        }
      }
      this.log.info({ provider: provider.name }, 'Vision provider exhausted, trying next');
    }

    throw new AnalysisError('all_providers_failed', `All vision providers failed. ${failures.join('; ')}`);
  }
}

export function orderProviders(order: string[], available: VisionProvider[]): VisionProvider[] {
  const byName = new Map(available.map((provider) => [provider.name, provider]));
  const ordered: VisionProvider[] = [];
  for (const raw of order) {
    const provider = byName.get(raw.trim().toLowerCase());
    if (provider && !ordered.includes(provider)) {
      ordered.push(provider);
    }
  }
  return ordered;
}
