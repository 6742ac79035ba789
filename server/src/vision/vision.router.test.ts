import { describe, expect, it } from 'vitest';
import { AnalysisError } from './errors.js';
import { VisionRouter, orderProviders, type VisionProvider } from './vision.router.js';
import type { CapturedImage } from './vision.types.js';
import { JPEG_BYTES, silentLogger } from '../test_support/stubs.js';

const image: CapturedImage = { data: JPEG_BYTES, mime: 'image/jpeg', capturedAt: 1 };

class FakeProvider implements VisionProvider {
  calls = 0;

  constructor(
    readonly name: string,
    private readonly replies: Array<string | Error>,
    private readonly ready = true
  ) {}

  isReady(): boolean {
    return this.ready;
  }

  async describe(): Promise<string> {
    const reply = this.replies[Math.min(this.calls, this.replies.length - 1)];
    this.calls += 1;
    if (reply instanceof Error) throw reply;
    return reply;
  }
}

describe('VisionRouter', () => {
  it('returns the first provider that answers', async () => {
    const gemini = new FakeProvider('gemini', ['  a desk with a lamp  ']);
    const openai = new FakeProvider('openai', ['unused']);
    const router = new VisionRouter([gemini, openai], { maxRetries: 0, logger: silentLogger() });

    await expect(router.infer(image, 'prompt')).resolves.toEqual({ text: 'a desk with a lamp', provider: 'gemini' });
    expect(openai.calls).toBe(0);
  });

  it('falls back to the next provider on failure or empty text', async () => {
    const gemini = new FakeProvider('gemini', [new Error('429 Too Many Requests')]);
    const blank = new FakeProvider('blank', ['   ']);
    const openai = new FakeProvider('openai', ['a cat on a sofa']);
    const router = new VisionRouter([gemini, blank, openai], { maxRetries: 0, logger: silentLogger() });

    await expect(router.infer(image, 'prompt')).resolves.toEqual({ text: 'a cat on a sofa', provider: 'openai' });
  });

  it('reaches claude when gemini and openai both fail', async () => {
    const gemini = new FakeProvider('gemini', [new Error('503 Service Unavailable')]);
    const openai = new FakeProvider('openai', [new Error('invalid_api_key')]);
    const claude = new FakeProvider('claude', ['I can see a bookshelf']);
    const router = new VisionRouter(orderProviders(['gemini', 'openai', 'claude'], [claude, openai, gemini]), {
      maxRetries: 0,
      logger: silentLogger()
    });

    await expect(router.infer(image, 'prompt')).resolves.toEqual({ text: 'I can see a bookshelf', provider: 'claude' });
    expect([gemini.calls, openai.calls, claude.calls]).toEqual([1, 1, 1]);
  });

  it('retries a provider before moving on', async () => {
    const gemini = new FakeProvider('gemini', [new Error('timeout'), 'second try worked']);
    const router = new VisionRouter([gemini], { maxRetries: 1, logger: silentLogger() });

    await expect(router.infer(image, 'prompt')).resolves.toEqual({ text: 'second try worked', provider: 'gemini' });
    expect(gemini.calls).toBe(2);
  });

  it('skips providers that are not ready', async () => {
    const gemini = new FakeProvider('gemini', ['never'], false);
    const openai = new FakeProvider('openai', ['a window']);
    const router = new VisionRouter([gemini, openai], { maxRetries: 0, logger: silentLogger() });

    expect(router.readyProviders()).toEqual(['openai']);
    await expect(router.infer(image, 'prompt')).resolves.toMatchObject({ provider: 'openai' });
    expect(gemini.calls).toBe(0);
  });

  it('fails with no_provider when nothing is configured', async () => {
    const router = new VisionRouter([new FakeProvider('gemini', ['x'], false)], {
      maxRetries: 0,
      logger: silentLogger()
    });

    expect(router.isReady()).toBe(false);
    await expect(router.infer(image, 'prompt')).rejects.toMatchObject({
      code: 'no_provider',
      message: 'No vision provider is configured (missing API keys)'
    });
  });

  it('lists every failure when all providers fail', async () => {
    const gemini = new FakeProvider('gemini', [new Error('401 Unauthorized')]);
    const openai = new FakeProvider('openai', ['']);
    const router = new VisionRouter([gemini, openai], { maxRetries: 0, logger: silentLogger() });

    const failure = router.infer(image, 'prompt');

    await expect(failure).rejects.toBeInstanceOf(AnalysisError);
    await expect(failure).rejects.toMatchObject({
      code: 'all_providers_failed',
      message: 'All vision providers failed. gemini: 401 Unauthorized; openai: empty response'
    });
  });
});

describe('orderProviders', () => {
  it('orders by name, ignoring case, unknown names and duplicates', () => {
    const gemini = new FakeProvider('gemini', ['g']);
    const openai = new FakeProvider('openai', ['o']);

    const ordered = orderProviders([' OpenAI', 'llava', 'gemini', 'openai'], [gemini, openai]);

    expect(ordered.map((provider) => provider.name)).toEqual(['openai', 'gemini']);
  });

  it('leaves out providers that are not named', () => {
    const gemini = new FakeProvider('gemini', ['g']);
    const openai = new FakeProvider('openai', ['o']);

    expect(orderProviders(['gemini'], [gemini, openai])).toEqual([gemini]);
  });
});
