import { loadEnv } from './load_env.js';
import { loadConfig } from './config.js';
import { createLogger } from './logger.js';
import { buildApp } from './app.js';
import { EventLog, attachEventLog } from './events/event_log.js';
import { HttpSpeechBridge } from './speech/speech_bridge.js';
import { FfmpegImageSource } from './vision/image_source_ffmpeg.js';
import { AnthropicVisionClient } from './vision/anthropic.vision.js';
import { GeminiVisionClient } from './vision/gemini.vision.js';
import { OpenAIVisionClient } from './vision/openai.vision.js';
import { VisionRouter, orderProviders } from './vision/vision.router.js';
import { VisionSystem } from './vision/vision.system.js';
import { createWsHub } from './ws/hub.js';

async function boot() {
  const envPath = loadEnv();
  const { config, logLevel, sourcePath } = loadConfig();
  const logger = createLogger(logLevel);

  if (envPath) logger.info({ envPath }, 'Loaded environment file');
  if (!sourcePath) logger.warn('Config file not found, using defaults');

  const { analyzer } = config;
  const providers = orderProviders(analyzer.providers, [
    new GeminiVisionClient({ ...analyzer.gemini, timeoutMs: analyzer.timeoutMs }),
    new OpenAIVisionClient({ ...analyzer.openai, timeoutMs: analyzer.timeoutMs }),
    new AnthropicVisionClient({ ...analyzer.claude, timeoutMs: analyzer.timeoutMs })
  ]);
  const router = new VisionRouter(providers, { maxRetries: analyzer.maxRetries, logger });
  if (!router.isReady()) {
    logger.error('No vision provider has an API key; analysis requests will fail');
  }

  const vision = new VisionSystem({
    source: new FfmpegImageSource(config.camera, logger),
    analyzer: router,
    speech: new HttpSpeechBridge(config.speech),
    settings: {
      intervalSeconds: config.vision.intervalSeconds,
      firstPerson: config.vision.firstPerson,
      speechEnabled: config.speech.enabled
    },
    logger
  });

  const events = config.events.enabled ? new EventLog(config.events.path) : null;
  if (events) {
    attachEventLog(vision, events, logger);
  }

  const app = await buildApp({ vision, config, events, logger });
  const hub = createWsHub({ server: app.server, path: config.server.wsPath, vision, logger });

  const shutdown = async (signal: string) => {
    logger.info({ signal }, 'Shutting down');
    await hub.close();
    await vision.close();
    await app.close();
    process.exit(0);
  };
  for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.once(signal, () => {
      shutdown(signal).catch((error: unknown) => {
        logger.error({ err: error }, 'Shutdown failed');
        process.exit(1);
      });
    });
  }

  await app.listen({ port: config.server.port, host: config.server.host });
  logger.info(
    { providers: router.readyProviders(), camera: config.camera.device, speech: config.speech.enabled },
    `Camera vision service listening on :${config.server.port}`
  );
}

boot().catch((error) => {
  console.error('Fatal boot error', error);
  process.exit(1);
});
