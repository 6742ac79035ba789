import Fastify, { type FastifyError } from 'fastify';
import swagger from '@fastify/swagger';
import swaggerUI from '@fastify/swagger-ui';
import type { Logger } from 'pino';
import { z } from 'zod';
import { publicConfig, type AppConfig } from './config.js';
import type { EventLog } from './events/event_log.js';
import { toErrorBody, toSettingsBody, toStatusBody } from './serialize.js';
import { isJpeg } from './vision/image_source_ffmpeg.js';
import { NotRunningError, VisionError, type VisionErrorKind } from './vision/errors.js';
import type { CapturedImage, ImageMime } from './vision/vision.types.js';
import { MAX_INTERVAL_SECONDS, type VisionSystem } from './vision/vision.system.js';

const ImageMimes = ['image/jpeg', 'image/png'] as const;

const AnalyzeBodySchema = z.object({
  image_base64: z.string(),
  mime: z.enum(ImageMimes).optional()
});

const StartLoopBodySchema = z
  .object({
    interval: z.number().max(MAX_INTERVAL_SECONDS).optional()
  })
  .nullish();

const ConfigBodySchema = z
  .object({
    interval: z.number().positive().max(MAX_INTERVAL_SECONDS).optional(),
    first_person: z.boolean().optional(),
    speech_enabled: z.boolean().optional()
  })
  .strict();

const CaptureQuerySchema = z.object({
  format: z.enum(['jpeg', 'json']).default('jpeg')
});

const EventsQuerySchema = z
  .object({
    limit: z.coerce.number().int().min(1).max(200).default(20),
    from: z.string().datetime({ offset: true }).optional(),
    to: z.string().datetime({ offset: true }).optional()
  })
  .refine((query) => !query.from || !query.to || Date.parse(query.from) <= Date.parse(query.to), {
    message: 'from must not be after to'
  });

const STATUS_BY_KIND: Record<VisionErrorKind, number> = {
  CaptureError: 503,
  AnalysisError: 502,
  AlreadyRunningError: 409,
  NotRunningError: 409,
  NotificationError: 502,
  InvalidIntervalError: 400
};

const PNG_SIGNATURE = [0x89, 0x50, 0x4e, 0x47];

const errorSchema = {
  type: 'object',
  properties: {
    kind: { type: 'string' },
    code: { type: 'string' },
    message: { type: 'string' },
    at: { type: 'number' }
  }
} as const;

const descriptionReply = {
  200: {
    type: 'object',
    properties: { description: { type: 'string' } }
  }
} as const;

export type BuildAppOptions = {
  vision: VisionSystem;
  config: AppConfig;
  events: EventLog | null;
  logger: Logger;
};

export async function buildApp(options: BuildAppOptions) {
  const { vision, config, events } = options;
  const app = Fastify({ logger: options.logger, bodyLimit: 10 * 1024 * 1024 });

  await app.register(swagger, {
    openapi: {
      info: {
        title: 'Camera Vision API',
        description: 'Camera capture and scene description with a continuous vision loop',
        version: '0.1.0'
      }
    }
  });
  await app.register(swaggerUI, { routePrefix: '/docs' });

  app.addContentTypeParser([...ImageMimes], { parseAs: 'buffer' }, (_request, body, done) => {
    done(null, body);
  });

  app.setErrorHandler((error: FastifyError, request, reply) => {
    if (error instanceof VisionError) {
      const statusCode = STATUS_BY_KIND[error.kind];
      request.log.warn({ err: error }, 'vision request failed');
      reply.code(statusCode).send({ error: error.code, message: error.message });
      return;
    }
    const statusCode = error.statusCode ?? 500;
    if (statusCode >= 500) {
      request.log.error({ err: error }, 'request failed');
    }
    reply.code(statusCode).send({
      error: statusCode >= 500 ? 'internal_error' : error.code ?? 'bad_request',
      message: error.message
    });
  });

  app.get('/health', {
    schema: {
      description: 'Service health and collaborator readiness',
      response: {
        200: {
          type: 'object',
          properties: {
            ok: { type: 'boolean' },
            analyzer_ready: { type: 'boolean' },
            speech_enabled: { type: 'boolean' },
            interval: { type: 'number', nullable: true },
            tick_count: { type: 'number' },
            capturing: { type: 'boolean' },
            last_notification_error: { ...errorSchema, nullable: true }
          }
        }
      }
    }
  }, async () => {
    const status = vision.getStatus();
    return {
      ok: true,
      analyzer_ready: vision.analyzerReady(),
      speech_enabled: vision.getSettings().speechEnabled,
      interval: status.intervalSeconds,
      tick_count: status.tickCount,
      capturing: status.capturing,
      last_notification_error: toErrorBody(status.lastNotificationError)
    };
  });

  app.get('/status', {
    schema: {
      description: 'Continuous loop state, last description and last error',
      response: {
        200: {
          type: 'object',
          properties: {
            loop_state: { type: 'string', enum: ['stopped', 'running'] },
            last_description: { type: 'string', nullable: true },
            last_error: { ...errorSchema, nullable: true }
          }
        }
      }
    }
  }, async () => toStatusBody(vision.getStatus()));

  app.get('/capture', {
    schema: {
      description: 'Capture the current camera frame (JPEG bytes, or a data URL with format=json)',
      querystring: {
        type: 'object',
        properties: { format: { type: 'string', enum: ['jpeg', 'json'] } }
      }
    }
  }, async (request, reply) => {
    const query = CaptureQuerySchema.safeParse(request.query);
    if (!query.success) {
      reply.code(400).send({ error: 'invalid_query', message: 'format must be jpeg or json' });
      return;
    }
    const image = await vision.captureImage();
    if (query.data.format === 'json') {
      return {
        image: `data:${image.mime};base64,${image.data.toString('base64')}`,
        timestamp: Math.floor(image.capturedAt / 1000)
      };
    }
    reply.type(image.mime).send(image.data);
  });

  app.post('/analyze', {
    schema: {
      description: 'Describe a supplied image: JSON {image_base64, mime?} or a raw image/jpeg or image/png body',
      response: descriptionReply
    }
  }, async (request, reply) => {
    const parsed = parseImagePayload(request.headers['content-type'], request.body);
    if ('error' in parsed) {
      reply.code(400).send(parsed);
      return;
    }
    const description = await vision.analyzeImage(parsed.image);
    return { description: description.text };
  });

  app.get('/describe', {
    schema: {
      description: 'Capture and describe the current view (spoken when speech is enabled)',
      response: descriptionReply
    }
  }, async () => {
    const description = await vision.describeCurrentView({ speak: true, source: 'on_demand' });
    return { description: description.text };
  });

  app.post('/start_loop', {
    schema: {
      description: 'Start the continuous vision loop; interval in seconds, defaults to the configured one',
      response: {
        200: { type: 'object', properties: { status: { type: 'string' } } }
      }
    }
  }, async (request, reply) => {
    const body = StartLoopBodySchema.safeParse(request.body);
    if (!body.success) {
      reply.code(400).send({
        error: 'invalid_payload',
        message: `interval must be a number of seconds, at most ${MAX_INTERVAL_SECONDS}`
      });
      return;
    }
    vision.startContinuousVision(body.data?.interval);
    return { status: 'started' };
  });

  app.post('/stop_loop', {
    schema: {
      description: 'Stop the continuous vision loop (succeeds when already stopped)',
      response: {
        200: { type: 'object', properties: { status: { type: 'string' } } }
      }
    }
  }, async () => {
    try {
      vision.stopContinuousVision();
    } catch (error) {
      if (!(error instanceof NotRunningError)) throw error;
    }
    return { status: 'stopped' };
  });

  app.get('/config', {
    schema: { description: 'Runtime settings and configuration without credentials' }
  }, async () => ({
    settings: toSettingsBody(vision.getSettings()),
    ...publicConfig(config)
  }));

  app.post('/config', {
    schema: { description: 'Update interval, first_person and speech_enabled settings' }
  }, async (request, reply) => {
    const body = ConfigBodySchema.safeParse(request.body ?? {});
    if (!body.success) {
      reply.code(400).send({ error: 'invalid_payload', message: body.error.issues[0]?.message ?? 'invalid body' });
      return;
    }
    const { interval, first_person, speech_enabled } = body.data;
    if (interval === undefined && first_person === undefined && speech_enabled === undefined) {
      reply.code(400).send({ error: 'invalid_payload', message: 'No configuration data provided' });
      return;
    }
    const settings = vision.updateSettings({
      ...(interval !== undefined ? { intervalSeconds: interval } : {}),
      ...(first_person !== undefined ? { firstPerson: first_person } : {}),
      ...(speech_enabled !== undefined ? { speechEnabled: speech_enabled } : {})
    });
    return { status: 'updated', settings: toSettingsBody(settings) };
  });

  app.get('/events', {
    schema: {
      description: 'Most recent vision events from the event log, optionally within a from/to ISO time range',
      querystring: {
        type: 'object',
        properties: {
          limit: { type: 'integer', minimum: 1, maximum: 200 },
          from: { type: 'string' },
          to: { type: 'string' }
        }
      }
    }
  }, async (request, reply) => {
    const query = EventsQuerySchema.safeParse(request.query);
    if (!query.success) {
      reply.code(400).send({ error: 'invalid_query', message: query.error.issues[0]?.message ?? 'invalid query' });
      return;
    }
    if (!events) return { events: [] };
    const { limit, from, to } = query.data;
    if (!from && !to) {
      return { events: await events.recent(limit) };
    }
    const inRange = await events.range(from ? new Date(from) : undefined, to ? new Date(to) : undefined);
    return { events: inRange.slice(-limit) };
  });

  return app;
}

type ImagePayload = { image: CapturedImage } | { error: string; message: string };

export function parseImagePayload(contentType: string | undefined, body: unknown): ImagePayload {
  const missing = { error: 'missing_image', message: 'No image payload provided' };
  if (body === undefined || body === null) {
    return missing;
  }

  if (Buffer.isBuffer(body)) {
    if (body.length === 0) return missing;
    const declared = contentType?.split(';')[0]?.trim().toLowerCase();
    return { image: toImage(body, declared === 'image/png' ? 'image/png' : 'image/jpeg') };
  }

  const parsed = AnalyzeBodySchema.safeParse(body);
  if (!parsed.success) {
    return { error: 'invalid_payload', message: 'Expected {image_base64, mime?} or an image/jpeg or image/png body' };
  }

  let encoded = parsed.data.image_base64.trim();
  let mime: ImageMime | undefined = parsed.data.mime;
  const dataUrl = /^data:(image\/(?:jpeg|png));base64,(.*)$/s.exec(encoded);
  if (dataUrl) {
    mime = dataUrl[1] === 'image/png' ? 'image/png' : 'image/jpeg';
    encoded = dataUrl[2] ?? '';
  }
  const data = Buffer.from(encoded, 'base64');
  if (data.length === 0) return missing;
  return { image: toImage(data, mime ?? sniffMime(data)) };
}

function sniffMime(data: Buffer): ImageMime {
  if (isJpeg(data)) return 'image/jpeg';
  if (PNG_SIGNATURE.every((byte, index) => data[index] === byte)) return 'image/png';
  return 'image/jpeg';
}

function toImage(data: Buffer, mime: ImageMime): CapturedImage {
  return { data, mime, capturedAt: Date.now() };
}
