import fs from 'fs';
import path from 'path';
import { z } from 'zod';
import { MAX_INTERVAL_SECONDS } from './vision/vision.system.js';

const envSchema = z.object({
  PORT: z.coerce.number().int().positive().optional(),
  HOST: z.string().min(1).optional(),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  VISION_CONFIG_PATH: z.string().default('./vision.config.json'),
  GEMINI_API_KEY: z.string().optional(),
  GOOGLE_API_KEY: z.string().optional(),
  OPENAI_API_KEY: z.string().optional(),
  ANTHROPIC_API_KEY: z.string().optional(),
  VISION_PROVIDER_ORDER: z.string().optional(),
  CAMERA_DEVICE: z.string().min(1).optional()
});

const ProviderNames = ['gemini', 'openai', 'claude'] as const;

const fileSchema = z.object({
  server: z
    .object({
      host: z.string().default('0.0.0.0'),
      port: z.number().int().positive().default(5002),
      wsPath: z.string().default('/ws')
    })
    .default({}),
  camera: z
    .object({
      device: z.union([z.string(), z.number().int().nonnegative()]).transform(String).default('0'),
      inputFormat: z.string().default('v4l2'),
      width: z.number().int().nonnegative().default(1280),
      height: z.number().int().nonnegative().default(720),
      fps: z.number().int().nonnegative().default(30),
      warmupFrames: z.number().int().nonnegative().default(5),
      captureTimeoutMs: z.number().int().positive().default(10000),
      ffmpegPath: z.string().default('ffmpeg')
    })
    .default({}),
  analyzer: z
    .object({
      providers: z.array(z.enum(ProviderNames)).min(1).default(['gemini', 'openai', 'claude']),
      maxRetries: z.number().int().nonnegative().default(0),
      timeoutMs: z.number().int().positive().default(30000),
      gemini: z
        .object({
          apiKey: z.string().optional(),
          model: z.string().default('gemini-1.5-flash'),
          maxOutputTokens: z.number().int().positive().default(150),
          temperature: z.number().min(0).max(2).default(0.7)
        })
        .default({}),
      openai: z
        .object({
          apiKey: z.string().optional(),
          model: z.string().default('gpt-4o-mini'),
          maxTokens: z.number().int().positive().default(150)
        })
        .default({}),
      claude: z
        .object({
          apiKey: z.string().optional(),
          model: z.string().default('claude-3-5-sonnet-latest'),
          maxTokens: z.number().int().positive().default(300)
        })
        .default({})
    })
    .default({}),
  vision: z
    .object({
      intervalSeconds: z.number().positive().max(MAX_INTERVAL_SECONDS).default(5),
      firstPerson: z.boolean().default(true)
    })
    .default({}),
  speech: z
    .object({
      enabled: z.boolean().default(true),
      url: z.string().url().default('http://localhost:5001'),
      timeoutMs: z.number().int().positive().default(10000)
    })
    .default({}),
  events: z
    .object({
      enabled: z.boolean().default(true),
      path: z.string().default('./data/vision_events.jsonl')
    })
    .default({})
});

export type AppConfig = z.infer<typeof fileSchema>;
export type ProviderName = (typeof ProviderNames)[number];

export type LoadedConfig = {
  config: AppConfig;
  logLevel: z.infer<typeof envSchema>['LOG_LEVEL'];
  // null when the file was missing and defaults were used
  sourcePath: string | null;
};

/**
 * Reads the JSON config file once and applies environment overrides.
 * Credentials may live in either place; the environment wins.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): LoadedConfig {
  const parsedEnv = envSchema.safeParse(env);
  if (!parsedEnv.success) {
    throw new Error(`Invalid environment: ${formatIssues(parsedEnv.error)}`);
  }
  const vars = parsedEnv.data;

  const filePath = path.resolve(vars.VISION_CONFIG_PATH);
  let raw: unknown = {};
  let sourcePath: string | null = null;
  if (fs.existsSync(filePath)) {
    try {
      raw = JSON.parse(fs.readFileSync(filePath, 'utf8'));
    } catch (error) {
      throw new Error(`Config file ${filePath} is not valid JSON`, { cause: error });
    }
    sourcePath = filePath;
  }

  const parsedFile = fileSchema.safeParse(raw);
  if (!parsedFile.success) {
    throw new Error(`Invalid config file ${filePath}: ${formatIssues(parsedFile.error)}`);
  }
  const config = parsedFile.data;

  if (vars.PORT) config.server.port = vars.PORT;
  if (vars.HOST) config.server.host = vars.HOST;
  if (vars.CAMERA_DEVICE) config.camera.device = vars.CAMERA_DEVICE;
  const geminiKey = vars.GEMINI_API_KEY || vars.GOOGLE_API_KEY;
  if (geminiKey) config.analyzer.gemini.apiKey = geminiKey;
  if (vars.OPENAI_API_KEY) config.analyzer.openai.apiKey = vars.OPENAI_API_KEY;
  if (vars.ANTHROPIC_API_KEY) config.analyzer.claude.apiKey = vars.ANTHROPIC_API_KEY;
  if (vars.VISION_PROVIDER_ORDER) {
    const order = parseProviderOrder(vars.VISION_PROVIDER_ORDER);
    if (order.length > 0) config.analyzer.providers = order;
  }

  return { config, logLevel: vars.LOG_LEVEL, sourcePath };
}

export function parseProviderOrder(value: string): ProviderName[] {
  const order: ProviderName[] = [];
  for (const item of value.split(',')) {
    const name = item.trim().toLowerCase();
    const known = ProviderNames.find((provider) => provider === name);
    if (known && !order.includes(known)) order.push(known);
  }
  return order;
}

/** Config without credentials, safe to return from the API. */
export function publicConfig(config: AppConfig) {
  const { gemini, openai, claude, ...analyzer } = config.analyzer;
  return {
    server: config.server,
    camera: config.camera,
    analyzer: {
      ...analyzer,
      gemini: { model: gemini.model, maxOutputTokens: gemini.maxOutputTokens, temperature: gemini.temperature },
      openai: { model: openai.model, maxTokens: openai.maxTokens },
      claude: { model: claude.model, maxTokens: claude.maxTokens }
    },
    speech: config.speech,
    events: config.events
  };
}

function formatIssues(error: z.ZodError): string {
  return error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`).join('; ');
}
