import fs from 'fs';
import os from 'os';
import path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { loadConfig, parseProviderOrder, publicConfig } from './config.js';
import { loadEnv } from './load_env.js';

describe('loadConfig', () => {
  let dir: string;
  let configPath: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'vision-config-'));
    configPath = path.join(dir, 'vision.config.json');
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('falls back to defaults when the file is missing', () => {
    const { config, logLevel, sourcePath } = loadConfig({ VISION_CONFIG_PATH: configPath });

    expect(sourcePath).toBeNull();
    expect(logLevel).toBe('info');
    expect(config.server).toEqual({ host: '0.0.0.0', port: 5002, wsPath: '/ws' });
    expect(config.camera.device).toBe('0');
    expect(config.vision).toEqual({ intervalSeconds: 5, firstPerson: true });
    expect(config.analyzer.providers).toEqual(['gemini', 'openai', 'claude']);
    expect(config.analyzer.maxRetries).toBe(0);
    expect(config.speech.url).toBe('http://localhost:5001');
    expect(config.analyzer.gemini.apiKey).toBeUndefined();
  });

  it('reads the file and fills in missing fields', () => {
    fs.writeFileSync(
      configPath,
      JSON.stringify({ camera: { device: 2, width: 640, height: 480 }, vision: { intervalSeconds: 2.5 } })
    );

    const { config, sourcePath } = loadConfig({ VISION_CONFIG_PATH: configPath });

    expect(sourcePath).toBe(configPath);
    expect(config.camera).toMatchObject({ device: '2', width: 640, height: 480, fps: 30 });
    expect(config.vision.intervalSeconds).toBe(2.5);
    expect(config.vision.firstPerson).toBe(true);
  });

  it('applies environment overrides', () => {
    fs.writeFileSync(configPath, JSON.stringify({ analyzer: { openai: { apiKey: 'file-key' } } }));

    const { config, logLevel } = loadConfig({
      VISION_CONFIG_PATH: configPath,
      PORT: '6000',
      HOST: '127.0.0.1',
      LOG_LEVEL: 'debug',
      GOOGLE_API_KEY: 'test-google-key',
      OPENAI_API_KEY: 'test-openai-key',
      ANTHROPIC_API_KEY: 'test-anthropic-key',
      VISION_PROVIDER_ORDER: 'openai, gemini',
      CAMERA_DEVICE: '/dev/video3'
    });

    expect(logLevel).toBe('debug');
    expect(config.server.port).toBe(6000);
    expect(config.server.host).toBe('127.0.0.1');
    expect(config.camera.device).toBe('/dev/video3');
    expect(config.analyzer.gemini.apiKey).toBe('test-google-key');
    expect(config.analyzer.openai.apiKey).toBe('test-openai-key');
    expect(config.analyzer.claude.apiKey).toBe('test-anthropic-key');
    expect(config.analyzer.providers).toEqual(['openai', 'gemini']);
  });

  it('prefers GEMINI_API_KEY over GOOGLE_API_KEY', () => {
    const { config } = loadConfig({
      VISION_CONFIG_PATH: configPath,
      GEMINI_API_KEY: 'test-gemini-key',
      GOOGLE_API_KEY: 'test-google-key'
    });

    expect(config.analyzer.gemini.apiKey).toBe('test-gemini-key');
  });

  it('rejects a file that is not JSON', () => {
    fs.writeFileSync(configPath, '{ interval: 5');

    expect(() => loadConfig({ VISION_CONFIG_PATH: configPath })).toThrow(`Config file ${configPath} is not valid JSON`);
  });

  it('rejects invalid values with the offending path', () => {
    fs.writeFileSync(configPath, JSON.stringify({ vision: { intervalSeconds: 0 } }));

    expect(() => loadConfig({ VISION_CONFIG_PATH: configPath })).toThrow(/vision\.intervalSeconds/);
  });

  it('rejects intervals longer than a timer can wait', () => {
    fs.writeFileSync(configPath, JSON.stringify({ vision: { intervalSeconds: 3_000_000 } }));

    expect(() => loadConfig({ VISION_CONFIG_PATH: configPath })).toThrow(/vision\.intervalSeconds/);
  });

  it('rejects an unknown log level', () => {
    expect(() => loadConfig({ VISION_CONFIG_PATH: configPath, LOG_LEVEL: 'verbose' })).toThrow(/LOG_LEVEL/);
  });
});

describe('parseProviderOrder', () => {
  it('keeps known names once, in order', () => {
    expect(parseProviderOrder('OpenAI, claude,llava,gemini,openai')).toEqual(['openai', 'claude', 'gemini']);
    expect(parseProviderOrder('')).toEqual([]);
  });
});

describe('publicConfig', () => {
  it('leaves out API keys', () => {
    const { config } = loadConfig({
      VISION_CONFIG_PATH: path.join(os.tmpdir(), 'missing-vision-config.json'),
      GEMINI_API_KEY: 'test-secret',
      OPENAI_API_KEY: 'test-secret',
      ANTHROPIC_API_KEY: 'test-secret'
    });

    const visible = publicConfig(config);

    expect(JSON.stringify(visible)).not.toContain('test-secret');
    expect(visible.analyzer.gemini).toEqual({ model: 'gemini-1.5-flash', maxOutputTokens: 150, temperature: 0.7 });
    expect(visible.analyzer.openai).toEqual({ model: 'gpt-4o-mini', maxTokens: 150 });
    expect(visible.analyzer.claude).toEqual({ model: 'claude-3-5-sonnet-latest', maxTokens: 300 });
  });
});

describe('loadEnv', () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'vision-env-'));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
    delete process.env.VISION_TEST_FLAG;
  });

  it('loads .env.local before .env', () => {
    const work = path.join(dir, 'server');
    fs.mkdirSync(work);
    fs.writeFileSync(path.join(dir, '.env.local'), 'VISION_TEST_FLAG=from-parent-local\n');
    fs.writeFileSync(path.join(work, '.env'), 'VISION_TEST_FLAG=from-env\n');

    const loaded = loadEnv(work);

    expect(loaded).toBe(path.join(dir, '.env.local'));
    expect(process.env.VISION_TEST_FLAG).toBe('from-parent-local');
  });

  it('returns null when no env file exists', () => {
    expect(loadEnv(dir)).toBeNull();
  });
});
