import { pino, stdSerializers, type Logger, type LevelWithSilent } from 'pino';

export function createLogger(level: LevelWithSilent = 'info'): Logger {
  return pino({
    name: 'camera-vision',
    level,
    serializers: { err: stdSerializers.err }
  });
}
