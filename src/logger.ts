import { pino, type Logger, type LevelWithSilent } from 'pino';

export function createLogger(level: LevelWithSilent = 'warn'): Logger {
  return pino({
    name: 'genai-file-uploader',
    level,
    redact: {
      paths: ['apiKey', 'key', '*.apiKey', '*.key'],
      remove: true,
    },
  });
}
