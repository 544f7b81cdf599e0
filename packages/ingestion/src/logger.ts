import pino, { type Logger } from 'pino';

export function createLogger(name: string): Logger {
  return pino({ name, level: process.env.LOG_LEVEL ?? 'info' });
}

export function createCliLogger(): Logger {
  return pino({
    name: 'cli',
    level: process.env.LOG_LEVEL ?? 'info',
    transport: { target: 'pino-pretty' },
  });
}

export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
