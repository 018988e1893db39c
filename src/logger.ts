import pino, { type Logger } from 'pino';

export type { Logger };

function prettyEnabled(): boolean {
  if (process.env.LOG_PRETTY === '1') return true;
  if (process.env.LOG_PRETTY === '0') return false;
  return Boolean(process.stdout.isTTY);
}

let root: Logger | undefined;

function rootLogger(): Logger {
  if (!root) {
    root = pino({
      level: process.env.LOG_LEVEL || 'info',
      ...(prettyEnabled()
        ? { transport: { target: 'pino-pretty', options: { colorize: true } } }
        : {})
    });
  }
  return root;
}

export function createLogger(component: string): Logger {
  return rootLogger().child({ component });
}

export const silentLogger: Logger = pino({ level: 'silent' });
