import pino, { type Logger } from 'pino';

const defaultLevel = process.env.NODE_ENV === 'test' ? 'silent' : 'info';

const root = pino({ level: process.env.LOG_LEVEL || defaultLevel });

export type { Logger };

export function createLogger(component: string): Logger {
  return root.child({ component });
}
