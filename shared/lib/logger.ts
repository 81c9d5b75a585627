import { createRequire } from 'node:module';
import { pino, type Logger } from 'pino';

const require = createRequire(import.meta.url);

const level = process.env.LOG_LEVEL || (process.env.NODE_ENV === 'production' ? 'info' : 'debug');

function resolveTransport() {
  if (process.env.NODE_ENV === 'production' || process.env.NODE_ENV === 'test') return undefined;
  try {
    require.resolve('pino-pretty');
    return { target: 'pino-pretty', options: { translateTime: 'SYS:standard' } } as const;
  } catch {
    return undefined;
  }
}

const root = pino({
  level,
  base: undefined,
  transport: resolveTransport(),
});

export function createLogger(name: string): Logger {
  return root.child({ name });
}

export type { Logger };

export default root;
