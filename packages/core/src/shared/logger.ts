import { pino, type Logger } from 'pino';

export type { Logger } from 'pino';

const rootLogger: Logger = pino({
  name: 'dataherd',
  level: process.env.LOG_LEVEL ?? (process.env.VITEST ? 'silent' : 'info'),
});

/**
 * Child logger tagged with the component that emits it.
 */
export function createLogger(component: string, bindings: Record<string, unknown> = {}): Logger {
  return rootLogger.child({ component, ...bindings });
}
