import { pino, type BaseLogger } from 'pino';

export type AnalysisLogger = Pick<BaseLogger, 'debug' | 'info' | 'warn'>;

export function resolveLogLevel(env: NodeJS.ProcessEnv = process.env): string {
  return env.LOG_LEVEL || 'info';
}

export const logger = pino({
  name: 'works-audit',
  level: resolveLogLevel(),
});
