// src/services/logger.ts: structured logging for the planner backend
import { Logger, type ILogObj } from 'tslog';
import { appConfig } from '@/config/app.config';

const LEVELS: Record<typeof appConfig.logLevel, number> = {
  silly: 0,
  trace: 1,
  debug: 2,
  info: 3,
  warn: 4,
  error: 5,
  fatal: 6,
};

export const logger: Logger<ILogObj> = new Logger<ILogObj>({
  name: 'itinerary-planner',
  minLevel: LEVELS[appConfig.logLevel],
  prettyLogTemplate: '{{yyyy}}-{{mm}}-{{dd}} {{hh}}:{{MM}}:{{ss}} {{logLevelName}} [{{name}}] ',
  type: 'pretty',
});

export function errMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
