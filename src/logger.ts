import { pino } from 'pino';
import { z } from 'zod';
import { ConfigError } from './errors.js';

const LogLevelSchema = z.preprocess(
  (v) => (typeof v === 'string' && v.trim() !== '' ? v.trim().toLowerCase() : undefined),
  z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info')
);

export type LogLevel = z.infer<typeof LogLevelSchema>;

export function parseLogLevel(value: string | undefined): LogLevel {
  const parsed = LogLevelSchema.safeParse(value);
  if (!parsed.success) {
    const problems = parsed.error.issues.map((i) => `LOG_LEVEL: ${i.message}`);
    throw new ConfigError(`Invalid configuration: ${problems.join('; ')}`, problems);
  }
  return parsed.data;
}

export const logger = pino({
  level: parseLogLevel(process.env.LOG_LEVEL),
  base: { service: 'product-search' },
  timestamp: pino.stdTimeFunctions.isoTime,
});
