/**
 * @netlens/core - Logger factory
 *
 * Every component logs through pino. Long-lived classes accept an injected
 * logger and fall back to one created here.
 */

import { pino, type Logger } from 'pino';
import type { LogLevel } from './config/schema.js';

export type { Logger };

export function createLogger(name: string, level?: LogLevel): Logger {
  return pino({ name, level: level ?? process.env['LOG_LEVEL'] ?? 'info' });
}
