/**
 * Structured logger built on Pino.
 *
 * Writes JSON lines to stderr: stdout belongs to the LSP wire protocol.
 */

import pino from 'pino';

const isEnabled = process.env.ENABLE_OBSERVABILITY !== 'false';
const logLevel = process.env.DTCG_LS_LOG_LEVEL ?? process.env.LOG_LEVEL ?? 'info';

const baseLogger = pino(
  {
    name: 'dtcg-language-server',
    level: isEnabled ? logLevel : 'silent',
    formatters: { level: (label: string) => ({ level: label }) },
    timestamp: pino.stdTimeFunctions.isoTime,
  },
  pino.destination(2),
);

export const logger = baseLogger;

export type Logger = pino.Logger;

export function createModuleLogger(module: string): Logger {
  return logger.child({ module });
}
