import { pino, type Logger, type LevelWithSilent } from 'pino';

export interface BridgeLoggerOptions {
  level?: LevelWithSilent;
  name?: string;
}

/**
 * Structured logger for bridge processes.
 *
 * - ISO timestamps
 * - level printed as its label
 * - secrets redacted if they ever reach a log object
 *
 * Components receive this logger (or a child of it) through their
 * constructors; none of them creates its own.
 */
export function createBridgeLogger(options: BridgeLoggerOptions = {}): Logger {
  return pino({
    name: options.name ?? 'nft-bridge',
    level: options.level ?? 'info',
    formatters: {
      level: (label) => ({ level: label }),
    },
    timestamp: pino.stdTimeFunctions.isoTime,
    redact: {
      paths: ['*.privateKey', '*.private_key', '*.mnemonic', '*.apiKey', '*.authorization'],
      censor: '[REDACTED]',
    },
  });
}
