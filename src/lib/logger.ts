import pino, { Logger, LevelWithSilent } from 'pino';

export type { Logger };

export interface LoggerOptions {
  level?: LevelWithSilent;
  name?: string;
}

const LEVELS: readonly LevelWithSilent[] = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'];

function isLevel(value: string | undefined): value is LevelWithSilent {
  return value !== undefined && (LEVELS as readonly string[]).includes(value);
}

/**
 * Build a pino logger writing JSON lines to stderr. stdout belongs to the
 * caller (tool transport or CLI output).
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  const envLevel = process.env.LOG_LEVEL;
  const level = options.level ?? (isLevel(envLevel) ? envLevel : 'info');

  return pino(
    {
      name: options.name ?? 'webapp-deployer',
      level,
      formatters: {
        level: (label) => ({ level: label })
      },
      timestamp: pino.stdTimeFunctions.isoTime
    },
    pino.destination(2)
  );
}

export const logger = createLogger();
