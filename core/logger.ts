/**
 * winston loggers for the editing core.
 *
 * The shared logger takes its level from EDITOR_LOG_LEVEL, falling back to
 * `warn`. An editor configured with its own level gets a separate logger, so
 * other editors keep theirs. Under Vitest a logger is silent unless a level
 * is set explicitly.
 */

import winston from 'winston';

export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

const envLevel = process.env.EDITOR_LOG_LEVEL;

const format = winston.format.combine(
  winston.format.timestamp({
    format: 'YYYY-MM-DD HH:mm:ss.SSS',
  }),
  winston.format.printf((info) => {
    const { level, timestamp, message, ...rest } = info;
    return (
      `[${level.toUpperCase()}] ${String(timestamp)} -- ${String(message)}` +
      `${Object.keys(rest).length > 0 ? ` ${JSON.stringify(rest)}` : ''}`
    );
  }),
);

function buildLogger(level: string, silent: boolean): winston.Logger {
  return winston.createLogger({
    level,
    silent,
    format,
    transports: [new winston.transports.Console()],
  });
}

const logger = buildLogger(envLevel ?? 'warn', process.env.VITEST !== undefined && envLevel === undefined);

/** Logger for one editor: its own at `level`, the shared one otherwise. */
export function editorLogger(level?: LogLevel): winston.Logger {
  return level ? buildLogger(level, false) : logger;
}

export { logger };
