import winston from 'winston';
import { config } from '../config';

const { combine, timestamp, printf, colorize, errors, json } = winston.format;

/** LOG_LEVEL value that turns every transport off. */
export const SILENT_LEVEL = 'silent';

interface LogLine {
  level: string;
  message: unknown;
  [key: string]: unknown;
}

/**
 * `<time> [<level>] (<requestId>): <message> {meta}`, then the stack.
 * The service name is left out of console lines.
 */
export function formatLine({ level, message, timestamp, stack, requestId, service, ...metadata }: LogLine): string {
  let msg = `${timestamp} [${level}]`;
  if (requestId) {
    msg += ` (${requestId})`;
  }
  msg += `: ${message}`;

  if (Object.keys(metadata).length > 0) {
    msg += ` ${JSON.stringify(metadata)}`;
  }

  if (stack) {
    msg += `\n${stack}`;
  }

  return msg;
}

export interface LoggerOptions {
  level: string;
  nodeEnv: string;
}

export function createLogger({ level, nodeEnv }: LoggerOptions): winston.Logger {
  const silent = level === SILENT_LEVEL;

  const instance = winston.createLogger({
    level: silent ? 'info' : level,
    silent,
    defaultMeta: { service: 'gene-api' },
    transports: [
      new winston.transports.Console({
        format: combine(
          colorize(),
          timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
          errors({ stack: true }),
          printf(formatLine)
        ),
      }),
    ],
  });

  // Production files are JSON lines; requestId stays a top-level field
  if (nodeEnv === 'production') {
    const fileFormat = combine(timestamp(), errors({ stack: true }), json());

    instance.add(new winston.transports.File({
      filename: 'logs/error.log',
      level: 'error',
      format: fileFormat,
    }));

    instance.add(new winston.transports.File({
      filename: 'logs/combined.log',
      format: fileFormat,
    }));
  }

  return instance;
}

export const logger = createLogger({
  level: config.logging.level,
  nodeEnv: config.server.nodeEnv,
});

/** Logger bound to one request's id. */
export function forRequest(requestId: string | string[] | undefined): winston.Logger {
  const id = Array.isArray(requestId) ? requestId[0] : requestId;
  return id ? logger.child({ requestId: id }) : logger;
}

export default logger;
