/**
 * Logger utility using Pino
 *
 * Logs go to stderr so that stdout carries only the rendered report.
 */
import {
  pino,
  destination,
  transport,
  type DestinationStream,
  type LevelWithSilent,
  type Logger as PinoLogger,
} from 'pino';

const level = process.env.LOG_LEVEL || 'info';

function createDestination(): DestinationStream {
  if (process.stderr.isTTY) {
    try {
      return transport({
        target: 'pino-pretty',
        options: {
          destination: 2,
          colorize: true,
          translateTime: 'SYS:standard',
          ignore: 'pid,hostname',
        },
      });
    } catch {
      // pino-pretty not available, fall through to plain JSON lines
    }
  }
  return destination(2);
}

const rootLogger = pino({ level }, createDestination());

export type Logger = PinoLogger;

const children: Logger[] = [];

export function createLogger(name: string): Logger {
  const child = rootLogger.child({ name });
  children.push(child);
  return child;
}

/** Children copy the level when created, so update them too. */
export function setLogLevel(level: LevelWithSilent): void {
  rootLogger.level = level;
  for (const child of children) {
    child.level = level;
  }
}

export { rootLogger as logger };
