/**
 * Logger utility using Pino
 */
import pino from 'pino';

const level = process.env.LOG_LEVEL || (process.env.VITEST ? 'silent' : 'info');

let transport: pino.DestinationStream | undefined;
if (process.stdout.isTTY && !process.env.VITEST) {
  try {
    transport = pino.transport({
      target: 'pino-pretty',
      options: {
        colorize: true,
        translateTime: 'SYS:standard',
        ignore: 'pid,hostname',
        destination: 2,
      },
    });
  } catch {
    // pino-pretty not available, use default
  }
}

const rootLogger = transport ? pino({ level }, transport) : pino({ level }, pino.destination(2));

export type Logger = pino.Logger;

export function createLogger(name: string): Logger {
  return rootLogger.child({ name });
}

export { rootLogger as logger };
