import pino from 'pino';
import type { SonicBoom } from 'sonic-boom';
import { getLoggingConfig, type LoggingConfig } from './config.js';

export interface LoggerBundle {
  logger: pino.Logger;
  flush: () => Promise<void>;
  /** Null when a pino-pretty worker transport owns the output */
  destination: SonicBoom | null;
}

function openDestination(target: string): SonicBoom {
  switch (target) {
    case 'stdout':
      return pino.destination({ dest: 1, sync: false });
    case 'stderr':
      return pino.destination({ dest: 2, sync: false });
    default:
      return pino.destination({ dest: target, append: true, mkdir: true, sync: false });
  }
}

export function buildLogger(config: LoggingConfig = getLoggingConfig()): LoggerBundle {
  const options: pino.LoggerOptions = {
    level: config.level,
    base: { service: 'slotpost' },
    formatters: {
      level: (label: string) => ({ level: label }),
    },
    timestamp: pino.stdTimeFunctions.isoTime,
  };

  if (config.format === 'pretty') {
    const transport = pino.transport({
      target: 'pino-pretty',
      options: {
        colorize: true,
        translateTime: 'SYS:standard',
        ignore: 'pid,hostname,service',
        destination: config.destination === 'stdout' ? 1 : 2,
      },
    });
    return { logger: pino(options, transport), destination: null, flush: async () => {} };
  }

  const destination = openDestination(config.destination);
  return {
    logger: pino(options, destination),
    destination,
    flush: () =>
      new Promise<void>((resolve, reject) => {
        destination.flush(err => (err ? reject(err) : resolve()));
      }),
  };
}
