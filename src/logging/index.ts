import pino from 'pino';
import { buildLogger } from './factory.js';

const { logger: rootLogger, flush: flushDestination, destination } = buildLogger();

export const logger = rootLogger;

export async function flushLogger(): Promise<void> {
  await flushDestination();
}

function flushLoggerSync(): void {
  if (!destination) {
    return;
  }
  try {
    destination.flushSync();
  } catch {
    // flushSync throws while the stream is still opening; nothing buffered yet
  }
}

export function createChildLogger(component: string): pino.Logger {
  return logger.child({ component });
}

function withHelpers<T extends pino.Logger, H extends Record<string, unknown>>(child: T, helpers: H): T & H {
  return Object.assign(child, helpers);
}

export const configLogger = createChildLogger('CONFIG');
export const ledgerLogger = createChildLogger('LEDGER');
export const ingestLogger = createChildLogger('INGEST');
export const rebalanceLogger = createChildLogger('REBALANCE');
export const moverLogger = createChildLogger('MOVER');

const baseSchedulerLogger = createChildLogger('SCHEDULER');
export const schedulerLogger = withHelpers(baseSchedulerLogger, {
  published(filename: string, url: string) {
    baseSchedulerLogger.info({ filename, url }, 'Post published');
  },
  failed(filename: string, reason: string) {
    baseSchedulerLogger.error({ filename, reason }, 'Post failed, will retry on a later tick');
  },
});

const basePublishLogger = createChildLogger('PUBLISH');
export const publishLogger = withHelpers(basePublishLogger, {
  retry(operation: string, attempt: number, maxAttempts: number, delayMs: number, reason: string) {
    basePublishLogger.warn(
      { operation, attempt, maxAttempts, delayMs, reason },
      `${operation} attempt ${attempt}/${maxAttempts} failed, retrying in ${formatDuration(delayMs)}`
    );
  },
});

export function serializeError(err: Error | unknown): Record<string, unknown> {
  if (err instanceof Error) {
    return {
      type: err.name,
      message: err.message,
      stack: err.stack,
    };
  }
  return { message: String(err) };
}

export function formatDuration(ms: number): string {
  if (ms < 1000) return `${ms}ms`;
  const seconds = ms / 1000;
  if (seconds < 60) return `${seconds.toFixed(1)}s`;
  const minutes = seconds / 60;
  return `${minutes.toFixed(1)}m`;
}

export function exitWithCode(
  code: 0 | 1 | 2,
  message: string,
  error?: Error
): never {
  switch (code) {
    case 0:
      logger.info({ exitCode: code }, message);
      break;
    case 1:
      logger.fatal({ exitCode: code, error: error ? serializeError(error) : undefined }, message);
      break;
    case 2:
      configLogger.fatal({ exitCode: code, error: error ? serializeError(error) : undefined }, `Configuration Error: ${message}`);
      break;
  }

  flushLoggerSync();
  process.exit(code);
}
