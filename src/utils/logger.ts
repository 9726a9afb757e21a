/**
 * Centralized Logging Service
 * Structured JSON logging with per-run tracing using bunyan
 */
import { randomUUID } from 'node:crypto';
import bunyan, { type LogLevelString } from 'bunyan';

export type { LogLevelString };

/**
 * Run context bound to every log record of one pipeline run
 */
export interface RunContext {
  runId: string;
  url?: string;
}

/**
 * Service names for child loggers
 */
export type ServiceName =
  | 'orchestrator'
  | 'html-fetcher'
  | 'openrouter'
  | 'event-extraction'
  | 'ics-generator';

/**
 * Logger type export for use in service signatures
 */
export type Logger = bunyan;

/**
 * Error serializer that keeps the ScraperError fields
 * (code, details, retryable) alongside the stack
 */
function errorSerializer(err: Error & { code?: string; details?: unknown; retryable?: boolean }) {
  const serialized = bunyan.stdSerializers.err(err);
  return {
    ...serialized,
    code: err.code,
    details: err.details,
    retryable: err.retryable,
  };
}

const rootLogger = bunyan.createLogger({
  name: 'market-events-ics',
  level: 'info',
  serializers: {
    err: errorSerializer,
    error: errorSerializer,
  },
});

/**
 * Create the logger for one pipeline run
 *
 * @example
 * const log = createRunLogger({ runId: generateRunId() }, config.logLevel);
 * log.info('Run started');
 */
export function createRunLogger(context: RunContext, level?: LogLevelString): Logger {
  const log = rootLogger.child({
    runId: context.runId,
    url: context.url,
  });
  if (level) {
    log.level(level);
  }
  return log;
}

/**
 * Create a service-specific child logger
 *
 * @example
 * const serviceLog = createServiceLogger(log, 'openrouter');
 * serviceLog.debug({ model }, 'Requesting completion');
 */
export function createServiceLogger(parentLogger: Logger, service: ServiceName): Logger {
  return parentLogger.child({ service });
}

export function generateRunId(): string {
  return randomUUID();
}

/**
 * Root logger for failures that happen before a run logger exists
 * (configuration errors)
 */
export function getRootLogger(): Logger {
  return rootLogger;
}

/**
 * Elapsed milliseconds since `startTime`
 *
 * @example
 * const startTime = Date.now();
 * // ... operation ...
 * log.info({ durationMs: elapsed(startTime) }, 'Operation complete');
 */
export function elapsed(startTime: number): number {
  return Date.now() - startTime;
}

/**
 * Shallow copy with sensitive fields redacted
 */
export function safeLogObject<T extends object>(
  obj: T,
  redactKeys: string[] = ['apiKey', 'password', 'secret', 'token', 'authorization']
): Record<string, unknown> {
  const result: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(obj)) {
    if (redactKeys.includes(key)) {
      result[key] = '[REDACTED]';
    } else if (value !== null && typeof value === 'object' && !Array.isArray(value)) {
      result[key] = safeLogObject(value, redactKeys);
    } else {
      result[key] = value;
    }
  }
  return result;
}

export default rootLogger;
