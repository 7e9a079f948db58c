import { trace } from '@opentelemetry/api';

export type LogLevel = 'info' | 'error' | 'warn';

// Structured logging with trace context
export function logWithTrace(level: LogLevel, message: string, metadata?: Record<string, unknown>): void {
  const span = trace.getActiveSpan();
  const traceId = span?.spanContext().traceId;
  const spanId = span?.spanContext().spanId;

  const logEntry = {
    timestamp: new Date().toISOString(),
    level,
    message,
    traceId,
    spanId,
    ...metadata,
  };

  const logString = JSON.stringify(logEntry);
  if (level === 'error') {
    console.error(logString);
  } else if (level === 'warn') {
    console.warn(logString);
  } else {
    console.log(logString);
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
