import pino, { type LoggerOptions } from 'pino';
import { trace } from '@opentelemetry/api';

export const loggerOptions: LoggerOptions = {
  name: 'remote-cloud',
  level: process.env.LOG_LEVEL ?? 'info',
  // Transport and decode errors wrap the failure that caused them; keep it.
  serializers: { err: pino.stdSerializers.errWithCause },
  mixin() {
    const span = trace.getActiveSpan();
    if (!span) return {};
    const ctx = span.spanContext();
    return {
      traceId: ctx.traceId,
      spanId: ctx.spanId,
    };
  },
};

export const logger = pino(loggerOptions);
