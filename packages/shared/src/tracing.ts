/**
 * Tracing helpers over the OpenTelemetry API.
 *
 * No SDK is started here; the embedding process registers one if it wants
 * spans exported. Without it every helper degrades to a no-op.
 */
import { trace, SpanStatusCode, type Span } from '@opentelemetry/api';

const TRACER_NAME = 'remote-cloud';

/** Get a tracer instance */
export function getTracer() {
  return trace.getTracer(TRACER_NAME);
}

/** Get trace headers from the current active context for propagation */
export function getTraceHeaders(): Record<string, string> {
  const span = trace.getActiveSpan();
  if (!span) return {};

  const spanContext = span.spanContext();
  return {
    traceparent: `00-${spanContext.traceId}-${spanContext.spanId}-${spanContext.traceFlags.toString(16).padStart(2, '0')}`,
  };
}

/**
 * Run `fn` as the active span `name`. The span is handed to `fn` so it can
 * record what it learns about the response. Errors are recorded on the span
 * and rethrown.
 */
export async function withSpan<T>(
  name: string,
  attributes: Record<string, string | number | boolean>,
  fn: (span: Span) => Promise<T>,
): Promise<T> {
  return getTracer().startActiveSpan(name, { attributes }, async (span) => {
    try {
      const result = await fn(span);
      span.setStatus({ code: SpanStatusCode.OK });
      return result;
    } catch (error) {
      span.setStatus({
        code: SpanStatusCode.ERROR,
        message: error instanceof Error ? error.message : String(error),
      });
      span.recordException(error instanceof Error ? error : new Error(String(error)));
      throw error;
    } finally {
      span.end();
    }
  });
}
