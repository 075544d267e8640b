/**
 * OpenTelemetry Tracing
 *
 * Span helpers for permission resolution and mutations. Only the API package
 * is used here; with no SDK registered every span is a no-op.
 */

import { trace, context, SpanStatusCode, type Tracer } from '@opentelemetry/api';
import type { Span, Attributes } from '@opentelemetry/api';

const TRACER_NAME = 'rolegraph';
const TRACER_VERSION = '0.1.0';

let globalTracer: Tracer | null = null;

/**
 * Initialize the global tracer
 * Should be called once at application startup
 */
export function initializeTracer(tracer?: Tracer): Tracer {
  globalTracer = tracer ?? trace.getTracer(TRACER_NAME, TRACER_VERSION);
  return globalTracer;
}

/**
 * Get the global tracer instance
 * Lazily initializes if not already done
 */
export function getTracer(): Tracer {
  if (!globalTracer) {
    globalTracer = trace.getTracer(TRACER_NAME, TRACER_VERSION);
  }
  return globalTracer;
}

/**
 * Create a new span as a child of the active context
 */
export function createSpan(name: string, attributes?: Attributes): Span {
  return getTracer().startSpan(name, { attributes });
}

/**
 * Execute a function within a span context
 */
export async function withSpan<T>(
  name: string,
  fn: (span: Span) => Promise<T>,
  attributes?: Attributes,
): Promise<T> {
  const span = createSpan(name, attributes);

  return context.with(trace.setSpan(context.active(), span), async () => {
    try {
      const result = await fn(span);
      span.setStatus({ code: SpanStatusCode.OK });
      return result;
    } catch (error) {
      setSpanError(span, error instanceof Error ? error : String(error));
      throw error;
    } finally {
      span.end();
    }
  });
}

/**
 * Get the current active span
 */
export function getActiveSpan(): Span | undefined {
  return trace.getActiveSpan();
}

/**
 * Set span status as error
 */
export function setSpanError(span: Span, error: Error | string): void {
  const message = typeof error === 'string' ? error : error.message;
  span.setStatus({
    code: SpanStatusCode.ERROR,
    message,
  });
  if (error instanceof Error) {
    span.recordException(error);
  }
}

export { SPAN_NAMES, roleAttributes, bulkAttributes } from './spans.js';
export type { Span };
