/**
 * OpenTelemetry Tracing (Opt-in)
 *
 * Spans around authorization requests, plus correlation IDs for logs.
 * Only the OpenTelemetry API is used; the integrator installs and starts an
 * SDK. Spans are recorded when OTEL_ENABLED=1 (or "true").
 */

import { trace, context, SpanStatusCode, Span } from '@opentelemetry/api';
import { v4 as uuidv4 } from 'uuid';

const TRACER_NAME = 'oauth2-authorize-endpoint';

export function isOTelEnabled(): boolean {
  return process.env.OTEL_ENABLED === '1' || process.env.OTEL_ENABLED === 'true';
}

export function getTracer() {
  if (!isOTelEnabled()) {
    return null;
  }
  return trace.getTracer(TRACER_NAME);
}

/**
 * Generate a unique correlation ID for request tracing
 */
export function generateCorrelationId(): string {
  return uuidv4();
}

/**
 * Execute a function within a span
 *
 * @param name - Span name
 * @param fn - Function to execute
 * @param attributes - Optional span attributes
 */
export async function withSpan<T>(
  name: string,
  fn: (span: Span | null) => Promise<T>,
  attributes?: Record<string, string | number | boolean>
): Promise<T> {
  const tracer = getTracer();

  if (!tracer) {
    return fn(null);
  }

  return tracer.startActiveSpan(name, async (span) => {
    try {
      if (attributes) {
        Object.entries(attributes).forEach(([key, value]) => {
          span.setAttribute(key, value);
        });
      }

      const result = await fn(span);
      span.setStatus({ code: SpanStatusCode.OK });
      return result;
    } catch (error) {
      const err = error instanceof Error ? error : new Error(String(error));
      span.recordException(err);
      span.setStatus({
        code: SpanStatusCode.ERROR,
        message: err.message,
      });
      throw error;
    } finally {
      span.end();
    }
  });
}

/**
 * Span for one pass through the authorization endpoint
 *
 * @param requestId - Correlation ID of the request
 */
export async function withAuthorizeSpan<T>(
  requestId: string,
  fn: (span: Span | null) => Promise<T>
): Promise<T> {
  return withSpan('OAuth authorize', fn, {
    'oauth.endpoint': 'authorize',
    'oauth.request_id': requestId,
  });
}

/**
 * Set attribute on current span
 */
export function setSpanAttribute(key: string, value: string | number | boolean): void {
  if (!isOTelEnabled()) {
    return;
  }
  const span = trace.getSpan(context.active());
  if (span) {
    span.setAttribute(key, value);
  }
}
