/**
 * Span helper — DRY span creation with error handling.
 *
 * Wraps OpenTelemetry's tracer.startActiveSpan with automatic:
 * - Attribute setting
 * - Error recording + status propagation
 * - Span ending (even on error)
 */

import { type Span, SpanStatusCode, trace } from "@opentelemetry/api";
import type { SpanAttributes } from "./types.js";

const TRACER_NAME = "relaykit";

/**
 * Execute an async function within a named OTel span.
 *
 * When no tracer provider is registered (OTel disabled), the function
 * still executes with a no-op span.
 *
 * The span is passed to `fn` so callers can add attributes that are only
 * known once the work is done (e.g. which provider answered).
 *
 * @throws Re-throws any error from fn after recording it on the span
 */
export async function withSpan<T>(
  name: string,
  attributes: SpanAttributes,
  fn: (span: Span) => Promise<T>,
): Promise<T> {
  const tracer = trace.getTracer(TRACER_NAME);
  return tracer.startActiveSpan(name, async (span) => {
    try {
      for (const [key, value] of Object.entries(attributes)) {
        if (value !== undefined) span.setAttribute(key, value);
      }
      const result = await fn(span);
      span.setStatus({ code: SpanStatusCode.OK });
      return result;
    } catch (error) {
      if (error instanceof Error) {
        span.recordException(error);
      }
      span.setStatus({
        code: SpanStatusCode.ERROR,
        message: error instanceof Error ? error.message : String(error),
      });
      throw error;
    } finally {
      span.end();
    }
  });
}
