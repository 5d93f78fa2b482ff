/**
 * OTel helpers for task calls.
 *
 * Uses @opentelemetry/api directly; spans are no-ops and propagation writes
 * nothing when no OTel SDK is registered.
 */

import type * as http from "node:http";
import {
  type Context,
  context,
  propagation,
  type SpanAttributes,
  SpanStatusCode,
  trace,
} from "@opentelemetry/api";

const TRACER_NAME = "switchboard.a2a";

const headerGetter = {
  get(carrier: http.IncomingHttpHeaders, key: string): string | undefined {
    const value = carrier[key];
    if (Array.isArray(value)) return value[0];
    return value;
  },
  keys(carrier: http.IncomingHttpHeaders): string[] {
    return Object.keys(carrier);
  },
};

/** Parent context carried by an inbound request's `traceparent` header */
export function extractTraceContext(headers: http.IncomingHttpHeaders): Context {
  return propagation.extract(context.active(), headers, headerGetter);
}

/** Write the active trace context into outbound request headers */
export function injectTraceHeaders(headers: Record<string, string>): Record<string, string> {
  propagation.inject(context.active(), headers);
  return headers;
}

/**
 * Run `fn` inside a named span, optionally parented on `parent`.
 * Failures are recorded on the span and rethrown.
 */
export async function withSpan<T>(
  name: string,
  attributes: SpanAttributes,
  fn: () => Promise<T>,
  parent?: Context,
): Promise<T> {
  const tracer = trace.getTracer(TRACER_NAME);
  return tracer.startActiveSpan(name, { attributes }, parent ?? context.active(), async (span) => {
    try {
      const result = await fn();
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
