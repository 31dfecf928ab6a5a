/**
 * @module otel
 * @description OpenTelemetry hooks. Without a registered SDK the API
 * returns no active span and every call here is a no-op.
 */

import { trace, type AttributeValue, type Span } from "@opentelemetry/api";

export function getActiveSpan(): Span | undefined {
  return trace.getActiveSpan();
}

/** Sets the non-null attributes on `span`, if there is one. */
export function setSpanAttributes(
  span: Span | undefined,
  attrs: Record<string, AttributeValue | null | undefined>
): void {
  if (!span) return;

  Object.entries(attrs).forEach(([key, value]) => {
    if (value != null) {
      span.setAttribute(key, value);
    }
  });
}
