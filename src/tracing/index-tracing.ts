/**
 * index-tracing.ts - OpenTelemetry spans around route index operations
 *
 * withIndexSpan() runs one operation inside a span named
 * "route_index <operation>". Attributes follow the OTel database semantic
 * conventions where they apply:
 *
 * | Attribute            | Value                                   |
 * |----------------------|-----------------------------------------|
 * | db.system            | Backend kind (e.g., "typesense")        |
 * | db.collection.name   | Collection the index is bound to        |
 * | db.operation.name    | Operation (e.g., "query", "add")        |
 * | route_index.*        | Operation-specific counts and sizes     |
 *
 * Thrown errors are recorded on the span with status ERROR and rethrown.
 */

import {
  SpanKind,
  SpanStatusCode,
  context,
  trace,
  type Attributes,
  type Span,
} from "@opentelemetry/api";
import { getTracer } from "./index";

export interface IndexSpanTarget {
  system: string;
  collection: string;
}

/**
 * Runs fn inside an active span so nested spans (e.g. HTTP instrumentation of
 * the backend client) become its children.
 *
 * @param target - Backend kind and collection name
 * @param operation - Operation name, used in the span name
 * @param attributes - Extra attributes known before the call starts
 * @param fn - The operation; receives the span to add result attributes
 */
export async function withIndexSpan<T>(
  target: IndexSpanTarget,
  operation: string,
  attributes: Attributes,
  fn: (span: Span) => Promise<T>
): Promise<T> {
  const span = getTracer().startSpan(`route_index ${operation}`, {
    kind: SpanKind.CLIENT,
    attributes: {
      "db.system": target.system,
      "db.collection.name": target.collection,
      "db.operation.name": operation,
      ...attributes,
    },
  });

  // context.with() keeps the span active across await boundaries
  const activeContext = trace.setSpan(context.active(), span);

  return context.with(activeContext, async () => {
    try {
      const result = await fn(span);
      span.setStatus({ code: SpanStatusCode.OK });
      return result;
    } catch (error) {
      const exception = error instanceof Error ? error : new Error(String(error));
      span.recordException(exception);
      span.setStatus({ code: SpanStatusCode.ERROR, message: exception.message });
      throw error;
    } finally {
      span.end();
    }
  });
}
