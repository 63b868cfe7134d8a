// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@ports/trace.port`
 * Purpose: Trace capability consumed by the context layer: span creation under an explicit parent.
 * Scope: Define TraceCapability plus the span and descriptor shapes. Does NOT contain implementations or exporter setup.
 * Invariants:
 *   - startSpan() never reads the ambient context; the parent is always passed in
 *   - A child of a span with a valid context shares its traceId and gets a new spanId
 *   - SpanHandle calls are synchronous; export happens inside the capability's pipeline
 * Side-effects: none (interfaces only)
 * Notes: Shapes are the @opentelemetry/api ones so any OTel tracer can back the port.
 * Links: OtelTraceAdapter, FakeTraceAdapter, features/context/request-context.ts
 * @public
 */

import type {
  Attributes,
  AttributeValue,
  Context,
  Span,
  SpanContext,
  SpanOptions,
} from "@opentelemetry/api";

/** Live span: setAttribute, addEvent, addLink, end. */
export type SpanHandle = Span;

/**
 * Immutable, propagable span identity:
 * traceId (32 hex), spanId (16 hex), traceFlags, isRemote, traceState.
 */
export type SpanDescriptor = SpanContext;

/** Trace-context node; holds the current span and baggage. */
export type TraceNode = Context;

export type SpanAttributes = Attributes;
export type SpanAttributeValue = AttributeValue;

export interface TraceCapability {
  /**
   * Start a span whose parent is the span held by `parent` (root span when it holds none).
   */
  startSpan(name: string, parent: TraceNode, options?: SpanOptions): SpanHandle;
}
