// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@features/context/trace-source`
 * Purpose: Where a root context's trace node comes from.
 * Scope: TraceSource union, constructors, and resolution to an OTel context. Does not start spans.
 * Invariants: Exactly one source backs a root context's trace node.
 * Side-effects: none (reads the ambient OTel context for "current")
 * Notes: "current" needs a registered context manager; without one it resolves to ROOT_CONTEXT.
 * Links: request-context.ts, propagation.ts
 * @public
 */

import {
  context,
  ROOT_CONTEXT,
  type TextMapPropagator,
  trace,
} from "@opentelemetry/api";

import type { SpanDescriptor, TraceNode } from "@/ports";

import { extractTraceNode, type HeaderCarrier } from "./propagation";

export type TraceSource =
  | { kind: "current" }
  | { kind: "remote"; descriptor: SpanDescriptor }
  | { kind: "context"; context: TraceNode }
  | { kind: "headers"; carrier: HeaderCarrier };

export const TraceSources = {
  /** Ambient active OTel context. */
  current: (): TraceSource => ({ kind: "current" }),
  /** Continue a span known by descriptor, typically received from another process. */
  remote: (descriptor: SpanDescriptor): TraceSource => ({
    kind: "remote",
    descriptor,
  }),
  /** An already-built OTel context, used as is. */
  context: (node: TraceNode): TraceSource => ({ kind: "context", context: node }),
  /** W3C traceparent/tracestate/baggage headers. */
  headers: (carrier: HeaderCarrier): TraceSource => ({
    kind: "headers",
    carrier,
  }),
} as const;

export function resolveTraceSource(
  source: TraceSource,
  propagator: TextMapPropagator
): TraceNode {
  switch (source.kind) {
    case "current":
      return context.active();
    case "remote":
      return trace.setSpanContext(ROOT_CONTEXT, source.descriptor);
    case "context":
      return source.context;
    case "headers":
      return extractTraceNode(propagator, source.carrier);
  }
}
