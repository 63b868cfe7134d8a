// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@features/context/propagation`
 * Purpose: W3C Trace Context + Baggage header codec for cross-process continuation.
 * Scope: Build the composite propagator; inject a trace node into headers; extract one from headers. Does not carry cancellation.
 * Invariants:
 *   - Extracted span contexts are marked isRemote
 *   - Missing or malformed traceparent yields a node without a span (fresh trace on first child)
 *   - Inject writes nothing for an invalid span context
 * Side-effects: none (mutates only the carrier passed in)
 * Links: trace-source.ts, request-context.ts (injectHeaders)
 * @public
 */

import {
  defaultTextMapGetter,
  defaultTextMapSetter,
  ROOT_CONTEXT,
  type TextMapPropagator,
} from "@opentelemetry/api";
import {
  CompositePropagator,
  W3CBaggagePropagator,
  W3CTraceContextPropagator,
} from "@opentelemetry/core";

import type { TraceNode } from "@/ports";

/** Inbound header record; Node's IncomingHttpHeaders fits. */
export type HeaderCarrier = Record<string, string | string[] | undefined>;

export function createW3CPropagator(): TextMapPropagator {
  return new CompositePropagator({
    propagators: [new W3CTraceContextPropagator(), new W3CBaggagePropagator()],
  });
}

export function extractTraceNode(
  propagator: TextMapPropagator,
  carrier: HeaderCarrier
): TraceNode {
  return propagator.extract(ROOT_CONTEXT, carrier, defaultTextMapGetter);
}

export function injectTraceNode(
  propagator: TextMapPropagator,
  node: TraceNode,
  carrier: Record<string, string> = {}
): Record<string, string> {
  propagator.inject(node, carrier, defaultTextMapSetter);
  return carrier;
}
