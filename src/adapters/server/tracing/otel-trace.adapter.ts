// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@adapters/server/tracing/otel-trace`
 * Purpose: TraceCapability backed by an OpenTelemetry Tracer.
 * Scope: Start spans under an explicit parent context. Does not create providers or exporters.
 * Invariants: Parent is always the passed context, never context.active().
 * Side-effects: IO (span start; export handled by the provider's processors)
 * Links: Implements TraceCapability; built by bootstrap/telemetry.ts
 * @internal
 */

import type { SpanOptions, Tracer } from "@opentelemetry/api";

import type { SpanHandle, TraceCapability, TraceNode } from "@/ports";

export class OtelTraceAdapter implements TraceCapability {
  constructor(private readonly tracer: Tracer) {}

  startSpan(name: string, parent: TraceNode, options?: SpanOptions): SpanHandle {
    return this.tracer.startSpan(name, options, parent);
  }
}
