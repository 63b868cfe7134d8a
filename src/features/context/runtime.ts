// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@features/context/runtime`
 * Purpose: Explicit registry that creates root request contexts from injected capabilities.
 * Scope: current(), create(), run(). Does not own the tracer provider lifecycle (bootstrap/telemetry does).
 * Invariants:
 *   - No hidden globals: every context created here uses the deps passed to createContextRuntime()
 *   - current() = ambient trace source, no cancellation scope
 *   - run() ends the root guard on every exit path
 * Side-effects: none (contexts created here have IO when used)
 * Links: request-context.ts, bootstrap/telemetry.ts
 * @public
 */

import type { TextMapPropagator } from "@opentelemetry/api";
import type { Logger } from "pino";

import type { RootCancellationPolicy } from "@/core/context/public";
import type { CancellationCapability, TraceCapability } from "@/ports";

import { createW3CPropagator } from "./propagation";
import {
  type ContextDeps,
  RequestContext,
  type RootContextOptions,
  runScoped,
  type ScopedContext,
  type ScopedFn,
} from "./request-context";
import { TraceSources, type TraceSource } from "./trace-source";

export interface ContextRuntimeDeps {
  trace: TraceCapability;
  cancellation: CancellationCapability;
  log: Logger;
  /** Defaults to W3C Trace Context + Baggage. */
  propagator?: TextMapPropagator | undefined;
}

export interface ContextRuntime {
  current(): ScopedContext;
  create(
    source: TraceSource,
    policy: RootCancellationPolicy,
    options?: RootContextOptions
  ): ScopedContext;
  run<T>(
    source: TraceSource,
    policy: RootCancellationPolicy,
    fn: ScopedFn<T>,
    options?: RootContextOptions
  ): Promise<T>;
}

export function createContextRuntime(deps: ContextRuntimeDeps): ContextRuntime {
  const contextDeps: ContextDeps = {
    trace: deps.trace,
    cancellation: deps.cancellation,
    log: deps.log,
    propagator: deps.propagator ?? createW3CPropagator(),
  };

  const create = (
    source: TraceSource,
    policy: RootCancellationPolicy,
    options?: RootContextOptions
  ): ScopedContext => RequestContext.root(contextDeps, source, policy, options);

  return {
    current: () => create(TraceSources.current(), "none"),
    create,
    run: (source, policy, fn, options) =>
      runScoped(create(source, policy, options), fn),
  };
}
