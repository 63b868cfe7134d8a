// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@features/context/public`
 * Purpose: Single entrypoint for the context feature - controlled API surface.
 * Scope: Re-exports context, guard, runtime, trace sources and propagation helpers. Does not expose internals.
 * Invariants: Single entry point per feature, stable public API
 * Side-effects: none
 * Links: Used by bootstrap and the package root barrel
 * @public
 */

export {
  createW3CPropagator,
  extractTraceNode,
  type HeaderCarrier,
  injectTraceNode,
} from "./propagation";
export {
  type ContextDeps,
  RequestContext,
  type RootContextOptions,
  runScoped,
  type ScopedContext,
  type ScopedFn,
} from "./request-context";
export {
  type ContextRuntime,
  type ContextRuntimeDeps,
  createContextRuntime,
} from "./runtime";
export { ScopeGuard, type ScopeGuardState } from "./scope-guard";
export {
  resolveTraceSource,
  type TraceSource,
  TraceSources,
} from "./trace-source";
