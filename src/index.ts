// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `scoped-context`
 * Purpose: Package entrypoint - request contexts bundling a trace node, cooperative cancellation and lineage-wide business data.
 * Scope: Re-exports the public surface of core, features, adapters, bootstrap and env. Test doubles live under `@/adapters/test`.
 * Invariants: Named exports only; no side effects at import time.
 * Side-effects: none
 * Links: bootstrap/telemetry.ts, features/context/public.ts
 * @public
 */

export {
  AbortCancellationAdapter,
  OtelTraceAdapter,
  ScopeDeadlineExceededError,
  TimeOrderedIdGenerator,
} from "./adapters/server";
export {
  createTelemetry,
  DEFAULT_TELEMETRY_CONFIG,
  type Telemetry,
  type TelemetryConfig,
  telemetryConfigFromEnv,
  type TraceIdFormat,
  type TracesExporterKind,
} from "./bootstrap/telemetry";
export {
  BusinessDataValidationError,
  type CancellationPolicy,
  CancellationOwnershipError,
  DataKey,
  defineDataKey,
  isBusinessDataValidationError,
  isCancellationOwnershipError,
  type NewScopeOptions,
  type RootCancellationPolicy,
} from "./core/context/public";
export {
  type ContextDeps,
  type ContextRuntime,
  type ContextRuntimeDeps,
  createContextRuntime,
  createW3CPropagator,
  extractTraceNode,
  type HeaderCarrier,
  injectTraceNode,
  RequestContext,
  type RootContextOptions,
  runScoped,
  type ScopedContext,
  type ScopedFn,
  ScopeGuard,
  type ScopeGuardState,
  type TraceSource,
  TraceSources,
} from "./features/context/public";
export type {
  CancellationCapability,
  CancellationObserver,
  CancellationScope,
  CancellationTrigger,
  NewScopeRequest,
  SpanAttributes,
  SpanAttributeValue,
  SpanDescriptor,
  SpanHandle,
  TraceCapability,
  TraceNode,
} from "./ports";
export {
  EnvInvariantError,
  EnvValidationError,
  parseTelemetryEnv,
  resetTelemetryEnv,
  type TelemetryEnv,
  telemetryEnv,
} from "./shared/env";
export { makeLogger, makeNoopLogger } from "./shared/observability";
