// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@features/context/request-context`
 * Purpose: Composite request context - one handle bundling a trace node, a cancellation observer and the lineage's business data.
 * Scope: Root creation, child derivation, span annotation, cancellation waits, business data, baggage and header injection.
 *        Does not build tracer providers or cancellation scopes itself (ports do).
 * Invariants:
 *   - One BusinessDataStore per lineage, shared by reference with every descendant
 *   - One trace node per context; children get a new span parented to the caller's span (same traceId, new spanId)
 *   - Cancellation per policy: new = fresh scope owned by the new guard; none = absent; inherit = parent's observer, no trigger
 *   - Every creating call returns { ctx, guard }; the guard ends the span exactly once
 *   - done() resolves false without waiting when no scope is attached
 *   - The policy is validated first and the scope allocated last, after the trace node and span exist
 * Side-effects: IO (span start/end/annotations, debug logs)
 * Notes: Baggage lives in the trace node; setBaggage() swaps this node's OTel context for one carrying the entry.
 * Links: scope-guard.ts, trace-source.ts, runtime.ts, core/context/public.ts
 * @public
 */

import {
  context,
  INVALID_SPAN_CONTEXT,
  propagation,
  type SpanOptions,
  SpanStatusCode,
  type TextMapPropagator,
  trace,
} from "@opentelemetry/api";
import type { Logger } from "pino";

import {
  BusinessDataStore,
  type CancellationPolicy,
  type DataKey,
  resolveCancellationPolicy,
  type ResolvedCancellationPolicy,
  type RootCancellationPolicy,
} from "@/core/context/public";
import type {
  CancellationCapability,
  CancellationObserver,
  CancellationTrigger,
  SpanAttributes,
  SpanAttributeValue,
  SpanDescriptor,
  SpanHandle,
  TraceCapability,
  TraceNode,
} from "@/ports";
import { EVENT_NAMES, logEvent } from "@/shared/observability";

import { injectTraceNode } from "./propagation";
import { ScopeGuard } from "./scope-guard";
import { resolveTraceSource, type TraceSource } from "./trace-source";

/** Collaborators every context of a runtime shares. */
export interface ContextDeps {
  trace: TraceCapability;
  cancellation: CancellationCapability;
  propagator: TextMapPropagator;
  log: Logger;
}

export interface ScopedContext {
  ctx: RequestContext;
  guard: ScopeGuard;
}

export interface RootContextOptions {
  /** Start a fresh span under the source instead of guarding the source's own span. */
  spanName?: string | undefined;
  spanOptions?: SpanOptions | undefined;
}

export type ScopedFn<T> = (ctx: RequestContext, guard: ScopeGuard) => Promise<T> | T;

interface CancellationBinding {
  observer: CancellationObserver | undefined;
  trigger: CancellationTrigger | null;
}

export class RequestContext {
  private constructor(
    private readonly deps: ContextDeps,
    private readonly data: BusinessDataStore,
    private readonly cancellation: CancellationObserver | undefined,
    private node: TraceNode,
    /** Logger bound with this context's traceId and spanId */
    readonly log: Logger
  ) {}

  /**
   * Start a lineage: new store, trace node from `source`, cancellation per `policy`.
   */
  static root(
    deps: ContextDeps,
    source: TraceSource,
    policy: RootCancellationPolicy,
    options: RootContextOptions = {}
  ): ScopedContext {
    const resolved = resolveCancellationPolicy(policy);
    const sourceNode = resolveTraceSource(source, deps.propagator);
    let node = sourceNode;
    let started: SpanHandle | undefined;
    if (options.spanName !== undefined) {
      started = deps.trace.startSpan(
        options.spanName,
        sourceNode,
        options.spanOptions
      );
      node = trace.setSpan(sourceNode, started);
    }
    // Scope last: nothing after it can throw and strand its deadline timer
    const binding = bindCancellation(deps, resolved, undefined, started);

    const span = spanOf(node);
    const ctx = new RequestContext(
      deps,
      new BusinessDataStore(),
      binding.observer,
      node,
      boundLogger(deps.log, span)
    );
    const guardName = options.spanName ?? `context:${source.kind}`;
    const { traceId, spanId } = span.spanContext();
    logEvent(ctx.log, EVENT_NAMES.CONTEXT_CREATED, {
      traceId,
      spanId,
      source: source.kind,
      cancellable: binding.observer !== undefined,
    });

    return {
      ctx,
      guard: new ScopeGuard(guardName, span, binding.trigger, ctx.log),
    };
  }

  // --- business data -------------------------------------------------------

  insertBusinessData<T>(key: DataKey<T>, value: T): void {
    this.data.insert(key, value);
    const { traceId, spanId } = this.spanDescriptor();
    logEvent(this.log, EVENT_NAMES.BUSINESS_DATA_INSERTED, {
      traceId,
      spanId,
      key: key.name,
    });
  }

  getBusinessData<T>(key: DataKey<T>): T | undefined {
    return this.data.get(key);
  }

  hasBusinessData<T>(key: DataKey<T>): boolean {
    return this.data.has(key);
  }

  /** Names of business data keys written anywhere in this lineage. */
  businessDataKeys(): string[] {
    return this.data.keyNames();
  }

  // --- cancellation --------------------------------------------------------

  cancellationObserver(): CancellationObserver | undefined {
    return this.cancellation;
  }

  /**
   * Resolves true once the attached scope is cancelled; false right away when no scope is attached.
   */
  done(): Promise<boolean> {
    if (this.cancellation === undefined) {
      return Promise.resolve(false);
    }
    return this.cancellation.done().then(() => true);
  }

  isCancelled(): boolean {
    return this.cancellation?.cancelled ?? false;
  }

  /** AbortSignal of the attached scope, for fetch() and other signal-aware APIs. */
  signal(): AbortSignal | undefined {
    return this.cancellation?.signal;
  }

  // --- trace ---------------------------------------------------------------

  /** This node's OTel context; pass to context.with() or other OTel APIs. */
  get traceContext(): TraceNode {
    return this.node;
  }

  span(): SpanHandle {
    return spanOf(this.node);
  }

  hasActiveSpan(): boolean {
    return trace.getSpan(this.node) !== undefined;
  }

  spanDescriptor(): Readonly<SpanDescriptor> {
    return Object.freeze({ ...this.span().spanContext() });
  }

  setSpanAttribute(key: string, value: SpanAttributeValue): void {
    this.span().setAttribute(key, value);
  }

  setSpanAttributes(attributes: SpanAttributes): void {
    this.span().setAttributes(attributes);
  }

  addSpanEvent(name: string, attributes?: SpanAttributes): void {
    this.span().addEvent(name, attributes);
  }

  addSpanLink(descriptor: SpanDescriptor, attributes?: SpanAttributes): void {
    this.span().addLink(
      attributes ? { context: descriptor, attributes } : { context: descriptor }
    );
  }

  recordException(error: unknown): void {
    const span = this.span();
    const exception = error instanceof Error ? error : new Error(String(error));
    span.recordException(exception);
    span.setStatus({ code: SpanStatusCode.ERROR, message: exception.message });
  }

  // --- baggage & propagation -----------------------------------------------

  baggage(): Record<string, string> {
    const entries = propagation.getBaggage(this.node)?.getAllEntries() ?? [];
    return Object.fromEntries(entries.map(([key, entry]) => [key, entry.value]));
  }

  /** Children spawned afterwards inherit the entry; existing children do not. */
  setBaggage(key: string, value: string): void {
    const current =
      propagation.getBaggage(this.node) ?? propagation.createBaggage();
    this.node = propagation.setBaggage(
      this.node,
      current.setEntry(key, { value })
    );
  }

  removeBaggage(key: string): void {
    const current = propagation.getBaggage(this.node);
    if (!current) return;
    this.node = propagation.setBaggage(this.node, current.removeEntry(key));
  }

  /** Write traceparent, tracestate and baggage for an outbound call. */
  injectHeaders(carrier: Record<string, string> = {}): Record<string, string> {
    return injectTraceNode(this.deps.propagator, this.node, carrier);
  }

  // --- derivation ----------------------------------------------------------

  spawnChild(
    name: string,
    policy: CancellationPolicy,
    spanOptions?: SpanOptions
  ): ScopedContext {
    const resolved = resolveCancellationPolicy(policy);
    const span = this.deps.trace.startSpan(name, this.node, spanOptions);
    const binding = bindCancellation(
      this.deps,
      resolved,
      this.cancellation,
      span
    );
    const child = new RequestContext(
      this.deps,
      this.data,
      binding.observer,
      trace.setSpan(this.node, span),
      boundLogger(this.deps.log, span)
    );

    const { traceId, spanId } = span.spanContext();
    logEvent(child.log, EVENT_NAMES.CONTEXT_CHILD_SPAWNED, {
      traceId,
      spanId,
      parentSpanId: this.span().spanContext().spanId,
      spanName: name,
      cancellation: resolved.kind,
    });

    return {
      ctx: child,
      guard: new ScopeGuard(name, span, binding.trigger, child.log),
    };
  }

  /**
   * spawnChild() + runScoped(): the child's span ends when `fn` settles, on every path.
   */
  runChild<T>(
    name: string,
    policy: CancellationPolicy,
    fn: ScopedFn<T>,
    spanOptions?: SpanOptions
  ): Promise<T> {
    return runScoped(this.spawnChild(name, policy, spanOptions), fn);
  }
}

/**
 * Run `fn` with the context's trace node active. Failures are recorded on the span and rethrown;
 * the guard is ended in finally.
 */
export async function runScoped<T>(
  scoped: ScopedContext,
  fn: ScopedFn<T>
): Promise<T> {
  const { ctx, guard } = scoped;
  try {
    return await context.with(ctx.traceContext, () => fn(ctx, guard));
  } catch (error) {
    ctx.recordException(error);
    const { traceId, spanId } = ctx.spanDescriptor();
    logEvent(
      ctx.log,
      EVENT_NAMES.CONTEXT_SCOPE_FAILED,
      { traceId, spanId, spanName: guard.spanName, err: error },
      "warn"
    );
    throw error;
  } finally {
    guard.end();
  }
}

/**
 * Allocate the scope a resolved policy asks for. When the capability throws, the span
 * started for the new context is ended before rethrowing.
 */
function bindCancellation(
  deps: ContextDeps,
  resolved: ResolvedCancellationPolicy,
  parent: CancellationObserver | undefined,
  started: SpanHandle | undefined
): CancellationBinding {
  switch (resolved.kind) {
    case "none":
      return { observer: undefined, trigger: null };
    case "inherit":
      return { observer: parent, trigger: null };
    case "new": {
      try {
        const scope = deps.cancellation.newScope({
          timeoutMs: resolved.timeoutMs,
        });
        return { observer: scope.observer, trigger: scope.trigger };
      } catch (error) {
        started?.end();
        throw error;
      }
    }
  }
}

function spanOf(node: TraceNode): SpanHandle {
  return trace.getSpan(node) ?? trace.wrapSpanContext(INVALID_SPAN_CONTEXT);
}

function boundLogger(log: Logger, span: SpanHandle): Logger {
  const { traceId, spanId } = span.spanContext();
  return log.child({ traceId, spanId });
}
