// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@features/context/scope-guard`
 * Purpose: Lifetime handle paired with every created or derived context.
 * Scope: End the guarded span exactly once; hold the cancellation trigger when this guard introduced the scope. Does not create contexts.
 * Invariants:
 *   - State machine active -> ended, one-way; span.end() runs on that transition only
 *   - Only a guard created with policy "new" holds a trigger; inheriting guards never do
 *   - end() never triggers cancellation; the trigger stays with the guard
 *   - cancel()/takeTrigger() without a trigger throw CancellationOwnershipError
 * Side-effects: IO (span end, cancellation trigger, debug logs)
 * Notes: A second end() is ignored and logged; scoped helpers call end() in finally, so an explicit end inside them is safe.
 * Links: request-context.ts, core/context/errors.ts
 * @public
 */

import type { Logger } from "pino";

import { CancellationOwnershipError } from "@/core/context/public";
import type { CancellationTrigger, SpanHandle } from "@/ports";
import { EVENT_NAMES, logEvent } from "@/shared/observability";

export type ScopeGuardState = "active" | "ended";

export class ScopeGuard {
  private currentState: ScopeGuardState = "active";
  private trigger: CancellationTrigger | null;

  constructor(
    /** Span name, for errors and logs */
    readonly spanName: string,
    private readonly span: SpanHandle,
    trigger: CancellationTrigger | null,
    private readonly log: Logger
  ) {
    this.trigger = trigger;
  }

  get state(): ScopeGuardState {
    return this.currentState;
  }

  get ended(): boolean {
    return this.currentState === "ended";
  }

  /** True while this guard holds the trigger of the scope it introduced. */
  get ownsCancellation(): boolean {
    return this.trigger !== null;
  }

  end(): void {
    const { traceId, spanId } = this.span.spanContext();
    if (this.currentState === "ended") {
      logEvent(this.log, EVENT_NAMES.CONTEXT_SPAN_END_IGNORED, {
        traceId,
        spanId,
        spanName: this.spanName,
      });
      return;
    }

    this.currentState = "ended";
    this.span.end();
    logEvent(this.log, EVENT_NAMES.CONTEXT_SPAN_ENDED, {
      traceId,
      spanId,
      spanName: this.spanName,
    });
  }

  /**
   * Trigger the scope this guard introduced. Allowed after end(): ownership outlives the span.
   * @throws CancellationOwnershipError when the guard holds no trigger
   */
  cancel(reason?: unknown): void {
    if (this.trigger === null) {
      throw new CancellationOwnershipError(this.spanName, "cancel");
    }
    this.trigger.trigger(reason);
    const { traceId, spanId } = this.span.spanContext();
    logEvent(this.log, EVENT_NAMES.CANCELLATION_TRIGGERED, {
      traceId,
      spanId,
      spanName: this.spanName,
    });
  }

  /** end() followed by cancel() when a trigger is held; never throws on ownership. */
  endAndCancel(reason?: unknown): void {
    this.end();
    if (this.trigger !== null) {
      this.cancel(reason);
    }
  }

  /**
   * Move the trigger out of the guard. The guard stops owning the scope.
   * @throws CancellationOwnershipError when the guard holds no trigger (never had one, or already handed off)
   */
  takeTrigger(): CancellationTrigger {
    const trigger = this.trigger;
    if (trigger === null) {
      throw new CancellationOwnershipError(this.spanName, "takeTrigger");
    }
    this.trigger = null;
    const { traceId, spanId } = this.span.spanContext();
    logEvent(this.log, EVENT_NAMES.CANCELLATION_TRIGGER_TRANSFERRED, {
      traceId,
      spanId,
      spanName: this.spanName,
    });
    return trigger;
  }
}
