// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@adapters/server/cancellation/abort-cancellation`
 * Purpose: CancellationCapability over AbortController, with optional per-scope deadline.
 * Scope: Create scopes; split each into a shareable observer and a single trigger. Does not decide who owns the trigger.
 * Invariants:
 *   - One AbortController per scope; observer and trigger wrap the same controller
 *   - done() returns one cached promise per observer (broadcast, single abort listener)
 *   - trigger() after cancellation is a no-op; the first reason wins
 *   - timeoutMs outside [0, MAX_TIMEOUT_MS] throws RangeError before any controller exists
 *   - Deadline timers are unref'd and cleared as soon as the scope is cancelled
 * Side-effects: IO (timers when timeoutMs is set)
 * Links: Implements CancellationCapability; built by bootstrap/telemetry.ts
 * @internal
 */

import { MAX_TIMEOUT_MS } from "@/core/context/public";
import type {
  CancellationCapability,
  CancellationObserver,
  CancellationScope,
  CancellationTrigger,
  NewScopeRequest,
} from "@/ports";

/** Reason recorded when a scope's deadline fires before any explicit trigger. */
export class ScopeDeadlineExceededError extends Error {
  public readonly code = "SCOPE_DEADLINE_EXCEEDED" as const;

  constructor(public readonly timeoutMs: number) {
    super(`Cancellation scope deadline of ${timeoutMs}ms exceeded`);
    this.name = "ScopeDeadlineExceededError";
  }
}

class AbortScopeObserver implements CancellationObserver {
  private donePromise: Promise<void> | null = null;

  constructor(readonly signal: AbortSignal) {}

  get cancelled(): boolean {
    return this.signal.aborted;
  }

  get reason(): unknown {
    return this.signal.aborted ? this.signal.reason : undefined;
  }

  done(): Promise<void> {
    if (this.donePromise === null) {
      this.donePromise = this.signal.aborted
        ? Promise.resolve()
        : new Promise<void>((resolve) => {
            this.signal.addEventListener("abort", () => resolve(), {
              once: true,
            });
          });
    }
    return this.donePromise;
  }
}

class AbortScopeTrigger implements CancellationTrigger {
  constructor(private readonly controller: AbortController) {}

  trigger(reason?: unknown): void {
    if (this.controller.signal.aborted) return;
    this.controller.abort(reason);
  }
}

export class AbortCancellationAdapter implements CancellationCapability {
  newScope(request: NewScopeRequest = {}): CancellationScope {
    const { timeoutMs } = request;
    // setTimeout clamps larger delays to 1 ms
    if (
      timeoutMs !== undefined &&
      !(timeoutMs >= 0 && timeoutMs <= MAX_TIMEOUT_MS)
    ) {
      throw new RangeError(
        `timeoutMs must be within [0, ${MAX_TIMEOUT_MS}], got ${timeoutMs}`
      );
    }
    const controller = new AbortController();

    if (timeoutMs !== undefined) {
      const timer = setTimeout(() => {
        controller.abort(new ScopeDeadlineExceededError(timeoutMs));
      }, timeoutMs);
      timer.unref();
      controller.signal.addEventListener("abort", () => clearTimeout(timer), {
        once: true,
      });
    }

    return {
      observer: new AbortScopeObserver(controller.signal),
      trigger: new AbortScopeTrigger(controller),
    };
  }
}
