// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@ports/cancellation.port`
 * Purpose: Cancellation capability consumed by the context layer.
 * Scope: Define scope creation and the observer/trigger split. Does NOT contain implementations.
 * Invariants:
 *   - Observer is shareable; done() is a broadcast, every waiter sees the same trigger
 *   - Trigger is the only way to cancel a scope; trigger() is idempotent
 *   - Cancellation is monotonic: once cancelled, always cancelled
 *   - Deadlines are the capability's policy, requested via NewScopeRequest.timeoutMs
 * Side-effects: none (interfaces only)
 * Links: AbortCancellationAdapter, features/context/scope-guard.ts
 * @public
 */

export interface CancellationObserver {
  readonly cancelled: boolean;
  /** Reason passed to trigger(), or the deadline error. */
  readonly reason: unknown;
  /** Abort signal that fires together with the scope. */
  readonly signal: AbortSignal;
  /** Resolves once the scope is cancelled. Same promise for every caller. */
  done(): Promise<void>;
}

export interface CancellationTrigger {
  trigger(reason?: unknown): void;
}

export interface CancellationScope {
  observer: CancellationObserver;
  trigger: CancellationTrigger;
}

export interface NewScopeRequest {
  timeoutMs?: number | undefined;
}

export interface CancellationCapability {
  newScope(request?: NewScopeRequest): CancellationScope;
}
