// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@core/context/cancellation-policy`
 * Purpose: How a newly created context obtains its cancellation observer.
 * Scope: Policy union and normalization. Does not create scopes or observers.
 * Invariants:
 *   - "new": a fresh scope; the paired guard is the only holder of its trigger
 *   - "none": no scope; done() never waits
 *   - "inherit": parent's observer reused verbatim; guard holds no trigger
 *   - Deadlines lie in [0, MAX_TIMEOUT_MS]; longer delays would fire at once
 *   - Root contexts have no parent, so "inherit" is not accepted there (type-level)
 * Side-effects: none
 * Links: features/context/request-context.ts
 * @public
 */

/** Largest delay a timer can hold (2^31 - 1 ms, about 24.8 days). */
export const MAX_TIMEOUT_MS = 2_147_483_647;

/** "new" with a deadline owned by the cancellation capability. */
export interface NewScopeOptions {
  timeoutMs: number;
}

export type CancellationPolicy = "new" | "none" | "inherit" | NewScopeOptions;

export type RootCancellationPolicy = Exclude<CancellationPolicy, "inherit">;

export type ResolvedCancellationPolicy =
  | { kind: "new"; timeoutMs?: number | undefined }
  | { kind: "none" }
  | { kind: "inherit" };

export function resolveCancellationPolicy(
  policy: CancellationPolicy
): ResolvedCancellationPolicy {
  if (typeof policy === "object") {
    if (!Number.isFinite(policy.timeoutMs) || policy.timeoutMs < 0) {
      throw new RangeError(
        `timeoutMs must be a non-negative finite number, got ${policy.timeoutMs}`
      );
    }
    if (policy.timeoutMs > MAX_TIMEOUT_MS) {
      throw new RangeError(
        `timeoutMs must not exceed ${MAX_TIMEOUT_MS}, got ${policy.timeoutMs}`
      );
    }
    return { kind: "new", timeoutMs: policy.timeoutMs };
  }
  return { kind: policy };
}
