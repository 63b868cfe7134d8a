// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@tests/unit/core/context/cancellation-policy`
 * Purpose: Unit tests for cancellation policy normalization.
 * Scope: String policies, deadline objects, and rejected timeouts. Does NOT create scopes.
 * Invariants: Deadline objects normalize to kind "new".
 * Side-effects: none
 * Links: src/core/context/cancellation-policy.ts
 * @public
 */

import { describe, expect, it } from "vitest";

import {
  MAX_TIMEOUT_MS,
  resolveCancellationPolicy,
} from "@/core/context/public";

describe("core/context/resolveCancellationPolicy", () => {
  it.each(["new", "none", "inherit"] as const)("passes %s through", (policy) => {
    expect(resolveCancellationPolicy(policy)).toEqual({ kind: policy });
  });

  it("normalizes a deadline to a new scope with timeout", () => {
    expect(resolveCancellationPolicy({ timeoutMs: 250 })).toEqual({
      kind: "new",
      timeoutMs: 250,
    });
  });

  it("accepts a zero timeout", () => {
    expect(resolveCancellationPolicy({ timeoutMs: 0 })).toEqual({
      kind: "new",
      timeoutMs: 0,
    });
  });

  it("accepts the largest timer delay", () => {
    expect(resolveCancellationPolicy({ timeoutMs: MAX_TIMEOUT_MS })).toEqual({
      kind: "new",
      timeoutMs: 2_147_483_647,
    });
  });

  it("rejects a deadline longer than a timer can hold", () => {
    expect(() =>
      resolveCancellationPolicy({ timeoutMs: 30 * 24 * 60 * 60 * 1000 })
    ).toThrow("timeoutMs must not exceed 2147483647, got 2592000000");
    expect(() =>
      resolveCancellationPolicy({ timeoutMs: MAX_TIMEOUT_MS + 1 })
    ).toThrow(RangeError);
  });

  it.each([-1, Number.NaN, Number.POSITIVE_INFINITY])(
    "rejects timeoutMs %s",
    (timeoutMs) => {
      expect(() => resolveCancellationPolicy({ timeoutMs })).toThrow(RangeError);
    }
  );
});
