// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@tests/unit/adapters/server/time-ordered-id`
 * Purpose: Unit tests for the time-ordered trace id generator.
 * Scope: Id shape, timestamp prefix, ordering across milliseconds. Does NOT test the SDK wiring.
 * Invariants: Time injected via FakeClock.
 * Side-effects: none
 * Links: src/adapters/server/tracing/time-ordered-id.generator.ts
 * @public
 */

import { describe, expect, it } from "vitest";

import { TimeOrderedIdGenerator } from "@/adapters/server";
import { FakeClock } from "@tests/_fakes";

describe("adapters/server/TimeOrderedIdGenerator", () => {
  it("emits 32-char lowercase hex trace ids prefixed by the millisecond clock", () => {
    const clock = new FakeClock("2025-01-01T00:00:00.000Z");
    const generator = new TimeOrderedIdGenerator(clock.now);

    const traceId = generator.generateTraceId();

    expect(traceId).toMatch(/^[0-9a-f]{32}$/);
    // 1735689600000 ms = 0x1941f297c00
    expect(traceId.slice(0, 12)).toBe("01941f297c00");
  });

  it("emits 16-char lowercase hex span ids", () => {
    const generator = new TimeOrderedIdGenerator();

    expect(generator.generateSpanId()).toMatch(/^[0-9a-f]{16}$/);
  });

  it("orders trace ids from later milliseconds after earlier ones", () => {
    const clock = new FakeClock();
    const generator = new TimeOrderedIdGenerator(clock.now);

    const earlier = generator.generateTraceId();
    clock.advance(1);
    const later = generator.generateTraceId();

    expect(later > earlier).toBe(true);
  });

  it("clamps negative clocks to a zero prefix", () => {
    const generator = new TimeOrderedIdGenerator(() => -5);

    expect(generator.generateTraceId().slice(0, 12)).toBe("000000000000");
  });
});
