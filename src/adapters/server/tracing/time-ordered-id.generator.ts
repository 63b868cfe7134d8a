// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@adapters/server/tracing/time-ordered-id`
 * Purpose: OTel IdGenerator whose trace ids sort by creation time.
 * Scope: Trace id = 48-bit millisecond timestamp + 80 random bits; span id = 64 random bits. Does not touch span state.
 * Invariants:
 *   - Trace ids are 32 lowercase hex chars, span ids 16; neither is ever all zeros
 *   - Trace ids from later milliseconds compare greater as strings
 * Side-effects: none (reads time and RNG)
 * Notes: Selected with OTEL_TRACE_ID_FORMAT=time-ordered.
 * Links: bootstrap/telemetry.ts
 * @internal
 */

import { randomBytes } from "node:crypto";

import type { IdGenerator } from "@opentelemetry/sdk-trace-base";

const TIMESTAMP_HEX_LENGTH = 12;
const MAX_TIMESTAMP = 0xffff_ffff_ffff;

export class TimeOrderedIdGenerator implements IdGenerator {
  constructor(private readonly now: () => number = Date.now) {}

  generateTraceId(): string {
    const millis = Math.min(Math.max(0, Math.floor(this.now())), MAX_TIMESTAMP);
    const prefix = millis.toString(16).padStart(TIMESTAMP_HEX_LENGTH, "0");
    return prefix + nonZeroHex(10);
  }

  generateSpanId(): string {
    return nonZeroHex(8);
  }
}

function nonZeroHex(bytes: number): string {
  const buf = randomBytes(bytes);
  if (buf.every((b) => b === 0)) {
    buf[bytes - 1] = 1;
  }
  return buf.toString("hex");
}
