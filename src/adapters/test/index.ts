// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@adapters/test`
 * Purpose: Barrel exports for test adapter implementations.
 * Scope: Re-exports all test adapters for clean imports. Does not contain logic.
 * Invariants: All test adapters exported; maintains same interface as real adapters.
 * Side-effects: none
 * Links: Used by tests/_fakes and by consumers' unit tests
 * @public
 */

export {
  type FakeSpanEvent,
  type FakeSpanRecord,
  FakeSpan,
  FakeTraceAdapter,
} from "./tracing/fake-trace.adapter";
