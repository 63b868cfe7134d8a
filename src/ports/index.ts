// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@ports`
 * Purpose: Hex entry file for port interfaces - canonical import surface.
 * Scope: Re-exports public port interfaces. Does not export implementations or runtime objects.
 * Invariants: Named exports only, no runtime coupling, no export *
 * Side-effects: none
 * Links: Used by features and adapters for port contracts
 * @public
 */

export type {
  CancellationCapability,
  CancellationObserver,
  CancellationScope,
  CancellationTrigger,
  NewScopeRequest,
} from "./cancellation.port";
export type {
  SpanAttributes,
  SpanAttributeValue,
  SpanDescriptor,
  SpanHandle,
  TraceCapability,
  TraceNode,
} from "./trace.port";
