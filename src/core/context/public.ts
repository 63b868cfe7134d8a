// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@core/context/public`
 * Purpose: Public surface of the pure context domain.
 * Scope: Re-exports only. Does not implement logic.
 * Invariants: none
 * Side-effects: none
 * Links: data-key, business-data-store, cancellation-policy, errors
 * @public
 */

export { BusinessDataStore } from "./business-data-store";
export type {
  CancellationPolicy,
  NewScopeOptions,
  ResolvedCancellationPolicy,
  RootCancellationPolicy,
} from "./cancellation-policy";
export {
  MAX_TIMEOUT_MS,
  resolveCancellationPolicy,
} from "./cancellation-policy";
export { DataKey, type DataStoreToken, defineDataKey } from "./data-key";
export {
  BusinessDataValidationError,
  CancellationOwnershipError,
  isBusinessDataValidationError,
  isCancellationOwnershipError,
} from "./errors";
