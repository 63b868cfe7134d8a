// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@shared/observability`
 * Purpose: Cross-cutting observability - event registry and logging.
 * Scope: Unified entry point for observability utilities. Does not implement logic.
 * Invariants: No imports from bootstrap, features or ports.
 * Side-effects: none
 * Links: Delegates to events and logging submodules.
 * @public
 */

export type { EventBase, EventName } from "./events";
export { EVENT_NAMES } from "./events";
export type { EventLevel, Logger } from "./logging";
export {
  activeSpanBindings,
  logEvent,
  makeLogger,
  makeNoopLogger,
  REDACT_PATHS,
} from "./logging";
