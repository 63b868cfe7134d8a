// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@shared/observability/logging`
 * Purpose: Public API for structured logging across the library.
 * Scope: Re-export logger factory, event logger, redaction paths and Logger type. Does not implement logging transport.
 * Invariants: none
 * Side-effects: none
 * Notes: Import from this module, not from submodules.
 * Links: Delegates to logger, log-event and redact submodules.
 * @public
 */

export { type EventLevel, logEvent } from "./log-event";
export type { Logger } from "./logger";
export { activeSpanBindings, makeLogger, makeNoopLogger } from "./logger";
export { REDACT_PATHS } from "./redact";
