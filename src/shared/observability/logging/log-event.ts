// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@shared/observability/logging/log-event`
 * Purpose: Type-safe event logger that enforces event name registry and base fields.
 * Scope: Single function for logging structured events. Does not create loggers.
 * Invariants: event name MUST be from registry; traceId and spanId MUST be present.
 * Side-effects: IO (logging)
 * Notes: Lifecycle events default to debug; callers raise the level for failures.
 * Links: Uses EVENT_NAMES registry from events/index.ts; called by features/context (bootstrap logs its lifecycle events directly).
 * @public
 */

import type { Logger } from "pino";

import type { EventBase, EventName } from "../events";

export type EventLevel = "debug" | "info" | "warn" | "error";

/**
 * @param logger - Pino logger instance
 * @param eventName - Event name from EVENT_NAMES registry
 * @param fields - Event-specific fields (MUST include traceId, spanId)
 * @param level - Defaults to debug
 */
export function logEvent(
  logger: Logger,
  eventName: EventName,
  fields: EventBase & Record<string, unknown>,
  level: EventLevel = "debug"
): void {
  logger[level]({ event: eventName, ...fields }, eventName);
}
