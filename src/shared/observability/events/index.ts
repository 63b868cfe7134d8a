// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@shared/observability/events`
 * Purpose: Event name registry for structured logging - prevents ad-hoc strings and schema drift.
 * Scope: Define valid event names as const registry and the base fields every event carries. Does not define full payload schemas.
 * Invariants: All event names registered here; logEvent() enforces base fields (traceId, spanId always).
 * Side-effects: none
 * Notes: Use EVENT_NAMES.* constants when logging.
 * Links: Used by logEvent() in logging/log-event.ts; consumed by features/context.
 * @public
 */

// ============================================================================
// Event Name Registry (as const)
// ============================================================================

export const EVENT_NAMES = {
  // Context lifecycle
  CONTEXT_CREATED: "context.created",
  CONTEXT_CHILD_SPAWNED: "context.child_spawned",
  CONTEXT_SPAN_ENDED: "context.span_ended",
  CONTEXT_SPAN_END_IGNORED: "context.span_end_ignored",
  CONTEXT_SCOPE_FAILED: "context.scope_failed",

  // Cancellation
  CANCELLATION_TRIGGERED: "cancellation.triggered",
  CANCELLATION_TRIGGER_TRANSFERRED: "cancellation.trigger_transferred",

  // Business data
  BUSINESS_DATA_INSERTED: "business_data.inserted",

  // Telemetry bootstrap
  TELEMETRY_STARTED: "telemetry.started",
  TELEMETRY_CONTEXT_MANAGER_SKIPPED: "telemetry.context_manager_skipped",
  TELEMETRY_SHUTDOWN: "telemetry.shutdown",
} as const;

export type EventName = (typeof EVENT_NAMES)[keyof typeof EVENT_NAMES];

// ============================================================================
// Base Field Enforcement (for logEvent() helper)
// ============================================================================

/**
 * Required base fields for all context events.
 * Ids come from the span the event concerns, not from the ambient context.
 */
export interface EventBase {
  traceId: string;
  spanId: string;
}
