// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@shared/observability/logging/redact`
 * Purpose: Redaction paths for sensitive data in logs.
 * Scope: Define paths to redact from log output. Does not implement redaction logic.
 * Invariants: Only redact known secret-bearing keys; trace ids and span ids stay visible.
 * Side-effects: none
 * Notes: Used by pino redact configuration during logger initialization.
 *        Baggage headers can carry user identifiers, so inbound carriers are redacted whole.
 * Links: Imported by logger module; defines sensitive path patterns.
 * @public
 */

export const REDACT_PATHS = [
  // Auth & secrets
  "password",
  "token",
  "access_token",
  "refresh_token",
  "secret",
  "apiKey",
  "api_key",
  // Propagation carriers
  "headers.authorization",
  "headers.cookie",
  "headers.baggage",
  "carrier.authorization",
  "carrier.cookie",
  "carrier.baggage",
];
