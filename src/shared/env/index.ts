// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@shared/env`
 * Purpose: Public surface for environment configuration.
 * Scope: Re-exports the validated telemetry env and its errors. Does not export internal schemas.
 * Invariants: Only re-exports public APIs.
 * Side-effects: process.env
 * Links: server.ts, invariants.ts
 * @public
 */

export { assertEnvInvariants, EnvInvariantError } from "./invariants";
export type { EnvValidationMeta, TelemetryEnv } from "./server";
export {
  EnvValidationError,
  parseTelemetryEnv,
  resetTelemetryEnv,
  telemetryEnv,
} from "./server";
