// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@shared/env/invariants`
 * Purpose: Cross-field env invariants beyond the Zod schema.
 * Scope: Batch span processor sizing checks. Does NOT parse env.
 * Invariants: Throws EnvInvariantError on violation; pure over the parsed env.
 * Side-effects: none
 * Links: src/shared/env/server.ts
 * @public
 */

/**
 * Minimal type for env invariant validation.
 * Kept inline to avoid circular imports with server.ts
 */
interface ParsedBatchEnv {
  OTEL_TRACES_BATCH: boolean;
  OTEL_BSP_MAX_QUEUE_SIZE?: number | undefined;
  OTEL_BSP_MAX_EXPORT_BATCH_SIZE?: number | undefined;
}

/**
 * Asserts cross-field environment invariants that Zod can't express cleanly.
 * Called after Zod schema validation passes.
 *
 * @throws EnvInvariantError if invariants are violated
 */
export function assertEnvInvariants(env: ParsedBatchEnv): void {
  if (!env.OTEL_TRACES_BATCH) return;

  const queue = env.OTEL_BSP_MAX_QUEUE_SIZE;
  const batch = env.OTEL_BSP_MAX_EXPORT_BATCH_SIZE;
  if (queue !== undefined && batch !== undefined && batch > queue) {
    throw new EnvInvariantError(
      `OTEL_BSP_MAX_EXPORT_BATCH_SIZE (${batch}) must not exceed OTEL_BSP_MAX_QUEUE_SIZE (${queue})`
    );
  }
}

/**
 * Typed error for cross-field env violations.
 * Allows consumers to detect config issues without string matching.
 */
export class EnvInvariantError extends Error {
  readonly code = "ENV_INVARIANT_VIOLATED" as const;

  constructor(message: string) {
    super(message);
    this.name = "EnvInvariantError";
  }
}
