// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@shared/env/server`
 * Purpose: Telemetry environment variable validation and type-safe configuration schema using Zod.
 * Scope: Validates process.env for tracer provider and logger settings; provides lazy cached access. Does not build providers.
 * Invariants: Validated on first access; fails fast on invalid env; exporter default depends on NODE_ENV.
 * Side-effects: process.env
 * Notes: Standard OTEL_* names where OpenTelemetry defines one; PINO_LOG_LEVEL mirrors the logger factory.
 *        Lazy init so importing the library never throws.
 * Links: bootstrap/telemetry.ts (telemetryConfigFromEnv), invariants.ts
 * @public
 */

import { ZodError, z } from "zod";

import { assertEnvInvariants } from "./invariants";

export interface EnvValidationMeta {
  code: "INVALID_ENV";
  missing: string[];
  invalid: string[];
}

export class EnvValidationError extends Error {
  readonly meta: EnvValidationMeta;

  constructor(meta: EnvValidationMeta) {
    super(`Invalid telemetry env: ${JSON.stringify(meta)}`);
    this.name = "EnvValidationError";
    this.meta = meta;
  }
}

const booleanFlag = z
  .enum(["true", "false"])
  .default("false")
  .transform((value) => value === "true");

const positiveInt = z.coerce.number().int().positive();

const telemetrySchema = z.object({
  NODE_ENV: z
    .enum(["development", "test", "production"])
    .default("development"),

  // Resource identity
  OTEL_SERVICE_NAME: z.string().min(1).default("app"),

  // Exporter selection; unset resolves per NODE_ENV below
  OTEL_TRACES_EXPORTER: z.enum(["console", "memory", "none"]).optional(),
  OTEL_TRACE_ID_FORMAT: z.enum(["random", "time-ordered"]).default("random"),

  // Batch span processor (simple processor when disabled)
  OTEL_TRACES_BATCH: booleanFlag,
  OTEL_BSP_SCHEDULE_DELAY: positiveInt.optional(),
  OTEL_BSP_EXPORT_TIMEOUT: positiveInt.optional(),
  OTEL_BSP_MAX_QUEUE_SIZE: positiveInt.optional(),
  OTEL_BSP_MAX_EXPORT_BATCH_SIZE: positiveInt.optional(),

  PINO_LOG_LEVEL: z
    .enum(["trace", "debug", "info", "warn", "error"])
    .default("info"),
});

type ParsedTelemetryEnv = z.infer<typeof telemetrySchema>;

export type TelemetryEnv = Omit<ParsedTelemetryEnv, "OTEL_TRACES_EXPORTER"> & {
  OTEL_TRACES_EXPORTER: "console" | "memory" | "none";
  isDev: boolean;
  isTest: boolean;
  isProd: boolean;
};

/**
 * Parse an env record without touching the cache. Throws EnvValidationError.
 */
export function parseTelemetryEnv(
  source: Record<string, string | undefined>
): TelemetryEnv {
  try {
    const parsed = telemetrySchema.parse(source);
    assertEnvInvariants(parsed);

    const isDev = parsed.NODE_ENV === "development";
    return {
      ...parsed,
      // Local runs print spans; elsewhere exporters are opt-in
      OTEL_TRACES_EXPORTER:
        parsed.OTEL_TRACES_EXPORTER ?? (isDev ? "console" : "none"),
      isDev,
      isTest: parsed.NODE_ENV === "test",
      isProd: parsed.NODE_ENV === "production",
    };
  } catch (error) {
    if (error instanceof ZodError) {
      const missing = new Set<string>();
      const invalid = new Set<string>();

      for (const issue of error.issues) {
        const key = issue.path[0]?.toString();
        if (!key) continue;

        /*
         * Treat all invalid_type as missing (avoids any casting)
         */
        if (issue.code === "invalid_type") {
          missing.add(key);
        } else {
          invalid.add(key);
        }
      }

      throw new EnvValidationError({
        code: "INVALID_ENV",
        missing: [...missing],
        invalid: [...invalid],
      });
    }

    throw error;
  }
}

let ENV: TelemetryEnv | null = null;

export function telemetryEnv(): TelemetryEnv {
  if (ENV === null) {
    ENV = parseTelemetryEnv(process.env);
  }
  return ENV;
}

/** Drop the cached env; next telemetryEnv() re-reads process.env. */
export function resetTelemetryEnv(): void {
  ENV = null;
}
