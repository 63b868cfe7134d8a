// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@tests/unit/shared/env/telemetry-env`
 * Purpose: Unit tests for telemetry env parsing, defaults, invariants and caching.
 * Scope: parseTelemetryEnv() over explicit records; telemetryEnv() cache over process.env. Does NOT build providers.
 * Invariants: process.env restored after each test.
 * Side-effects: process.env
 * Links: src/shared/env/server.ts, src/shared/env/invariants.ts
 * @public
 */

import { afterEach, describe, expect, it } from "vitest";

import {
  EnvInvariantError,
  EnvValidationError,
  parseTelemetryEnv,
  resetTelemetryEnv,
  telemetryEnv,
} from "@/shared/env";

const ORIGINAL_ENV = process.env;

function validationMeta(source: Record<string, string>) {
  try {
    parseTelemetryEnv(source);
  } catch (error) {
    if (error instanceof EnvValidationError) return error.meta;
    throw error;
  }
  throw new Error("expected EnvValidationError");
}

describe("shared/env/parseTelemetryEnv", () => {
  afterEach(() => {
    process.env = ORIGINAL_ENV;
    resetTelemetryEnv();
  });

  it("applies development defaults to an empty env", () => {
    const env = parseTelemetryEnv({});

    expect(env.NODE_ENV).toBe("development");
    expect(env.OTEL_SERVICE_NAME).toBe("app");
    expect(env.OTEL_TRACES_EXPORTER).toBe("console");
    expect(env.OTEL_TRACE_ID_FORMAT).toBe("random");
    expect(env.OTEL_TRACES_BATCH).toBe(false);
    expect(env.PINO_LOG_LEVEL).toBe("info");
    expect(env.isDev).toBe(true);
  });

  it.each(["test", "production"])(
    "defaults the exporter to none when NODE_ENV=%s",
    (nodeEnv) => {
      expect(parseTelemetryEnv({ NODE_ENV: nodeEnv }).OTEL_TRACES_EXPORTER).toBe(
        "none"
      );
    }
  );

  it("keeps an explicit exporter", () => {
    const env = parseTelemetryEnv({
      NODE_ENV: "production",
      OTEL_TRACES_EXPORTER: "memory",
    });

    expect(env.OTEL_TRACES_EXPORTER).toBe("memory");
    expect(env.isProd).toBe(true);
  });

  it("coerces batch settings", () => {
    const env = parseTelemetryEnv({
      OTEL_TRACES_BATCH: "true",
      OTEL_BSP_SCHEDULE_DELAY: "500",
      OTEL_BSP_MAX_QUEUE_SIZE: "100",
      OTEL_BSP_MAX_EXPORT_BATCH_SIZE: "50",
    });

    expect(env.OTEL_TRACES_BATCH).toBe(true);
    expect(env.OTEL_BSP_SCHEDULE_DELAY).toBe(500);
    expect(env.OTEL_BSP_MAX_QUEUE_SIZE).toBe(100);
    expect(env.OTEL_BSP_MAX_EXPORT_BATCH_SIZE).toBe(50);
  });

  it("reports invalid keys in the error meta", () => {
    expect(
      validationMeta({ OTEL_TRACES_EXPORTER: "jaeger", OTEL_BSP_MAX_QUEUE_SIZE: "0" })
    ).toEqual({
      code: "INVALID_ENV",
      missing: [],
      invalid: ["OTEL_TRACES_EXPORTER", "OTEL_BSP_MAX_QUEUE_SIZE"],
    });
  });

  it("rejects an export batch larger than the queue when batching", () => {
    expect(() =>
      parseTelemetryEnv({
        OTEL_TRACES_BATCH: "true",
        OTEL_BSP_MAX_QUEUE_SIZE: "10",
        OTEL_BSP_MAX_EXPORT_BATCH_SIZE: "20",
      })
    ).toThrow(EnvInvariantError);
  });

  it("ignores batch sizing when batching is off", () => {
    expect(
      parseTelemetryEnv({
        OTEL_BSP_MAX_QUEUE_SIZE: "10",
        OTEL_BSP_MAX_EXPORT_BATCH_SIZE: "20",
      }).OTEL_TRACES_BATCH
    ).toBe(false);
  });

  it("caches telemetryEnv() until reset", () => {
    process.env = { ...ORIGINAL_ENV, OTEL_SERVICE_NAME: "svc-a" };
    expect(telemetryEnv().OTEL_SERVICE_NAME).toBe("svc-a");

    process.env = { ...ORIGINAL_ENV, OTEL_SERVICE_NAME: "svc-b" };
    expect(telemetryEnv().OTEL_SERVICE_NAME).toBe("svc-a");

    resetTelemetryEnv();
    expect(telemetryEnv().OTEL_SERVICE_NAME).toBe("svc-b");
  });
});
