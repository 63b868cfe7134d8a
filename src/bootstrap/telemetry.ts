// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@bootstrap/telemetry`
 * Purpose: Composition root for tracing - builds the tracer provider, capabilities and logger once, as an explicit handle.
 * Scope: Provider, exporter, span processor, id generator, context manager, propagator; runtime factory; flush/shutdown.
 *        Does NOT register a global tracer provider or ship network exporters.
 * Invariants:
 *   - One Telemetry handle per process, created by the caller and passed by reference (no module singleton)
 *   - exporter "none" installs no span processor; spans are still created and ended
 *   - batch === null selects the simple (synchronous) span processor
 *   - The global context manager is installed only when installContextManager is true, and removed on shutdown only if this handle installed it
 * Side-effects: IO (OTel context manager registration, exporter output, startup/shutdown logs)
 * Notes: Ambient TraceSources.current() needs the context manager; tests that only pass explicit sources can skip it.
 * Links: features/context/runtime.ts, shared/env/server.ts
 * @public
 */

import {
  context,
  type TextMapPropagator,
  type Tracer,
} from "@opentelemetry/api";
import { AsyncLocalStorageContextManager } from "@opentelemetry/context-async-hooks";
import { resourceFromAttributes } from "@opentelemetry/resources";
import {
  BasicTracerProvider,
  BatchSpanProcessor,
  type BufferConfig,
  ConsoleSpanExporter,
  InMemorySpanExporter,
  SimpleSpanProcessor,
  type SpanExporter,
  type SpanProcessor,
} from "@opentelemetry/sdk-trace-base";
import {
  ATTR_SERVICE_NAME,
  ATTR_SERVICE_VERSION,
} from "@opentelemetry/semantic-conventions";
import type { Logger } from "pino";

import {
  AbortCancellationAdapter,
  OtelTraceAdapter,
  TimeOrderedIdGenerator,
} from "@/adapters/server";
import {
  type ContextRuntime,
  createContextRuntime,
  createW3CPropagator,
} from "@/features/context/public";
import type { CancellationCapability, TraceCapability } from "@/ports";
import type { TelemetryEnv } from "@/shared/env";
import { EVENT_NAMES, makeLogger } from "@/shared/observability";

const TRACER_NAME = "scoped-context";

export type TracesExporterKind = "console" | "memory" | "none";
export type TraceIdFormat = "random" | "time-ordered";

export interface TelemetryConfig {
  serviceName: string;
  serviceVersion?: string | undefined;
  exporter: TracesExporterKind;
  traceIdFormat: TraceIdFormat;
  /** null selects SimpleSpanProcessor */
  batch: BufferConfig | null;
  installContextManager: boolean;
  log?: Logger | undefined;
}

export const DEFAULT_TELEMETRY_CONFIG: TelemetryConfig = {
  serviceName: "app",
  exporter: "none",
  traceIdFormat: "random",
  batch: null,
  installContextManager: true,
};

export interface Telemetry {
  readonly config: TelemetryConfig;
  readonly provider: BasicTracerProvider;
  readonly tracer: Tracer;
  readonly trace: TraceCapability;
  readonly cancellation: CancellationCapability;
  readonly propagator: TextMapPropagator;
  readonly log: Logger;
  /** Set only when exporter is "memory". */
  readonly memoryExporter: InMemorySpanExporter | null;
  createRuntime(): ContextRuntime;
  forceFlush(): Promise<void>;
  shutdown(): Promise<void>;
}

export function telemetryConfigFromEnv(env: TelemetryEnv): TelemetryConfig {
  return {
    serviceName: env.OTEL_SERVICE_NAME,
    exporter: env.OTEL_TRACES_EXPORTER,
    traceIdFormat: env.OTEL_TRACE_ID_FORMAT,
    batch: env.OTEL_TRACES_BATCH
      ? {
          ...(env.OTEL_BSP_SCHEDULE_DELAY !== undefined && {
            scheduledDelayMillis: env.OTEL_BSP_SCHEDULE_DELAY,
          }),
          ...(env.OTEL_BSP_EXPORT_TIMEOUT !== undefined && {
            exportTimeoutMillis: env.OTEL_BSP_EXPORT_TIMEOUT,
          }),
          ...(env.OTEL_BSP_MAX_QUEUE_SIZE !== undefined && {
            maxQueueSize: env.OTEL_BSP_MAX_QUEUE_SIZE,
          }),
          ...(env.OTEL_BSP_MAX_EXPORT_BATCH_SIZE !== undefined && {
            maxExportBatchSize: env.OTEL_BSP_MAX_EXPORT_BATCH_SIZE,
          }),
        }
      : null,
    installContextManager: true,
  };
}

export function createTelemetry(
  overrides: Partial<TelemetryConfig> = {}
): Telemetry {
  const config: TelemetryConfig = { ...DEFAULT_TELEMETRY_CONFIG, ...overrides };
  const log = config.log ?? makeLogger({ component: "telemetry" });

  const memoryExporter =
    config.exporter === "memory" ? new InMemorySpanExporter() : null;
  const exporter: SpanExporter | null =
    config.exporter === "console" ? new ConsoleSpanExporter() : memoryExporter;
  const spanProcessors: SpanProcessor[] = exporter
    ? [
        config.batch
          ? new BatchSpanProcessor(exporter, config.batch)
          : new SimpleSpanProcessor(exporter),
      ]
    : [];

  const provider = new BasicTracerProvider({
    resource: resourceFromAttributes({
      [ATTR_SERVICE_NAME]: config.serviceName,
      ...(config.serviceVersion !== undefined && {
        [ATTR_SERVICE_VERSION]: config.serviceVersion,
      }),
    }),
    spanProcessors,
    ...(config.traceIdFormat === "time-ordered" && {
      idGenerator: new TimeOrderedIdGenerator(),
    }),
  });
  const tracer = provider.getTracer(TRACER_NAME, config.serviceVersion);

  let contextManager: AsyncLocalStorageContextManager | null = null;
  if (config.installContextManager) {
    const candidate = new AsyncLocalStorageContextManager().enable();
    if (context.setGlobalContextManager(candidate)) {
      contextManager = candidate;
    } else {
      candidate.disable();
      log.warn(
        { event: EVENT_NAMES.TELEMETRY_CONTEXT_MANAGER_SKIPPED },
        "context manager already registered; keeping the existing one"
      );
    }
  }

  const trace = new OtelTraceAdapter(tracer);
  const cancellation = new AbortCancellationAdapter();
  const propagator = createW3CPropagator();

  log.info(
    {
      event: EVENT_NAMES.TELEMETRY_STARTED,
      serviceName: config.serviceName,
      exporter: config.exporter,
      batch: config.batch !== null,
      traceIdFormat: config.traceIdFormat,
    },
    EVENT_NAMES.TELEMETRY_STARTED
  );

  return {
    config,
    provider,
    tracer,
    trace,
    cancellation,
    propagator,
    log,
    memoryExporter,
    createRuntime: () =>
      createContextRuntime({ trace, cancellation, log, propagator }),
    forceFlush: () => provider.forceFlush(),
    shutdown: async () => {
      try {
        await provider.shutdown();
      } finally {
        if (contextManager !== null) {
          context.disable();
          contextManager = null;
        }
        log.info(
          { event: EVENT_NAMES.TELEMETRY_SHUTDOWN },
          EVENT_NAMES.TELEMETRY_SHUTDOWN
        );
      }
    },
  };
}
