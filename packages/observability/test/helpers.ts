import { ProxyTracerProvider, createNoopMeter, type Meter, type Tracer as OtelTracer } from "@opentelemetry/api";
import type { LogRecord, Logger as LogEmitter } from "@opentelemetry/api-logs";
import type { DestinationStream } from "pino";
import { Registry } from "prom-client";
import type { ObservabilityConfigInput, ServiceIdentity, TelemetryConfig } from "@vigil/contracts";
import { createDiagnosticLogger } from "../src/diagnostics.js";
import type { SubsystemName, TeardownStep } from "../src/errors.js";
import { resolveConfig } from "../src/identity.js";
import type { Logger, ShutdownHook, SubsystemFactories, TelemetryCore } from "../src/subsystems.js";
import { PrometheusMetrics } from "../src/telemetry/metrics.js";
import { OtelTracerAdapter } from "../src/telemetry/tracer.js";

export type LogLine = Record<string, unknown>;

/** A pino destination that keeps every written line, parsed. */
export function memoryDestination(): { stream: DestinationStream; lines: LogLine[] } {
  const lines: LogLine[] = [];
  return {
    stream: {
      write(line: string) {
        lines.push(JSON.parse(line));
      }
    },
    lines
  };
}

export function captureDiagnostics() {
  const { stream, lines } = memoryDestination();
  return { sink: createDiagnosticLogger(stream), lines };
}

export function telemetryConfig(input: ObservabilityConfigInput["telemetry"] = {}): TelemetryConfig {
  return resolveConfig({ telemetry: input }).telemetry;
}

export class MemoryLogEmitter implements LogEmitter {
  readonly records: LogRecord[] = [];

  emit(record: LogRecord): void {
    this.records.push(record);
  }
}

const noopTracers = new ProxyTracerProvider();

interface FakeCoreOptions {
  tracer?: OtelTracer;
  emitter?: LogEmitter;
  meter?: Meter;
  events?: string[];
  failShutdown?: boolean;
}

export class FakeTelemetryCore implements TelemetryCore {
  readonly metricsRegistry = new Registry();
  readonly hookNames: string[] = [];
  shutdownCalls = 0;

  private readonly hooks: ShutdownHook[] = [];

  constructor(
    readonly identity: ServiceIdentity,
    readonly config: TelemetryConfig,
    private readonly options: FakeCoreOptions = {}
  ) {}

  tracer(name: string, version?: string): OtelTracer {
    return this.options.tracer ?? noopTracers.getTracer(name, version);
  }

  logEmitter(): LogEmitter | undefined {
    return this.options.emitter;
  }

  meter(): Meter {
    return this.options.meter ?? createNoopMeter();
  }

  onShutdown(name: string, hook: ShutdownHook): void {
    this.hookNames.push(name);
    this.hooks.push(hook);
  }

  async shutdown(): Promise<void> {
    this.shutdownCalls += 1;
    this.options.events?.push("shutdown:telemetry");
    for (const hook of this.hooks.splice(0).reverse()) {
      await hook();
    }
    if (this.options.failShutdown) {
      throw new Error("exporter unreachable");
    }
  }
}

const silentLogger: Logger = {
  trace: () => undefined,
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
  fatal: () => undefined,
  child: () => silentLogger
};

export interface FakeFactoryOptions {
  /** Constructor that throws. */
  failAt?: SubsystemName;
  /** Teardown steps that throw. */
  failTeardown?: TeardownStep[];
}

/**
 * Subsystem constructors that log a marker for every construct and teardown
 * call into `events`, and fail wherever asked to.
 */
export function fakeFactories(options: FakeFactoryOptions = {}) {
  const events: string[] = [];
  const cores: FakeTelemetryCore[] = [];
  const failTeardown = new Set(options.failTeardown ?? []);

  const construct = <T>(subsystem: SubsystemName, build: () => T): T => {
    events.push(`create:${subsystem}`);
    if (options.failAt === subsystem) {
      throw new Error(`${subsystem} exploded`);
    }
    return build();
  };

  const factories: SubsystemFactories = {
    telemetry: (identity, config) =>
      construct("telemetry", () => {
        const core = new FakeTelemetryCore(identity, config, {
          events,
          failShutdown: failTeardown.has("telemetry")
        });
        cores.push(core);
        return core;
      }),
    logger: () => construct("logger", () => silentLogger),
    metrics: (_identity, core) =>
      construct("metrics", () => new PrometheusMetrics(core.metricsRegistry, core.config.metrics)),
    tracer: (identity, core) =>
      construct("tracer", () => new OtelTracerAdapter(core.tracer(identity.name, identity.version))),
    profiler: async () =>
      construct("profiler", () => ({
        async stop() {
          events.push("stop:profiler");
          if (failTeardown.has("profiler")) {
            throw new Error("profile write failed");
          }
          return "fake.cpuprofile";
        }
      })),
    recorder: async () =>
      construct("recorder", () => ({
        async record(topic: string) {
          events.push(`record:${topic}`);
        },
        async close() {
          events.push("close:recorder");
          if (failTeardown.has("recorder")) {
            throw new Error("disk full");
          }
        }
      }))
  };

  return { factories, events, cores };
}

export const allEnabled: ObservabilityConfigInput = {
  profiling: { enabled: true },
  recording: { enabled: true, path: "unused.mcap" }
};
