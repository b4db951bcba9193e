import type { AttributeValue, Meter, Tracer as OtelTracer } from "@opentelemetry/api";
import type { Logger as LogEmitter } from "@opentelemetry/api-logs";
import type { Counter, Gauge, Histogram, Registry } from "prom-client";
import type {
  ProfilingConfig,
  RecordingConfig,
  ServiceIdentity,
  TelemetryConfig
} from "@vigil/contracts";

// Capability interfaces for the subsystems the orchestrator owns. The default
// implementations live under telemetry/, profiling/ and recording/; tests
// substitute fakes.

export type ShutdownHook = () => Promise<void> | void;

/**
 * Shared export plumbing. Logger, metrics and tracer are built against it and
 * register their own teardown through {@link TelemetryCore.onShutdown}.
 */
export interface TelemetryCore {
  readonly identity: ServiceIdentity;
  readonly config: TelemetryConfig;
  readonly metricsRegistry: Registry;
  tracer(name: string, version?: string): OtelTracer;
  /** Undefined when log records are not exported. */
  logEmitter(name: string, version?: string): LogEmitter | undefined;
  /** A no-op meter when metrics are not exported. */
  meter(name: string, version?: string): Meter;
  onShutdown(name: string, hook: ShutdownHook): void;
  shutdown(): Promise<void>;
}

export type LogData = Record<string, unknown>;

export interface Logger {
  trace(msg: string, data?: LogData): void;
  debug(msg: string, data?: LogData): void;
  info(msg: string, data?: LogData): void;
  warn(msg: string, data?: LogData): void;
  error(msg: string, err?: Error | LogData): void;
  fatal(msg: string, err?: Error | LogData): void;
  child(bindings: LogData): Logger;
}

export interface HistogramOptions {
  labelNames?: readonly string[];
  buckets?: number[];
}

export interface Metrics {
  readonly contentType: string;
  counter(name: string, help: string, labelNames?: readonly string[]): Counter<string>;
  gauge(name: string, help: string, labelNames?: readonly string[]): Gauge<string>;
  histogram(name: string, help: string, options?: HistogramOptions): Histogram<string>;
  /** Prometheus text exposition; empty when metrics are disabled. */
  exposition(): Promise<string>;
}

export type SpanAttributes = Record<string, AttributeValue | undefined>;

export interface SpanHandle {
  setAttributes(attributes: SpanAttributes): void;
  addEvent(name: string, attributes?: SpanAttributes): void;
  setOk(): void;
  setError(error: unknown): void;
  end(): void;
}

export interface Tracer {
  startSpan(name: string, attributes?: SpanAttributes): SpanHandle;
  withSpan<T>(
    name: string,
    fn: (span: SpanHandle) => Promise<T> | T,
    attributes?: SpanAttributes
  ): Promise<T>;
}

export interface Profiler {
  /** Resolves with the location of the written profile, when there is one. */
  stop(): Promise<string | undefined>;
}

export interface Recorder {
  record(topic: string, message: unknown, logTime?: bigint): Promise<void>;
  close(): Promise<void>;
}

type Awaitable<T> = T | Promise<T>;

/**
 * Constructors for every subsystem, in the shape the orchestrator calls them.
 */
export interface SubsystemFactories {
  telemetry(identity: ServiceIdentity, config: TelemetryConfig): Awaitable<TelemetryCore>;
  logger(identity: ServiceIdentity, core: TelemetryCore): Awaitable<Logger>;
  metrics(identity: ServiceIdentity, core: TelemetryCore): Awaitable<Metrics>;
  tracer(identity: ServiceIdentity, core: TelemetryCore): Awaitable<Tracer>;
  profiler(identity: ServiceIdentity, config: ProfilingConfig): Awaitable<Profiler>;
  recorder(config: RecordingConfig): Awaitable<Recorder>;
}
