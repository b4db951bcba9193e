export type {
  ObservabilityConfig,
  ObservabilityConfigInput,
  ServiceIdentity,
  ServiceIdentityInput
} from "@vigil/contracts";
export { createDiagnosticLogger, type DiagnosticSink } from "./diagnostics.js";
export {
  NotInitializedError,
  StartupError,
  TeardownError,
  ValidationError,
  type SubsystemName,
  type TeardownStep
} from "./errors.js";
export { defaultFactories, type DefaultFactoryOptions } from "./factories.js";
export { createServiceIdentity, resolveConfig } from "./identity.js";
export { Observability, type ObservabilityOptions } from "./observability.js";
export { withSession, type SessionOptions } from "./session.js";
export { getObservability, initObservability, shutdownObservability } from "./defaultInstance.js";
export type {
  HistogramOptions,
  LogData,
  Logger,
  Metrics,
  Profiler,
  Recorder,
  ShutdownHook,
  SpanAttributes,
  SpanHandle,
  SubsystemFactories,
  TelemetryCore,
  Tracer
} from "./subsystems.js";
export { AutoInstrumentationInUseError, buildResource, OpenTelemetryCore } from "./telemetry/core.js";
export { createLogger, type LoggerOptions } from "./telemetry/logger.js";
export { createMetrics, PrometheusMetrics } from "./telemetry/metrics.js";
export { createTracer, OtelTracerAdapter } from "./telemetry/tracer.js";
export { CpuProfiler, ProfileFlushError, ProfilerStoppedError, startProfiler } from "./profiling/profiler.js";
export { McapRecorder, openRecorder, RecorderClosedError, RecorderConfigError } from "./recording/recorder.js";
