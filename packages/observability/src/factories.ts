import type { DestinationStream } from "pino";
import { startProfiler } from "./profiling/profiler.js";
import { openRecorder } from "./recording/recorder.js";
import { OpenTelemetryCore } from "./telemetry/core.js";
import { createLogger } from "./telemetry/logger.js";
import { createMetrics } from "./telemetry/metrics.js";
import { createTracer } from "./telemetry/tracer.js";
import type { SubsystemFactories } from "./subsystems.js";

export interface DefaultFactoryOptions {
  /** Where the subsystem logger writes; stdout when omitted. */
  logDestination?: DestinationStream;
}

/** The bundled collaborators: OpenTelemetry, pino, prom-client, node:inspector and MCAP. */
export function defaultFactories(options: DefaultFactoryOptions = {}): SubsystemFactories {
  return {
    telemetry: (identity, config) => OpenTelemetryCore.start(identity, config),
    logger: (identity, core) => createLogger(identity, core, { destination: options.logDestination }),
    metrics: (identity, core) => createMetrics(identity, core),
    tracer: (identity, core) => createTracer(identity, core),
    profiler: (identity, config) => startProfiler(identity, config),
    recorder: (config) => openRecorder(config)
  };
}
