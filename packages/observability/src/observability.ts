import type {
  ObservabilityConfig,
  ObservabilityConfigInput,
  ServiceIdentity,
  ServiceIdentityInput
} from "@vigil/contracts";
import { createDiagnosticLogger, type DiagnosticSink } from "./diagnostics.js";
import { StartupError, TeardownError, type SubsystemName, type TeardownStep } from "./errors.js";
import { defaultFactories } from "./factories.js";
import { createServiceIdentity, resolveConfig } from "./identity.js";
import type {
  Logger,
  Metrics,
  Profiler,
  Recorder,
  SubsystemFactories,
  TelemetryCore,
  Tracer
} from "./subsystems.js";

export interface ObservabilityOptions {
  /** Subsystem constructors; the bundled collaborators when omitted. */
  factories?: SubsystemFactories;
  /** Sink for teardown failures; a stderr pino logger when omitted. */
  diagnostics?: DiagnosticSink;
}

/** The slots shutdown tears down. Each is cleared once its step has run. */
interface TeardownSlots {
  telemetry?: TelemetryCore;
  profiler?: Profiler;
  recorder?: Recorder;
}

interface Subsystems {
  telemetry: TelemetryCore;
  logger: Logger;
  metrics: Metrics;
  tracer: Tracer;
  profiler?: Profiler;
  recorder?: Recorder;
}

/**
 * Runs profiler stop, recorder close and telemetry shutdown in that order,
 * continuing past failures. Every failure is reported to `diagnostics`; all of
 * them are returned in the order they happened.
 */
async function teardown(slots: TeardownSlots, diagnostics: DiagnosticSink): Promise<TeardownError[]> {
  const failures: TeardownError[] = [];

  const attempt = async (step: TeardownStep, action: () => Promise<unknown>): Promise<void> => {
    try {
      await action();
    } catch (error) {
      const failure = new TeardownError(step, error);
      diagnostics.error({ err: failure, step }, failure.message);
      failures.push(failure);
    }
  };

  const { profiler, recorder, telemetry } = slots;

  if (profiler) {
    await attempt("profiler", () => profiler.stop());
    slots.profiler = undefined;
  }

  if (recorder) {
    await attempt("recorder", () => recorder.close());
    slots.recorder = undefined;
  }

  // Logger, metrics and tracer are flushed by the core through the hooks they registered.
  if (telemetry) {
    await attempt("telemetry", () => telemetry.shutdown());
    slots.telemetry = undefined;
  }

  return failures;
}

/**
 * Aggregate handle over every active telemetry subsystem.
 *
 * Build one with {@link Observability.create} and release it with
 * {@link Observability.shutdown}, or let {@link withSession} do both.
 *
 * @example
 * ```ts
 * const observability = await Observability.create(
 *   { name: "checkout", environment: "production" },
 *   { profiling: { enabled: true } }
 * );
 * observability.logger.info("ready");
 * await observability.shutdown();
 * ```
 */
export class Observability {
  readonly identity: Readonly<ServiceIdentity>;
  readonly config: ObservabilityConfig;
  readonly logger: Logger;
  readonly metrics: Metrics;
  readonly tracer: Tracer;

  private readonly slots: TeardownSlots;
  private readonly diagnostics: DiagnosticSink;
  private shutdownPromise: Promise<void> | undefined;

  private constructor(
    identity: Readonly<ServiceIdentity>,
    config: ObservabilityConfig,
    subsystems: Subsystems,
    diagnostics: DiagnosticSink
  ) {
    this.identity = identity;
    this.config = config;
    this.logger = subsystems.logger;
    this.metrics = subsystems.metrics;
    this.tracer = subsystems.tracer;
    this.slots = {
      telemetry: subsystems.telemetry,
      profiler: subsystems.profiler,
      recorder: subsystems.recorder
    };
    this.diagnostics = diagnostics;
  }

  /**
   * Build telemetry-core, then logger, metrics and tracer against it, then the
   * profiler and recorder when their `enabled` flags are set.
   *
   * Any constructor failure aborts startup with a {@link StartupError}. The
   * subsystems already built by this call are torn down before it is thrown.
   *
   * @throws {ValidationError} If the identity or the configuration is invalid.
   * @throws {StartupError} If a subsystem fails to start.
   */
  static async create(
    identityInput: ServiceIdentityInput,
    configInput: ObservabilityConfigInput = {},
    options: ObservabilityOptions = {}
  ): Promise<Observability> {
    const identity = createServiceIdentity(identityInput);
    const config = resolveConfig(configInput);
    const factories = options.factories ?? defaultFactories();
    const diagnostics = options.diagnostics ?? createDiagnosticLogger();
    const built: TeardownSlots = {};

    const start = async <T>(subsystem: SubsystemName, construct: () => T | Promise<T>): Promise<T> => {
      try {
        return await construct();
      } catch (error) {
        const failure = new StartupError(subsystem, error);
        const leftovers = await teardown(built, diagnostics);
        if (leftovers.length > 0) {
          diagnostics.warn(
            { subsystem, failed: leftovers.map((leftover) => leftover.step) },
            "startup rollback left resources behind"
          );
        }
        throw failure;
      }
    };

    const telemetry = await start("telemetry", () => factories.telemetry(identity, config.telemetry));
    built.telemetry = telemetry;

    const logger = await start("logger", () => factories.logger(identity, telemetry));
    const metrics = await start("metrics", () => factories.metrics(identity, telemetry));
    const tracer = await start("tracer", () => factories.tracer(identity, telemetry));

    let profiler: Profiler | undefined;
    if (config.profiling.enabled) {
      profiler = await start("profiler", () => factories.profiler(identity, config.profiling));
      built.profiler = profiler;
    }

    let recorder: Recorder | undefined;
    if (config.recording.enabled) {
      recorder = await start("recorder", () => factories.recorder(config.recording));
      built.recorder = recorder;
    }

    return new Observability(
      identity,
      config,
      { telemetry, logger, metrics, tracer, profiler, recorder },
      diagnostics
    );
  }

  /** Absent unless profiling was enabled at creation. */
  get profiler(): Profiler | undefined {
    return this.slots.profiler;
  }

  /** Absent unless recording was enabled at creation. */
  get recorder(): Recorder | undefined {
    return this.slots.recorder;
  }

  get isShutdown(): boolean {
    return this.shutdownPromise !== undefined;
  }

  /**
   * Stop the profiler, close the recorder, then shut telemetry down. Every
   * step runs even when an earlier one fails; all failures are reported to
   * the diagnostic sink and the first one is what the promise rejects with.
   *
   * Teardown runs once. Later calls get the promise of the first.
   */
  shutdown(): Promise<void> {
    this.shutdownPromise ??= this.runShutdown();
    return this.shutdownPromise;
  }

  private async runShutdown(): Promise<void> {
    const [first] = await teardown(this.slots, this.diagnostics);
    if (first) {
      throw first;
    }
  }
}
