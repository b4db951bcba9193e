import {
  ProxyTracerProvider,
  context,
  createNoopMeter,
  propagation,
  type Meter,
  type Tracer as OtelTracer
} from "@opentelemetry/api";
import type { Logger as LogEmitter } from "@opentelemetry/api-logs";
import { getNodeAutoInstrumentations } from "@opentelemetry/auto-instrumentations-node";
import { AsyncLocalStorageContextManager } from "@opentelemetry/context-async-hooks";
import { OTLPLogExporter } from "@opentelemetry/exporter-logs-otlp-http";
import { OTLPMetricExporter } from "@opentelemetry/exporter-metrics-otlp-http";
import { OTLPTraceExporter } from "@opentelemetry/exporter-trace-otlp-http";
import { Resource } from "@opentelemetry/resources";
import { core as otelCore, logs as sdkLogs, metrics as sdkMetrics, tracing } from "@opentelemetry/sdk-node";
import { ATTR_SERVICE_NAME, ATTR_SERVICE_VERSION } from "@opentelemetry/semantic-conventions";
import { Registry } from "prom-client";
import type { ServiceIdentity, TelemetryConfig } from "@vigil/contracts";
import type { ShutdownHook, TelemetryCore } from "../subsystems.js";

const ATTR_DEPLOYMENT_ENVIRONMENT = "deployment.environment";

const noopTracers = new ProxyTracerProvider();
const noopMeter = createNoopMeter();

type Instrumentations = ReturnType<typeof getNodeAutoInstrumentations>;

export class AutoInstrumentationInUseError extends Error {
  constructor() {
    super("Node auto-instrumentation is already enabled by another telemetry core");
    this.name = "AutoInstrumentationInUseError";
  }
}

// Module patching is process-wide, so only one core may hold it at a time.
let instrumentationClaimed = false;
let contextManagerInstalled = false;

function installContextManager(): void {
  if (contextManagerInstalled) return;
  contextManagerInstalled = true;
  const manager = new AsyncLocalStorageContextManager().enable();
  if (!context.setGlobalContextManager(manager)) {
    manager.disable();
  }
}

export function buildResource(identity: ServiceIdentity): Resource {
  return new Resource({
    ...identity.attributes,
    [ATTR_SERVICE_NAME]: identity.name,
    [ATTR_SERVICE_VERSION]: identity.version,
    [ATTR_DEPLOYMENT_ENVIRONMENT]: identity.environment
  });
}

function exporterUrl(endpoint: string, signal: "traces" | "logs" | "metrics"): string {
  return `${endpoint.replace(/\/+$/, "")}/v1/${signal}`;
}

interface Providers {
  tracerProvider?: tracing.BasicTracerProvider;
  loggerProvider?: sdkLogs.LoggerProvider;
  meterProvider?: sdkMetrics.MeterProvider;
  instrumentations?: Instrumentations;
}

/**
 * Telemetry-core backed by OpenTelemetry SDK providers and a prom-client
 * registry.
 *
 * Each core owns its own tracer, logger and meter providers, built only for
 * the signals that are exported over OTLP. Nothing is registered on the
 * OpenTelemetry globals apart from the async context manager, which only
 * carries the active span. With `tracing.autoInstrument` the core also claims
 * Node auto-instrumentation and the W3C propagator; a second claim while one
 * core holds them fails with {@link AutoInstrumentationInUseError}.
 */
export class OpenTelemetryCore implements TelemetryCore {
  readonly metricsRegistry = new Registry();

  private readonly hooks: Array<{ name: string; hook: ShutdownHook }> = [];
  private closed = false;

  private constructor(
    readonly identity: ServiceIdentity,
    readonly config: TelemetryConfig,
    readonly resource: Resource,
    private providers: Providers
  ) {}

  static async start(identity: ServiceIdentity, config: TelemetryConfig): Promise<OpenTelemetryCore> {
    const { otlp, tracing: tracingConfig, logging, metrics } = config;
    const resource = buildResource(identity);
    const providers: Providers = {};

    if (!otlp.enabled) {
      return new OpenTelemetryCore(identity, config, resource, providers);
    }

    const exporterOptions = { headers: otlp.headers, timeoutMillis: otlp.timeoutMs };

    if (tracingConfig.enabled && tracingConfig.autoInstrument) {
      if (instrumentationClaimed) {
        throw new AutoInstrumentationInUseError();
      }
      instrumentationClaimed = true;
    }

    try {
      if (tracingConfig.enabled) {
        installContextManager();
        providers.tracerProvider = new tracing.BasicTracerProvider({
          resource,
          sampler: new tracing.ParentBasedSampler({
            root: new tracing.TraceIdRatioBasedSampler(tracingConfig.sampleRate)
          }),
          spanProcessors: [
            new tracing.BatchSpanProcessor(
              new OTLPTraceExporter({ ...exporterOptions, url: exporterUrl(otlp.endpoint, "traces") })
            )
          ]
        });
      }

      if (logging.enabled) {
        const loggerProvider = new sdkLogs.LoggerProvider({ resource });
        loggerProvider.addLogRecordProcessor(
          new sdkLogs.BatchLogRecordProcessor(
            new OTLPLogExporter({ ...exporterOptions, url: exporterUrl(otlp.endpoint, "logs") })
          )
        );
        providers.loggerProvider = loggerProvider;
      }

      if (metrics.enabled) {
        providers.meterProvider = new sdkMetrics.MeterProvider({
          resource,
          readers: [
            new sdkMetrics.PeriodicExportingMetricReader({
              exporter: new OTLPMetricExporter({ ...exporterOptions, url: exporterUrl(otlp.endpoint, "metrics") }),
              exportIntervalMillis: metrics.exportIntervalMs,
              exportTimeoutMillis: Math.min(otlp.timeoutMs, metrics.exportIntervalMs)
            })
          ]
        });
      }

      if (providers.tracerProvider && tracingConfig.autoInstrument) {
        const instrumentations = getNodeAutoInstrumentations({
          "@opentelemetry/instrumentation-fs": { enabled: false },
          "@opentelemetry/instrumentation-dns": { enabled: false },
          "@opentelemetry/instrumentation-net": { enabled: false }
        });
        for (const instrumentation of instrumentations) {
          instrumentation.setTracerProvider(providers.tracerProvider);
          if (providers.meterProvider) {
            instrumentation.setMeterProvider(providers.meterProvider);
          }
        }
        propagation.setGlobalPropagator(
          new otelCore.CompositePropagator({
            propagators: [new otelCore.W3CTraceContextPropagator(), new otelCore.W3CBaggagePropagator()]
          })
        );
        providers.instrumentations = instrumentations;
      }
    } catch (error) {
      if (tracingConfig.enabled && tracingConfig.autoInstrument) {
        instrumentationClaimed = false;
      }
      throw error;
    }

    return new OpenTelemetryCore(identity, config, resource, providers);
  }

  get exportsTraces(): boolean {
    return this.providers.tracerProvider !== undefined;
  }

  get exportsLogs(): boolean {
    return this.providers.loggerProvider !== undefined;
  }

  get exportsMetrics(): boolean {
    return this.providers.meterProvider !== undefined;
  }

  tracer(name: string, version?: string): OtelTracer {
    return this.providers.tracerProvider?.getTracer(name, version) ?? noopTracers.getTracer(name, version);
  }

  logEmitter(name: string, version?: string): LogEmitter | undefined {
    return this.providers.loggerProvider?.getLogger(name, version);
  }

  meter(name: string, version?: string): Meter {
    return this.providers.meterProvider?.getMeter(name, version) ?? noopMeter;
  }

  onShutdown(name: string, hook: ShutdownHook): void {
    this.hooks.push({ name, hook });
  }

  /**
   * Runs registered hooks last-first, then shuts this core's providers down.
   * Every part runs; failures are collected into one AggregateError.
   */
  async shutdown(): Promise<void> {
    if (this.closed) return;
    this.closed = true;

    const errors: Error[] = [];
    const attempt = async (label: string, step: () => Promise<void> | void) => {
      try {
        await step();
      } catch (error) {
        errors.push(new Error(label, { cause: error }));
      }
    };

    for (const { name, hook } of this.hooks.splice(0).reverse()) {
      await attempt(`${name} shutdown hook failed`, hook);
    }

    const { tracerProvider, loggerProvider, meterProvider, instrumentations } = this.providers;
    this.providers = {};

    if (instrumentations) {
      for (const instrumentation of instrumentations) {
        instrumentation.disable();
      }
      propagation.disable();
      instrumentationClaimed = false;
    }
    if (tracerProvider) {
      await attempt("tracer provider shutdown failed", () => tracerProvider.shutdown());
    }
    if (loggerProvider) {
      await attempt("logger provider shutdown failed", () => loggerProvider.shutdown());
    }
    if (meterProvider) {
      await attempt("meter provider shutdown failed", () => meterProvider.shutdown());
    }

    if (errors.length > 0) {
      throw new AggregateError(errors, `telemetry shutdown failed with ${errors.length} error(s)`);
    }
  }
}
