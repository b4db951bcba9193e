import type { Meter } from "@opentelemetry/api";
import { Counter, Gauge, Histogram, collectDefaultMetrics, type Registry } from "prom-client";
import type { MetricsConfig, ServiceIdentity } from "@vigil/contracts";
import type { HistogramOptions, Metrics, TelemetryCore } from "../subsystems.js";

/**
 * prom-client metrics on the core's registry. Instruments are memoised by
 * name, so asking twice for the same counter returns the same counter.
 *
 * With a `meter`, every instrument created here is mirrored as an
 * OpenTelemetry observable that reads the prom-client value at collection
 * time. Histograms are mirrored as their `_sum` and `_count` series. Process
 * metrics from `collectDefaultMetrics` stay Prometheus-only.
 */
export class PrometheusMetrics implements Metrics {
  constructor(
    private readonly registry: Registry,
    private readonly config: MetricsConfig,
    private readonly meter?: Meter
  ) {}

  get contentType(): string {
    return this.registry.contentType;
  }

  counter(name: string, help: string, labelNames: readonly string[] = []): Counter<string> {
    const fullName = this.qualify(name);
    const existing = this.registry.getSingleMetric(fullName);
    if (existing instanceof Counter) {
      return existing;
    }
    const counter = new Counter({ name: fullName, help, labelNames, registers: [this.registry] });
    this.meter
      ?.createObservableCounter(fullName, { description: help })
      .addCallback(async (result) => {
        for (const { value, labels } of (await counter.get()).values) {
          result.observe(value, labels);
        }
      });
    return counter;
  }

  gauge(name: string, help: string, labelNames: readonly string[] = []): Gauge<string> {
    const fullName = this.qualify(name);
    const existing = this.registry.getSingleMetric(fullName);
    if (existing instanceof Gauge) {
      return existing;
    }
    const gauge = new Gauge({ name: fullName, help, labelNames, registers: [this.registry] });
    this.meter
      ?.createObservableGauge(fullName, { description: help })
      .addCallback(async (result) => {
        for (const { value, labels } of (await gauge.get()).values) {
          result.observe(value, labels);
        }
      });
    return gauge;
  }

  histogram(name: string, help: string, options: HistogramOptions = {}): Histogram<string> {
    const fullName = this.qualify(name);
    const existing = this.registry.getSingleMetric(fullName);
    if (existing instanceof Histogram) {
      return existing;
    }
    const histogram = new Histogram({
      name: fullName,
      help,
      labelNames: options.labelNames ?? [],
      ...(options.buckets ? { buckets: options.buckets } : {}),
      registers: [this.registry]
    });
    if (this.meter) {
      const sum = this.meter.createObservableCounter(`${fullName}_sum`, { description: help });
      const count = this.meter.createObservableCounter(`${fullName}_count`, { description: help });
      this.meter.addBatchObservableCallback(async (result) => {
        for (const { metricName, value, labels } of (await histogram.get()).values) {
          if (metricName === `${fullName}_sum`) {
            result.observe(sum, value, labels);
          } else if (metricName === `${fullName}_count`) {
            result.observe(count, value, labels);
          }
        }
      }, [sum, count]);
    }
    return histogram;
  }

  async exposition(): Promise<string> {
    if (!this.config.enabled) {
      return "";
    }
    return this.registry.metrics();
  }

  private qualify(name: string): string {
    return `${this.config.prefix}${name}`;
  }
}

export function createMetrics(identity: ServiceIdentity, core: TelemetryCore): Metrics {
  const { metrics: config } = core.config;
  const registry = core.metricsRegistry;

  registry.setDefaultLabels({ service: identity.name, environment: identity.environment });
  if (config.enabled && config.collectDefaultMetrics) {
    collectDefaultMetrics({ register: registry, prefix: config.prefix });
  }

  core.onShutdown("metrics", () => registry.clear());

  return new PrometheusMetrics(registry, config, core.meter(identity.name, identity.version));
}
