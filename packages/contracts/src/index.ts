import { z } from "zod";

// ── Service identity ────────────────────────────────────────────────────────

export const EnvironmentSchema = z.enum(["development", "staging", "production", "embedded"]);

export type Environment = z.infer<typeof EnvironmentSchema>;

export const ServiceIdentitySchema = z.object({
  name: z.string().min(1, "service name is required"),
  version: z.string().default("unknown"),
  environment: EnvironmentSchema.default("development"),
  attributes: z.record(z.string(), z.string()).default({})
});

export type ServiceIdentity = z.infer<typeof ServiceIdentitySchema>;
export type ServiceIdentityInput = z.input<typeof ServiceIdentitySchema>;

// ── Telemetry ───────────────────────────────────────────────────────────────

export const LogLevelSchema = z.enum(["trace", "debug", "info", "warn", "error", "fatal", "silent"]);

export type LogLevel = z.infer<typeof LogLevelSchema>;

export const LoggingConfigSchema = z.object({
  enabled: z.boolean().default(true),
  level: LogLevelSchema.default("info")
});

export type LoggingConfig = z.infer<typeof LoggingConfigSchema>;

export const MetricsConfigSchema = z.object({
  enabled: z.boolean().default(true),
  collectDefaultMetrics: z.boolean().default(true),
  prefix: z.string().default(""),
  exportIntervalMs: z.number().default(60_000)
});

export type MetricsConfig = z.infer<typeof MetricsConfigSchema>;

export const TracingConfigSchema = z.object({
  enabled: z.boolean().default(true),
  sampleRate: z.number().default(1),
  autoInstrument: z.boolean().default(false)
});

export type TracingConfig = z.infer<typeof TracingConfigSchema>;

export const OtlpConfigSchema = z.object({
  enabled: z.boolean().default(false),
  endpoint: z.string().default("http://localhost:4318"),
  headers: z.record(z.string(), z.string()).default({}),
  timeoutMs: z.number().default(10_000)
});

export type OtlpConfig = z.infer<typeof OtlpConfigSchema>;

export const TelemetryConfigSchema = z.object({
  logging: LoggingConfigSchema.default({}),
  metrics: MetricsConfigSchema.default({}),
  tracing: TracingConfigSchema.default({}),
  otlp: OtlpConfigSchema.default({})
});

export type TelemetryConfig = z.infer<typeof TelemetryConfigSchema>;

// ── Profiling ───────────────────────────────────────────────────────────────

export const ProfilingConfigSchema = z.object({
  enabled: z.boolean().default(false),
  samplingIntervalUs: z.number().default(1000),
  outputDir: z.string().default("profiles"),
  flushIntervalMs: z.number().default(60_000),
  tags: z.record(z.string(), z.string()).default({})
});

export type ProfilingConfig = z.infer<typeof ProfilingConfigSchema>;

// ── Recording ───────────────────────────────────────────────────────────────

export const CompressionSchema = z.enum(["none", "zstd"]);

export type Compression = z.infer<typeof CompressionSchema>;

export const RecordingConfigSchema = z.object({
  enabled: z.boolean().default(false),
  path: z.string().default(""),
  compression: CompressionSchema.default("none"),
  chunkSize: z.number().default(1024 * 1024)
});

export type RecordingConfig = z.infer<typeof RecordingConfigSchema>;
export type RecordingConfigInput = z.input<typeof RecordingConfigSchema>;

// ── Root ────────────────────────────────────────────────────────────────────

export const ObservabilityConfigSchema = z.object({
  telemetry: TelemetryConfigSchema.default({}),
  profiling: ProfilingConfigSchema.default({}),
  recording: RecordingConfigSchema.default({})
});

export type ObservabilityConfig = z.infer<typeof ObservabilityConfigSchema>;
export type ObservabilityConfigInput = z.input<typeof ObservabilityConfigSchema>;

export function defaultObservabilityConfig(): ObservabilityConfig {
  return ObservabilityConfigSchema.parse({});
}
