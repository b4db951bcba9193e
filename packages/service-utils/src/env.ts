import {
  CompressionSchema,
  EnvironmentSchema,
  LogLevelSchema,
  ObservabilityConfigSchema,
  type ObservabilityConfig,
  type ServiceIdentityInput
} from "@vigil/contracts";

type Env = NodeJS.ProcessEnv;

const ATTRIBUTE_PREFIX = "VIGIL_ATTR_";

/**
 * Validates that required environment variables are set in production.
 *
 * Outside production (NODE_ENV !== "production") this is a no-op so local
 * development and test runs are not blocked.
 *
 * @throws {Error} If NODE_ENV is "production" and any of the vars are unset.
 */
export function validateRequiredEnv(vars: string[], env: Env = process.env): void {
  if (env.NODE_ENV !== "production") return;
  const missing = vars.filter((v) => !env[v]);
  if (missing.length > 0) {
    throw new Error(`Missing required env vars: ${missing.join(", ")}`);
  }
}

/**
 * Logs a warning for any environment variables that are not set. Never throws.
 */
export function warnMissingEnv(vars: string[], serviceName?: string, env: Env = process.env): void {
  const missing = vars.filter((v) => !env[v]);
  if (missing.length > 0) {
    const prefix = serviceName ? `[${serviceName}] ` : "";
    console.warn(`${prefix}Missing recommended env vars: ${missing.join(", ")}`);
  }
}

function readBoolean(value: string | undefined): boolean | undefined {
  switch (value?.trim().toLowerCase()) {
    case "true":
    case "1":
    case "yes":
      return true;
    case "false":
    case "0":
    case "no":
      return false;
    default:
      return undefined;
  }
}

function readNumber(value: string | undefined): number | undefined {
  if (value === undefined || value.trim() === "") return undefined;
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : undefined;
}

function readString(value: string | undefined): string | undefined {
  return value ? value : undefined;
}

/**
 * Build the observability configuration from environment variables. Unset or
 * malformed values leave the default in place.
 *
 * | Variable | Field |
 * | --- | --- |
 * | `LOG_LEVEL` | `telemetry.logging.level` |
 * | `VIGIL_LOGGING_ENABLED` | `telemetry.logging.enabled` |
 * | `VIGIL_METRICS_ENABLED` | `telemetry.metrics.enabled` |
 * | `VIGIL_METRICS_EXPORT_INTERVAL_MS` | `telemetry.metrics.exportIntervalMs` |
 * | `VIGIL_TRACING_ENABLED` | `telemetry.tracing.enabled` |
 * | `VIGIL_TRACE_SAMPLE_RATE` | `telemetry.tracing.sampleRate` |
 * | `VIGIL_OTLP_ENABLED` | `telemetry.otlp.enabled` |
 * | `OTEL_EXPORTER_OTLP_ENDPOINT` | `telemetry.otlp.endpoint` |
 * | `VIGIL_PROFILING_ENABLED` | `profiling.enabled` |
 * | `VIGIL_PROFILING_OUTPUT_DIR` | `profiling.outputDir` |
 * | `VIGIL_PROFILING_FLUSH_INTERVAL_MS` | `profiling.flushIntervalMs` |
 * | `VIGIL_RECORDING_ENABLED` | `recording.enabled` |
 * | `VIGIL_RECORDING_PATH` | `recording.path` |
 * | `VIGIL_RECORDING_COMPRESSION` | `recording.compression` |
 */
export function loadConfigFromEnv(env: Env = process.env, serviceName?: string): ObservabilityConfig {
  const level = LogLevelSchema.safeParse(env.LOG_LEVEL?.toLowerCase());
  const compression = CompressionSchema.safeParse(env.VIGIL_RECORDING_COMPRESSION?.toLowerCase());

  const config = ObservabilityConfigSchema.parse({
    telemetry: {
      logging: {
        enabled: readBoolean(env.VIGIL_LOGGING_ENABLED),
        level: level.success ? level.data : undefined
      },
      metrics: {
        enabled: readBoolean(env.VIGIL_METRICS_ENABLED),
        exportIntervalMs: readNumber(env.VIGIL_METRICS_EXPORT_INTERVAL_MS)
      },
      tracing: {
        enabled: readBoolean(env.VIGIL_TRACING_ENABLED),
        sampleRate: readNumber(env.VIGIL_TRACE_SAMPLE_RATE)
      },
      otlp: {
        enabled: readBoolean(env.VIGIL_OTLP_ENABLED),
        endpoint: readString(env.OTEL_EXPORTER_OTLP_ENDPOINT)
      }
    },
    profiling: {
      enabled: readBoolean(env.VIGIL_PROFILING_ENABLED),
      outputDir: readString(env.VIGIL_PROFILING_OUTPUT_DIR),
      flushIntervalMs: readNumber(env.VIGIL_PROFILING_FLUSH_INTERVAL_MS)
    },
    recording: {
      enabled: readBoolean(env.VIGIL_RECORDING_ENABLED),
      path: readString(env.VIGIL_RECORDING_PATH),
      compression: compression.success ? compression.data : undefined
    }
  });

  if (config.recording.enabled) {
    warnMissingEnv(["VIGIL_RECORDING_PATH"], serviceName, env);
  }

  return config;
}

/**
 * Read the service identity from `SERVICE_NAME`, `SERVICE_VERSION`,
 * `DEPLOY_ENV` and every `VIGIL_ATTR_<KEY>` (stored as lower-case `<key>`).
 * An unknown `DEPLOY_ENV` falls back to the default environment.
 */
export function identityFromEnv(env: Env = process.env, fallbackName = ""): ServiceIdentityInput {
  const environment = EnvironmentSchema.safeParse(env.DEPLOY_ENV?.toLowerCase());
  const attributes: Record<string, string> = {};

  for (const [key, value] of Object.entries(env)) {
    if (key.startsWith(ATTRIBUTE_PREFIX) && key.length > ATTRIBUTE_PREFIX.length && value !== undefined) {
      attributes[key.slice(ATTRIBUTE_PREFIX.length).toLowerCase()] = value;
    }
  }

  return {
    name: readString(env.SERVICE_NAME) ?? fallbackName,
    version: readString(env.SERVICE_VERSION),
    environment: environment.success ? environment.data : undefined,
    attributes
  };
}
