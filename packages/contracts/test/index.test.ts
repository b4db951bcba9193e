import assert from "node:assert/strict";
import test from "node:test";
import {
  ObservabilityConfigSchema,
  RecordingConfigSchema,
  ServiceIdentitySchema,
  defaultObservabilityConfig
} from "../src/index.js";

test("ServiceIdentitySchema fills version, environment and attributes defaults", () => {
  const parsed = ServiceIdentitySchema.parse({ name: "svc" });

  assert.equal(parsed.version, "unknown");
  assert.equal(parsed.environment, "development");
  assert.deepEqual(parsed.attributes, {});
});

test("ServiceIdentitySchema rejects an empty name and unknown environments", () => {
  assert.equal(ServiceIdentitySchema.safeParse({ name: "" }).success, false);
  assert.equal(
    ServiceIdentitySchema.safeParse({ name: "svc", environment: "qa" }).success,
    false
  );
  assert.equal(
    ServiceIdentitySchema.safeParse({ name: "svc", environment: "embedded" }).success,
    true
  );
});

test("defaultObservabilityConfig matches the documented defaults", () => {
  const config = defaultObservabilityConfig();

  assert.deepEqual(config, {
    telemetry: {
      logging: { enabled: true, level: "info" },
      metrics: { enabled: true, collectDefaultMetrics: true, prefix: "", exportIntervalMs: 60_000 },
      tracing: { enabled: true, sampleRate: 1, autoInstrument: false },
      otlp: { enabled: false, endpoint: "http://localhost:4318", headers: {}, timeoutMs: 10000 }
    },
    profiling: {
      enabled: false,
      samplingIntervalUs: 1000,
      outputDir: "profiles",
      flushIntervalMs: 60_000,
      tags: {}
    },
    recording: { enabled: false, path: "", compression: "none", chunkSize: 1048576 }
  });
});

test("ObservabilityConfigSchema merges a partial tree over nested defaults", () => {
  const config = ObservabilityConfigSchema.parse({
    telemetry: { tracing: { sampleRate: 0.25 } },
    profiling: { enabled: true }
  });

  assert.equal(config.telemetry.tracing.sampleRate, 0.25);
  assert.equal(config.telemetry.tracing.enabled, true);
  assert.equal(config.telemetry.logging.level, "info");
  assert.equal(config.profiling.enabled, true);
  assert.equal(config.profiling.samplingIntervalUs, 1000);
  assert.equal(config.recording.enabled, false);
});

test("numeric fields are accepted without range checks", () => {
  const parsed = RecordingConfigSchema.parse({ chunkSize: -1 });
  assert.equal(parsed.chunkSize, -1);

  const config = ObservabilityConfigSchema.parse({ telemetry: { tracing: { sampleRate: 7 } } });
  assert.equal(config.telemetry.tracing.sampleRate, 7);
});

test("RecordingConfigSchema rejects unknown compression modes", () => {
  assert.throws(() => RecordingConfigSchema.parse({ compression: "gzip" }));
});
