import assert from "node:assert/strict";
import test from "node:test";
import type { ObservabilityConfigInput, ServiceIdentityInput } from "@vigil/contracts";
import { ValidationError } from "../src/errors.js";
import { createServiceIdentity, resolveConfig } from "../src/identity.js";

test("createServiceIdentity fills defaults and freezes the result", () => {
  const identity = createServiceIdentity({ name: "checkout", attributes: { region: "eu-west-1" } });

  assert.deepEqual(identity, {
    name: "checkout",
    version: "unknown",
    environment: "development",
    attributes: { region: "eu-west-1" }
  });
  assert.equal(Object.isFrozen(identity), true);
  assert.equal(Object.isFrozen(identity.attributes), true);
});

test("createServiceIdentity rejects an empty name whatever else is set", () => {
  const inputs: ServiceIdentityInput[] = [
    { name: "" },
    { name: "", version: "2.3.4", environment: "production" },
    { name: "", environment: "embedded", attributes: { rack: "7" } }
  ];

  for (const input of inputs) {
    assert.throws(
      () => createServiceIdentity(input),
      (error: unknown) => {
        assert.ok(error instanceof ValidationError);
        assert.equal(error.message, "Invalid service identity: name: service name is required");
        return true;
      }
    );
  }
});

test("createServiceIdentity rejects an unknown environment", () => {
  // Identities often arrive from untyped sources such as the environment.
  const input: ServiceIdentityInput = JSON.parse('{"name":"svc","environment":"qa"}');

  assert.throws(
    () => createServiceIdentity(input),
    (error: unknown) => {
      assert.ok(error instanceof ValidationError);
      assert.deepEqual(error.issues.map((issue) => issue.path), [["environment"]]);
      return true;
    }
  );
});

test("resolveConfig copies the input", () => {
  const input = { profiling: { enabled: true, tags: { team: "core" } } };
  const config = resolveConfig(input);

  input.profiling.enabled = false;
  input.profiling.tags.team = "other";

  assert.equal(config.profiling.enabled, true);
  assert.deepEqual(config.profiling.tags, { team: "core" });
  assert.equal(config.profiling.samplingIntervalUs, 1000);
});

test("resolveConfig rejects a value of the wrong type as a ValidationError", () => {
  assert.throws(
    () => resolveConfig({ telemetry: { tracing: { sampleRate: Number.NaN } } }),
    (error: unknown) => {
      assert.ok(error instanceof ValidationError);
      assert.deepEqual(error.issues.map((issue) => issue.path), [["telemetry", "tracing", "sampleRate"]]);
      assert.match(error.message, /^Invalid configuration: telemetry\.tracing\.sampleRate: /);
      return true;
    }
  );
});

test("resolveConfig rejects an unsupported compression mode", () => {
  const input: ObservabilityConfigInput = JSON.parse('{"recording":{"enabled":true,"compression":"lz4"}}');

  assert.throws(
    () => resolveConfig(input),
    (error: unknown) => {
      assert.ok(error instanceof ValidationError);
      assert.deepEqual(error.issues.map((issue) => issue.path), [["recording", "compression"]]);
      return true;
    }
  );
});
