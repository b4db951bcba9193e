import assert from "node:assert/strict";
import test from "node:test";
import { StartupError, TeardownError } from "../src/errors.js";
import { withSession } from "../src/session.js";
import { allEnabled, captureDiagnostics, fakeFactories } from "./helpers.js";

test("withSession resolves with the scope's result and shuts down afterwards", async () => {
  const { factories, events } = fakeFactories();
  const { sink } = captureDiagnostics();

  const result = await withSession(
    { name: "svc" },
    {},
    async (observability) => {
      events.push("scope");
      assert.equal(observability.isShutdown, false);
      return 42;
    },
    { factories, diagnostics: sink }
  );

  assert.equal(result, 42);
  assert.deepEqual(events.slice(-2), ["scope", "shutdown:telemetry"]);
});

test("withSession shuts down exactly once before rethrowing the scope's error", async () => {
  const { factories, events, cores } = fakeFactories();
  const { sink } = captureDiagnostics();
  const failure = new Error("scope failed halfway");

  await assert.rejects(
    withSession(
      { name: "svc" },
      allEnabled,
      async (observability) => {
        await observability.recorder?.record("/progress", { step: 1 });
        throw failure;
      },
      { factories, diagnostics: sink }
    ),
    (error: unknown) => error === failure
  );

  assert.deepEqual(events.slice(-4), ["record:/progress", "stop:profiler", "close:recorder", "shutdown:telemetry"]);
  assert.equal(cores[0]?.shutdownCalls, 1);
});

test("withSession keeps the scope's error when shutdown also fails", async () => {
  const { factories } = fakeFactories({ failTeardown: ["telemetry"] });
  const { sink } = captureDiagnostics();
  const failure = new Error("scope failed");
  const shutdownErrors: unknown[] = [];

  await assert.rejects(
    withSession(
      { name: "svc" },
      {},
      () => {
        throw failure;
      },
      { factories, diagnostics: sink, onShutdownError: (error) => shutdownErrors.push(error) }
    ),
    (error: unknown) => error === failure
  );

  const [shutdownError] = shutdownErrors;
  assert.equal(shutdownErrors.length, 1);
  assert.ok(shutdownError instanceof TeardownError);
  assert.equal(shutdownError.step, "telemetry");
});

test("withSession returns the scope's result when shutdown fails and reports the failure", async () => {
  const { factories } = fakeFactories({ failTeardown: ["recorder"] });
  const { sink, lines } = captureDiagnostics();
  const shutdownErrors: unknown[] = [];

  const result = await withSession({ name: "svc" }, allEnabled, () => "done", {
    factories,
    diagnostics: sink,
    onShutdownError: (error) => shutdownErrors.push(error)
  });

  assert.equal(result, "done");
  assert.equal(shutdownErrors.length, 1);
  assert.deepEqual(
    lines.map((line) => line.msg),
    ["Failed to shut down recorder: disk full", "session shutdown failed after scope exit"]
  );
});

test("withSession tolerates a scope that shut the handle down itself", async () => {
  const { factories, cores } = fakeFactories();
  const { sink } = captureDiagnostics();

  await withSession(
    { name: "svc" },
    {},
    async (observability) => {
      await observability.shutdown();
    },
    { factories, diagnostics: sink }
  );

  assert.equal(cores[0]?.shutdownCalls, 1);
});

test("withSession never runs the scope when startup fails", async () => {
  const { factories, events } = fakeFactories({ failAt: "tracer" });
  const { sink } = captureDiagnostics();
  let scopeRan = false;

  await assert.rejects(
    withSession(
      { name: "svc" },
      {},
      () => {
        scopeRan = true;
      },
      { factories, diagnostics: sink }
    ),
    (error: unknown) => error instanceof StartupError && error.subsystem === "tracer"
  );

  assert.equal(scopeRan, false);
  assert.deepEqual(events.slice(-2), ["create:tracer", "shutdown:telemetry"]);
});
