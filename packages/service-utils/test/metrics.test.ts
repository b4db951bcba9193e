import { describe, it } from "node:test";
import assert from "node:assert/strict";
import Fastify from "fastify";
import { MetricsConfigSchema } from "@vigil/contracts";
import { PrometheusMetrics } from "@vigil/observability";
import { Registry } from "prom-client";
import { registerMetrics } from "../src/metrics.js";

describe("registerMetrics", () => {
  it("serves the exposition with its content type", async () => {
    const server = Fastify({ logger: false });
    registerMetrics(server, {
      contentType: "text/plain; version=0.0.4; charset=utf-8",
      exposition: async () => "# HELP jobs_total Jobs\n# TYPE jobs_total counter\njobs_total 2\n"
    });

    const response = await server.inject({ method: "GET", url: "/metrics" });

    assert.equal(response.statusCode, 200);
    assert.equal(response.headers["content-type"], "text/plain; version=0.0.4; charset=utf-8");
    assert.equal(response.body, "# HELP jobs_total Jobs\n# TYPE jobs_total counter\njobs_total 2\n");
    await server.close();
  });

  it("serves a handle's prom-client registry", async () => {
    const metrics = new PrometheusMetrics(new Registry(), MetricsConfigSchema.parse({}));
    metrics.counter("requests_total", "Requests", ["route"]).inc({ route: "/work" }, 4);
    const server = Fastify({ logger: false });
    registerMetrics(server, metrics);

    const response = await server.inject({ method: "GET", url: "/metrics" });

    assert.equal(response.statusCode, 200);
    assert.ok(response.body.includes('requests_total{route="/work"} 4'));
    await server.close();
  });
});
