import type { FastifyInstance } from "fastify";
import type { Metrics } from "@vigil/observability";

/**
 * Expose an observability handle's metrics at `GET /metrics` in the
 * Prometheus text format.
 *
 * The registry belongs to the handle, so several servers in one process
 * (e.g. during tests) never collide on prom-client's global registry.
 *
 * @example
 * const server = Fastify({ ... });
 * registerMetrics(server, observability.metrics);
 */
export function registerMetrics(
  server: FastifyInstance,
  metrics: Pick<Metrics, "contentType" | "exposition">,
): void {
  server.get("/metrics", async (_req, reply) => {
    const body = await metrics.exposition();
    return reply.header("content-type", metrics.contentType).send(body);
  });
}
