import Fastify, { type FastifyInstance } from "fastify";
import { pathToFileURL } from "node:url";
import { z } from "zod";
import { Observability } from "@vigil/observability";
import {
  bootstrapService,
  identityFromEnv,
  loadConfigFromEnv,
  registerMetrics
} from "@vigil/service-utils";

const SERVICE_NAME = "example-service";

export const WorkRequestSchema = z.object({
  jobId: z.string().min(1),
  units: z.number().int().positive()
});

export type WorkRequest = z.infer<typeof WorkRequestSchema>;

export type ExampleServiceOptions = {
  /** Log one line per completed request through the handle's logger. */
  requestLogging?: boolean;
};

export function buildServer(observability: Observability, options: ExampleServiceOptions = {}): FastifyInstance {
  const server = Fastify({ logger: false });
  const startedAt = Date.now();
  const { logger, metrics, tracer } = observability;
  const workUnits = metrics.counter("work_units_total", "Units of work processed");

  if (options.requestLogging ?? true) {
    const requests = logger.child({ component: "http" });
    server.addHook("onResponse", async (req, reply) => {
      requests.info("request completed", {
        method: req.method,
        url: req.url,
        statusCode: reply.statusCode,
        responseTime: reply.elapsedTime
      });
    });
  }

  const health = () => ({
    service: observability.identity.name,
    ok: !observability.isShutdown,
    uptime: Math.floor((Date.now() - startedAt) / 1000)
  });

  server.get("/health", async () => health());

  server.get("/health/live", async () => ({ ok: true }));

  server.get("/health/ready", async (_req, reply) => {
    const status = health();
    return reply.status(status.ok ? 200 : 503).send(status);
  });

  registerMetrics(server, metrics);

  server.post("/work", async (req, reply) => {
    const parsed = WorkRequestSchema.safeParse(req.body);
    if (!parsed.success) {
      return reply.status(400).send({
        error: "invalid_work_request",
        details: parsed.error.flatten()
      });
    }

    const { jobId, units } = parsed.data;
    const recorded = await tracer.withSpan(
      "work.process",
      async (span) => {
        workUnits.inc(units);
        logger.info("work processed", { jobId, units });

        const recorder = observability.recorder;
        if (!recorder) {
          return false;
        }
        await recorder.record("/work", { jobId, units });
        span.addEvent("work.recorded");
        return true;
      },
      { "work.job_id": jobId, "work.units": units }
    );

    return reply.status(202).send({ jobId, units, recorded });
  });

  return server;
}

export async function startServer(): Promise<void> {
  const boot = bootstrapService(SERVICE_NAME);
  const port = Number(process.env.PORT ?? 4000);
  const identity = identityFromEnv(process.env, SERVICE_NAME);
  const config = loadConfigFromEnv(process.env, SERVICE_NAME);
  boot.phase("config loaded");

  const observability = await Observability.create(identity, config);
  boot.phase("observability started");

  const server = buildServer(observability);
  // Stop taking requests before the handle they use is torn down.
  boot.onShutdown(() => server.close());
  boot.onShutdown(() => observability.shutdown());
  await server.listen({ port, host: "0.0.0.0" });
  boot.ready(port);
}

function isMainModule(metaUrl: string): boolean {
  if (!process.argv[1]) {
    return false;
  }

  return metaUrl === pathToFileURL(process.argv[1]).href;
}

if (isMainModule(import.meta.url)) {
  startServer().catch((error) => {
    console.error(error);
    process.exit(1);
  });
}
