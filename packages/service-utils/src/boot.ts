/**
 * Lightweight startup bootstrap for services.
 *
 * Call `bootstrapService(name)` at the **very top** of `startServer()`,
 * before env validation, before the observability handle and Fastify are
 * created.
 *
 * What it does:
 * 1. Prints a startup banner to stdout (visible even if pino never
 *    initializes).
 * 2. Installs global `uncaughtException` / `unhandledRejection` handlers so
 *    that fatal errors always produce output before the process exits.
 * 3. Runs the functions registered with `onShutdown` on the first `SIGTERM`
 *    or `SIGINT`, once and in registration order, then exits.
 * 4. Returns a tiny logger for milestone breadcrumbs (`phase`, `ready`).
 *
 * All output uses `console.log` / `console.error`, not pino, because the
 * point is to produce output before and after the structured logger's
 * lifetime.
 *
 * @example
 * ```ts
 * export async function startServer() {
 *   const boot = bootstrapService("example-service");
 *   const observability = await Observability.create(identityFromEnv(), loadConfigFromEnv());
 *   const server = buildServer(observability);
 *   boot.onShutdown(() => server.close());
 *   boot.onShutdown(() => observability.shutdown());
 *   await server.listen({ port, host: "0.0.0.0" });
 *   boot.ready(port);
 * }
 * ```
 */

export type ShutdownFn = () => Promise<unknown> | unknown;

export interface BootLogger {
  /** Log a startup milestone, e.g. `boot.phase("env validated")`. */
  phase(msg: string): void;
  /** Log the final "ready" banner with the listening port. */
  ready(port: number): void;
  /** Register work to run when the process is asked to stop. */
  onShutdown(fn: ShutdownFn): void;
  /**
   * Run the registered shutdown functions. Only the first call does any work;
   * later calls return the same promise. A failing function is logged and the
   * rest still run. Resolves with the number of failures.
   */
  shutdown(reason: string): Promise<number>;
  /** Remove the process handlers installed by {@link bootstrapService}. */
  dispose(): void;
}

export interface BootOptions {
  /** Called with the exit code once a signal-triggered shutdown is done. */
  exit?: (code: number) => void;
  /** Where `SIGTERM` / `SIGINT` are listened for; the process by default. */
  signals?: Pick<NodeJS.EventEmitter, "on" | "off">;
}

export function bootstrapService(name: string, options: BootOptions = {}): BootLogger {
  const tag = `[${name}]`;
  const exit = options.exit ?? ((code: number) => process.exit(code));
  const signals: Pick<NodeJS.EventEmitter, "on" | "off"> = options.signals ?? process;
  const shutdownFns: ShutdownFn[] = [];
  let shutdownPromise: Promise<number> | undefined;

  // ── Startup banner ──────────────────────────────────────────────────
  console.log(
    `${tag} booting (pid=${process.pid}, node=${process.version}, env=${process.env.NODE_ENV ?? "development"})`,
  );

  const runShutdown = async (): Promise<number> => {
    let failures = 0;
    for (const fn of shutdownFns) {
      try {
        await fn();
      } catch (err) {
        failures += 1;
        console.error(`${tag} shutdown step failed:`, err);
      }
    }
    return failures;
  };

  const shutdown = (reason: string): Promise<number> => {
    if (!shutdownPromise) {
      console.log(`${tag} ${reason}, shutting down`);
      shutdownPromise = runShutdown();
    }
    return shutdownPromise;
  };

  // ── Global crash handlers ───────────────────────────────────────────
  // These fire for errors that escape the startServer().catch(), e.g.
  // top-level ESM import failures or truly unhandled promise rejections.
  const onUncaught = (err: Error) => {
    console.error(`${tag} FATAL uncaught exception:`, err);
    exit(1);
  };

  const onUnhandled = (reason: unknown) => {
    console.error(`${tag} FATAL unhandled rejection:`, reason);
    exit(1);
  };

  // ── Graceful shutdown ───────────────────────────────────────────────
  const onSignal = (signal: NodeJS.Signals) => {
    if (shutdownPromise) return;
    void shutdown(`received ${signal}`).then(
      (failures) => exit(failures > 0 ? 1 : 0),
      (err: unknown) => {
        console.error(`${tag} shutdown failed:`, err);
        exit(1);
      },
    );
  };

  process.on("uncaughtException", onUncaught);
  process.on("unhandledRejection", onUnhandled);
  signals.on("SIGTERM", onSignal);
  signals.on("SIGINT", onSignal);

  // ── Milestone logger ────────────────────────────────────────────────
  return {
    phase(msg: string) {
      console.log(`${tag} ${msg}`);
    },
    ready(port: number) {
      console.log(`${tag} ready on :${port}`);
    },
    onShutdown(fn: ShutdownFn) {
      shutdownFns.push(fn);
    },
    shutdown,
    dispose() {
      process.off("uncaughtException", onUncaught);
      process.off("unhandledRejection", onUnhandled);
      signals.off("SIGTERM", onSignal);
      signals.off("SIGINT", onSignal);
    },
  };
}
