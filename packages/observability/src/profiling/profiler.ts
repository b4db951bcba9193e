import { mkdir, writeFile } from "node:fs/promises";
import * as inspector from "node:inspector";
import { join } from "node:path";
import type { ProfilingConfig, ServiceIdentity } from "@vigil/contracts";
import type { Profiler } from "../subsystems.js";

export class ProfilerStoppedError extends Error {
  constructor() {
    super("Profiler has already been stopped");
    this.name = "ProfilerStoppedError";
  }
}

export class ProfileFlushError extends Error {
  constructor(cause: unknown) {
    super("A periodic profile flush failed", { cause });
    this.name = "ProfileFlushError";
  }
}

type Settle = (err: Error | null) => void;

function settle(resolve: () => void, reject: (reason: Error) => void): Settle {
  return (err) => (err ? reject(err) : resolve());
}

function startSampling(session: inspector.Session): Promise<void> {
  return new Promise((resolve, reject) => session.post("Profiler.start", settle(resolve, reject)));
}

function stopProfile(session: inspector.Session): Promise<inspector.Profiler.Profile> {
  return new Promise((resolve, reject) => {
    session.post("Profiler.stop", (err, result) => (err ? reject(err) : resolve(result.profile)));
  });
}

/**
 * In-process CPU profiler driven through the V8 inspector protocol.
 *
 * Sampling starts on {@link CpuProfiler.start}. Every `flushIntervalMs` the
 * current profile is written out and sampling restarts, so samples never pile
 * up for the life of the process; `0` turns the schedule off.
 * {@link CpuProfiler.stop} writes the last profile. Each `.cpuprofile`
 * (loadable in Chrome DevTools) carries the service tags.
 */
export class CpuProfiler implements Profiler {
  private session: inspector.Session | undefined;
  private timer: NodeJS.Timeout | undefined;
  private queue: Promise<unknown> = Promise.resolve();
  private sequence = 0;
  private flushError: unknown;

  private constructor(
    session: inspector.Session,
    private readonly identity: ServiceIdentity,
    private readonly config: ProfilingConfig
  ) {
    this.session = session;
    if (config.flushIntervalMs > 0) {
      this.timer = setInterval(() => {
        void this.scheduledFlush();
      }, config.flushIntervalMs);
      this.timer.unref();
    }
  }

  static async start(identity: ServiceIdentity, config: ProfilingConfig): Promise<CpuProfiler> {
    const session = new inspector.Session();
    session.connect();

    try {
      await new Promise<void>((resolve, reject) => session.post("Profiler.enable", settle(resolve, reject)));
      await new Promise<void>((resolve, reject) =>
        session.post("Profiler.setSamplingInterval", { interval: config.samplingIntervalUs }, settle(resolve, reject))
      );
      await startSampling(session);
    } catch (error) {
      session.disconnect();
      throw error;
    }

    return new CpuProfiler(session, identity, config);
  }

  get tags(): Record<string, string> {
    return {
      service: this.identity.name,
      version: this.identity.version,
      environment: this.identity.environment,
      ...this.config.tags
    };
  }

  /**
   * Write the samples taken so far and keep profiling.
   *
   * @returns Path of the written `.cpuprofile`.
   * @throws {ProfilerStoppedError} If the profiler has been stopped.
   */
  flush(): Promise<string> {
    return this.enqueue(async () => {
      const session = this.session;
      if (!session) {
        throw new ProfilerStoppedError();
      }
      const profile = await stopProfile(session);
      await startSampling(session);
      return this.write(profile);
    });
  }

  /**
   * Stop sampling and write the last profile.
   *
   * @returns Path of the written `.cpuprofile`.
   * @throws {ProfilerStoppedError} If called after a previous stop.
   * @throws {ProfileFlushError} If an earlier scheduled flush failed; the last
   *   profile is still written.
   */
  async stop(): Promise<string> {
    if (!this.session) {
      throw new ProfilerStoppedError();
    }
    clearInterval(this.timer);
    this.timer = undefined;

    const path = await this.enqueue(async () => {
      const session = this.session;
      if (!session) {
        throw new ProfilerStoppedError();
      }
      this.session = undefined;
      try {
        return await this.write(await stopProfile(session));
      } finally {
        session.disconnect();
      }
    });

    if (this.flushError !== undefined) {
      throw new ProfileFlushError(this.flushError);
    }
    return path;
  }

  private async scheduledFlush(): Promise<void> {
    try {
      await this.flush();
    } catch (error) {
      if (error instanceof ProfilerStoppedError) return;
      this.flushError ??= error;
    }
  }

  private enqueue<T>(operation: () => Promise<T>): Promise<T> {
    const next = this.queue.then(operation);
    // A failed flush must not wedge the stop queued behind it.
    this.queue = next.catch(() => undefined);
    return next;
  }

  private async write(profile: inspector.Profiler.Profile): Promise<string> {
    const { name, environment } = this.identity;
    this.sequence += 1;
    const path = join(this.config.outputDir, `${name}.${environment}.${Date.now()}.${this.sequence}.cpuprofile`);

    await mkdir(this.config.outputDir, { recursive: true });
    await writeFile(path, JSON.stringify({ ...profile, tags: this.tags }));
    return path;
  }
}

export function startProfiler(identity: ServiceIdentity, config: ProfilingConfig): Promise<CpuProfiler> {
  return CpuProfiler.start(identity, config);
}
