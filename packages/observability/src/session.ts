import type { ObservabilityConfigInput, ServiceIdentityInput } from "@vigil/contracts";
import { createDiagnosticLogger } from "./diagnostics.js";
import { Observability, type ObservabilityOptions } from "./observability.js";

export interface SessionOptions extends ObservabilityOptions {
  /**
   * Receives the shutdown failure, if any. It has already been reported to
   * the diagnostic sink by then and never replaces the scope's own outcome.
   */
  onShutdownError?: (error: unknown) => void;
}

/**
 * Create an {@link Observability} handle, run `scope` with it, and shut the
 * handle down once the scope settles, whether it returned or threw.
 *
 * Resolves with what the scope returned and rejects with what it threw. When
 * startup fails, the {@link StartupError} propagates and the scope never runs.
 *
 * @example
 * ```ts
 * await withSession({ name: "ingest" }, {}, async ({ logger, tracer }) => {
 *   await tracer.withSpan("ingest.batch", () => ingestBatch(logger));
 * });
 * ```
 */
export async function withSession<T>(
  identity: ServiceIdentityInput,
  config: ObservabilityConfigInput,
  scope: (observability: Observability) => Promise<T> | T,
  options: SessionOptions = {}
): Promise<T> {
  const { onShutdownError, ...createOptions } = options;
  const diagnostics = createOptions.diagnostics ?? createDiagnosticLogger();
  const observability = await Observability.create(identity, config, { ...createOptions, diagnostics });

  try {
    return await scope(observability);
  } finally {
    try {
      await observability.shutdown();
    } catch (error) {
      diagnostics.warn({ err: error }, "session shutdown failed after scope exit");
      onShutdownError?.(error);
    }
  }
}
