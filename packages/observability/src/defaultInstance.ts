import type { ObservabilityConfigInput, ServiceIdentityInput } from "@vigil/contracts";
import { NotInitializedError } from "./errors.js";
import { Observability, type ObservabilityOptions } from "./observability.js";

// Opt-in process default. Nothing here runs unless initObservability() is
// called; libraries should take an Observability handle as a parameter instead.

let defaultInstance: Observability | null = null;

/**
 * Create the process default handle, shutting down any previous one first.
 */
export async function initObservability(
  identity: ServiceIdentityInput,
  config: ObservabilityConfigInput = {},
  options: ObservabilityOptions = {}
): Promise<Observability> {
  if (defaultInstance) {
    const previous = defaultInstance;
    defaultInstance = null;
    await previous.shutdown();
  }

  defaultInstance = await Observability.create(identity, config, options);
  return defaultInstance;
}

/**
 * @throws {NotInitializedError} If {@link initObservability} has not run.
 */
export function getObservability(): Observability {
  if (!defaultInstance) {
    throw new NotInitializedError();
  }
  return defaultInstance;
}

export async function shutdownObservability(): Promise<void> {
  if (defaultInstance) {
    const current = defaultInstance;
    defaultInstance = null;
    await current.shutdown();
  }
}
