import type { ZodIssue } from "zod";

export type SubsystemName = "telemetry" | "logger" | "metrics" | "tracer" | "profiler" | "recorder";

/** Teardown steps, in the order shutdown runs them. */
export type TeardownStep = "profiler" | "recorder" | "telemetry";

function describe(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause);
}

/**
 * Raised when a service identity or configuration tree does not match its
 * schema. Never retried.
 */
export class ValidationError extends Error {
  readonly issues: ZodIssue[];

  constructor(issues: ZodIssue[], subject = "service identity") {
    const detail = issues
      .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
    super(`Invalid ${subject}: ${detail}`);
    this.name = "ValidationError";
    this.issues = issues;
  }
}

/**
 * A subsystem constructor failed during startup. `cause` holds the original error.
 */
export class StartupError extends Error {
  readonly subsystem: SubsystemName;

  constructor(subsystem: SubsystemName, cause: unknown) {
    super(`Failed to start ${subsystem}: ${describe(cause)}`, { cause });
    this.name = "StartupError";
    this.subsystem = subsystem;
  }
}

/**
 * A single shutdown step failed. Later steps still run.
 */
export class TeardownError extends Error {
  readonly step: TeardownStep;

  constructor(step: TeardownStep, cause: unknown) {
    super(`Failed to shut down ${step}: ${describe(cause)}`, { cause });
    this.name = "TeardownError";
    this.step = step;
  }
}

export class NotInitializedError extends Error {
  constructor() {
    super("Observability has not been initialized; call initObservability() first");
    this.name = "NotInitializedError";
  }
}
