import { pino, destination as pinoDestination, type DestinationStream, type Logger as PinoLogger } from "pino";

/** Where teardown and rollback failures are reported. */
export type DiagnosticSink = Pick<PinoLogger, "error" | "warn">;

export function createDiagnosticLogger(destination?: DestinationStream): PinoLogger {
  return pino({ name: "vigil", level: "warn" }, destination ?? pinoDestination(2));
}
