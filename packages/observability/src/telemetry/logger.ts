import { SeverityNumber, type LogAttributes, type Logger as LogEmitter } from "@opentelemetry/api-logs";
import { pino, type DestinationStream, type Level, type Logger as PinoLogger } from "pino";
import type { ServiceIdentity } from "@vigil/contracts";
import type { LogData, Logger, TelemetryCore } from "../subsystems.js";

const SEVERITY: Record<Level, SeverityNumber> = {
  trace: SeverityNumber.TRACE,
  debug: SeverityNumber.DEBUG,
  info: SeverityNumber.INFO,
  warn: SeverityNumber.WARN,
  error: SeverityNumber.ERROR,
  fatal: SeverityNumber.FATAL
};

export interface LoggerOptions {
  /** Where pino writes; stdout when omitted. */
  destination?: DestinationStream;
}

function encode(value: unknown): string {
  try {
    return JSON.stringify(value) ?? String(value);
  } catch {
    // circular structures and bigints
    return String(value);
  }
}

/**
 * Flatten log data into OpenTelemetry attributes. Primitives pass through,
 * errors become their message, anything else is JSON-encoded.
 */
export function toLogAttributes(data: LogData): LogAttributes {
  const attributes: LogAttributes = {};
  for (const [key, value] of Object.entries(data)) {
    if (value === undefined) continue;
    if (typeof value === "string" || typeof value === "number" || typeof value === "boolean") {
      attributes[key] = value;
    } else if (value instanceof Error) {
      attributes[key] = value.message;
    } else {
      attributes[key] = encode(value);
    }
  }
  return attributes;
}

function errorData(err: Error | LogData | undefined): LogData | undefined {
  return err instanceof Error ? { err } : err;
}

function wrap(instance: PinoLogger, emitter: LogEmitter | undefined, bindings: LogData): Logger {
  const write = (level: Level, msg: string, data?: LogData): void => {
    if (data) {
      instance[level](data, msg);
    } else {
      instance[level](msg);
    }

    if (emitter && instance.isLevelEnabled(level)) {
      emitter.emit({
        severityNumber: SEVERITY[level],
        severityText: level.toUpperCase(),
        body: msg,
        attributes: toLogAttributes({ ...bindings, ...data })
      });
    }
  };

  return {
    trace: (msg, data) => write("trace", msg, data),
    debug: (msg, data) => write("debug", msg, data),
    info: (msg, data) => write("info", msg, data),
    warn: (msg, data) => write("warn", msg, data),
    error: (msg, err) => write("error", msg, errorData(err)),
    fatal: (msg, err) => write("fatal", msg, errorData(err)),
    child: (childBindings) => wrap(instance.child(childBindings), emitter, { ...bindings, ...childBindings })
  };
}

/**
 * Structured logger on pino, tagged with the service identity. When the core
 * exports logs, each record written at an enabled level is also emitted as an
 * OpenTelemetry log record.
 */
export function createLogger(identity: ServiceIdentity, core: TelemetryCore, options: LoggerOptions = {}): Logger {
  const { logging } = core.config;
  const base: LogData = {
    ...identity.attributes,
    service: identity.name,
    version: identity.version,
    environment: identity.environment
  };

  const pinoOptions = { level: logging.level, base };
  const instance = options.destination ? pino(pinoOptions, options.destination) : pino(pinoOptions);
  const emitter = logging.enabled ? core.logEmitter(identity.name, identity.version) : undefined;

  core.onShutdown(
    "logger",
    () =>
      new Promise<void>((resolve, reject) => {
        instance.flush((err) => (err ? reject(err) : resolve()));
      })
  );

  return wrap(instance, emitter, {});
}
