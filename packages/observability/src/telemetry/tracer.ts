import { SpanStatusCode, type Attributes, type Span, type Tracer as OtelTracer } from "@opentelemetry/api";
import type { ServiceIdentity } from "@vigil/contracts";
import type { SpanAttributes, SpanHandle, TelemetryCore, Tracer } from "../subsystems.js";

function defined(attributes: SpanAttributes): Attributes {
  const filtered: Attributes = {};
  for (const [key, value] of Object.entries(attributes)) {
    if (value !== undefined) {
      filtered[key] = value;
    }
  }
  return filtered;
}

class OtelSpanHandle implements SpanHandle {
  constructor(private readonly span: Span) {}

  setAttributes(attributes: SpanAttributes): void {
    this.span.setAttributes(defined(attributes));
  }

  addEvent(name: string, attributes?: SpanAttributes): void {
    this.span.addEvent(name, attributes ? defined(attributes) : undefined);
  }

  setOk(): void {
    this.span.setStatus({ code: SpanStatusCode.OK });
  }

  setError(error: unknown): void {
    if (error instanceof Error) {
      this.span.recordException(error);
    }
    this.span.setStatus({
      code: SpanStatusCode.ERROR,
      message: error instanceof Error ? error.message : String(error)
    });
  }

  end(): void {
    this.span.end();
  }
}

export class OtelTracerAdapter implements Tracer {
  constructor(private readonly tracer: OtelTracer) {}

  startSpan(name: string, attributes?: SpanAttributes): SpanHandle {
    const span = this.tracer.startSpan(name, attributes ? { attributes: defined(attributes) } : undefined);
    return new OtelSpanHandle(span);
  }

  /**
   * Run `fn` inside an active span. The span is marked OK when `fn` resolves,
   * records the exception and is marked ERROR when it throws, and is always ended.
   */
  withSpan<T>(name: string, fn: (span: SpanHandle) => Promise<T> | T, attributes?: SpanAttributes): Promise<T> {
    const options = attributes ? { attributes: defined(attributes) } : {};
    return this.tracer.startActiveSpan(name, options, async (span): Promise<T> => {
      const handle = new OtelSpanHandle(span);
      try {
        const result = await fn(handle);
        handle.setOk();
        return result;
      } catch (error) {
        handle.setError(error);
        throw error;
      } finally {
        span.end();
      }
    });
  }
}

/** Spans go wherever the core sends them; with export off they are no-ops. */
export function createTracer(identity: ServiceIdentity, core: TelemetryCore): Tracer {
  return new OtelTracerAdapter(core.tracer(identity.name, identity.version));
}
