import { randomUUID } from "node:crypto";
import type {
  EventLevel,
  SpanData,
  SpanEvent,
  SpanOptions,
  SpanParent,
  SpanStatus,
  TraceWriter,
  TracingContext,
} from "./types.js";

const levelOrder: Record<EventLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export function isLevelEnabled(level: EventLevel, minLevel: EventLevel): boolean {
  return levelOrder[level] >= levelOrder[minLevel];
}

function createSpanData(name: string, options?: SpanOptions, parent?: SpanData): SpanData {
  return {
    traceId: parent?.traceId ?? randomUUID(),
    spanId: randomUUID(),
    parentSpanId: parent?.spanId,
    name,
    type: options?.type,
    startTime: performance.now(),
    status: "ok",
    attributes: {},
    events: [],
  };
}

/**
 * Root tracer that manages writers and creates spans.
 * All logging happens within spans - the Tracer itself is just configuration and factory.
 */
export class Tracer implements SpanParent {
  private writers: TraceWriter[] = [];
  minLevel: EventLevel;

  constructor(options: { minLevel?: EventLevel } = {}) {
    this.minLevel = options.minLevel ?? "info";
  }

  addWriter(writer: TraceWriter): void {
    if (!this.writers.includes(writer)) {
      this.writers.push(writer);
    }
  }

  startSpan(name: string, options?: SpanOptions): TracingContext {
    return this._open(createSpanData(name, options));
  }

  /** @internal */
  _open(data: SpanData): TracingContext {
    this.writers.forEach((w) => w.onSpanStart(data));
    return new Span(data, this);
  }

  /** @internal */
  _notifySpanEnd(data: SpanData): void {
    this.writers.forEach((w) => w.onSpanEnd(data));
  }

  /** @internal */
  _notifyEvent(data: SpanData, event: SpanEvent): void {
    this.writers.forEach((w) => w.onEvent?.(data, event));
  }
}

class Span implements TracingContext {
  private ended = false;

  constructor(
    private data: SpanData,
    private tracer: Tracer,
  ) {}

  startSpan(name: string, options?: SpanOptions): TracingContext {
    return this.tracer._open(createSpanData(name, options, this.data));
  }

  end(status: SpanStatus = "ok"): void {
    if (this.ended) return;

    this.ended = true;
    this.data.endTime = performance.now();
    this.data.status = status;
    this.tracer._notifySpanEnd(this.data);
  }

  private addEvent(name: string, level: EventLevel, attributes?: Record<string, unknown>): void {
    if (this.ended) return;
    if (!isLevelEnabled(level, this.tracer.minLevel)) return;

    const event: SpanEvent = {
      name,
      timestamp: performance.now(),
      level,
      attributes,
    };

    this.data.events.push(event);
    this.tracer._notifyEvent(this.data, event);
  }

  debug(message: string, attributes?: Record<string, unknown>): void {
    this.addEvent(message, "debug", attributes);
  }

  info(message: string, attributes?: Record<string, unknown>): void {
    this.addEvent(message, "info", attributes);
  }

  warn(message: string, attributes?: Record<string, unknown>): void {
    this.addEvent(message, "warn", attributes);
  }

  error(message: string, attributes?: Record<string, unknown>): void {
    this.addEvent(message, "error", attributes);
  }

  setAttribute(key: string, value: unknown): void {
    this.setAttributes({ [key]: value });
  }

  setAttributes(attributes: Record<string, unknown>): void {
    if (this.ended) return;

    Object.assign(this.data.attributes, attributes);
  }
}
