export { Tracer } from "./tracer.js";
export type {
  EventLevel,
  SpanData,
  SpanEvent,
  SpanOptions,
  SpanParent,
  SpanStatus,
  SpanType,
  TraceWriter,
  TracingContext,
} from "./types.js";
export { SimpleWriter } from "./writers/simple.js";
export type { SimpleWriterOptions } from "./writers/simple.js";
