import { isLevelEnabled } from "../tracer.js";
import type { EventLevel, SpanData, SpanEvent, TraceWriter } from "../types.js";

export interface SimpleWriterOptions {
  /** Minimum event level to display (default: "info") */
  minLevel?: EventLevel;
  /** Show internal spans such as single repository operations (default: false) */
  showInternal?: boolean;
  showTimestamp?: boolean;
  showDuration?: boolean;
  /** Custom output function (default: console.error) */
  output?: (line: string) => void;
}

/**
 * Line-oriented writer. Spans print as START/END pairs, events print one
 * level deeper than the nearest visible span.
 */
export class SimpleWriter implements TraceWriter {
  private minLevel: EventLevel;
  private showInternal: boolean;
  private showTimestamp: boolean;
  private showDuration: boolean;
  private output: (line: string) => void;

  private spans: Map<string, SpanData> = new Map();
  private visibleDepths: Map<string, number> = new Map();

  constructor(options: SimpleWriterOptions = {}) {
    this.minLevel = options.minLevel ?? "info";
    this.showInternal = options.showInternal ?? false;
    this.showTimestamp = options.showTimestamp ?? true;
    this.showDuration = options.showDuration ?? true;
    this.output = options.output ?? console.error;
  }

  private isSpanVisible(span: SpanData): boolean {
    return span.type !== "internal" || this.showInternal;
  }

  private findVisibleAncestor(span: SpanData): SpanData | null {
    let currentId = span.parentSpanId;
    while (currentId) {
      const parent = this.spans.get(currentId);
      if (!parent) break;
      if (this.isSpanVisible(parent)) {
        return parent;
      }
      currentId = parent.parentSpanId;
    }
    return null;
  }

  private depthOf(span: SpanData): number {
    const ancestor = this.findVisibleAncestor(span);
    if (!ancestor) return 0;
    return (this.visibleDepths.get(ancestor.spanId) ?? 0) + 1;
  }

  private formatTimestamp(): string {
    if (!this.showTimestamp) return "";
    const now = new Date();
    const time = now.toTimeString().slice(0, 8);
    const ms = now.getMilliseconds().toString().padStart(3, "0");
    return `[${time}.${ms}] `;
  }

  private formatDuration(span: SpanData): string {
    if (!this.showDuration || span.endTime === undefined) return "";
    const duration = span.endTime - span.startTime;
    if (duration < 1000) {
      return ` (${Math.round(duration)}ms)`;
    }
    return ` (${(duration / 1000).toFixed(2)}s)`;
  }

  private formatSpanName(span: SpanData): string {
    return span.type ? `[${span.type}] ${span.name}` : span.name;
  }

  onSpanStart(span: SpanData): void {
    this.spans.set(span.spanId, span);
    if (!this.isSpanVisible(span)) return;

    const depth = this.depthOf(span);
    this.visibleDepths.set(span.spanId, depth);
    this.output(`${this.formatTimestamp()}${"  ".repeat(depth)}START ${this.formatSpanName(span)}`);
  }

  onSpanEnd(span: SpanData): void {
    this.spans.delete(span.spanId);
    if (!this.isSpanVisible(span)) return;

    const depth = this.visibleDepths.get(span.spanId) ?? 0;
    this.visibleDepths.delete(span.spanId);
    const status = span.status === "error" ? " [ERROR]" : "";
    this.output(
      `${this.formatTimestamp()}${"  ".repeat(depth)}END   ${this.formatSpanName(span)}${this.formatDuration(span)}${status}`,
    );
  }

  onEvent(span: SpanData, event: SpanEvent): void {
    if (!isLevelEnabled(event.level, this.minLevel)) return;

    let depth: number;
    if (this.isSpanVisible(span)) {
      depth = this.visibleDepths.get(span.spanId) ?? 0;
    } else {
      // Bubble up to visible ancestor
      const ancestor = this.findVisibleAncestor(span);
      depth = ancestor ? (this.visibleDepths.get(ancestor.spanId) ?? 0) : 0;
    }

    const level = event.level.toUpperCase().padEnd(5);
    let line = `${this.formatTimestamp()}${"  ".repeat(depth + 1)}${level} ${event.name}`;

    const attrs = Object.entries(event.attributes ?? {});
    if (attrs.length > 0) {
      line += " " + attrs.map(([k, v]) => `${k}=${JSON.stringify(v)}`).join(" ");
    }

    this.output(line);
  }
}
