import { describe, expect, it } from "vitest";
import { Tracer } from "../../src/tracer/tracer.js";
import { SimpleWriter } from "../../src/tracer/writers/simple.js";

function setup(options: { showInternal?: boolean } = {}) {
  const lines: string[] = [];
  const tracer = new Tracer();
  tracer.addWriter(
    new SimpleWriter({
      ...options,
      showTimestamp: false,
      showDuration: false,
      output: (line) => lines.push(line),
    }),
  );
  return { lines, tracer };
}

describe("SimpleWriter", () => {
  it("prints spans and their events", () => {
    const { lines, tracer } = setup();
    const span = tracer.startSpan("demo", { type: "command" });
    span.info("Opened store", { dir: "data" });
    span.end();

    expect(lines).toEqual([
      "START [command] demo",
      '  INFO  Opened store dir="data"',
      "END   [command] demo",
    ]);
  });

  it("hides internal spans and bubbles their events up", () => {
    const { lines, tracer } = setup();
    const span = tracer.startSpan("demo", { type: "command" });
    const child = span.startSpan("repository.get", { type: "internal" });
    child.warn("Slow read");
    child.end();
    span.end("error");

    expect(lines).toEqual([
      "START [command] demo",
      "  WARN  Slow read",
      "END   [command] demo [ERROR]",
    ]);
  });

  it("shows internal spans when asked to", () => {
    const { lines, tracer } = setup({ showInternal: true });
    const span = tracer.startSpan("demo", { type: "command" });
    const child = span.startSpan("repository.get", { type: "internal" });
    child.info("Read record");
    child.end();
    span.end();

    expect(lines).toEqual([
      "START [command] demo",
      "  START [internal] repository.get",
      "    INFO  Read record",
      "  END   [internal] repository.get",
      "END   [command] demo",
    ]);
  });

  it("drops events below the tracer's level", () => {
    const { lines, tracer } = setup();
    const span = tracer.startSpan("demo");
    span.debug("Not shown");
    span.end();

    expect(lines).toEqual(["START demo", "END   demo"]);
  });
});

describe("Tracer", () => {
  it("keeps child spans in the parent's trace", () => {
    const tracer = new Tracer();
    const started: { traceId: string; spanId: string; parentSpanId?: string }[] = [];
    tracer.addWriter({ onSpanStart: (span) => started.push(span), onSpanEnd: () => {} });

    const parent = tracer.startSpan("parent");
    parent.startSpan("child");

    expect(started).toHaveLength(2);
    expect(started[1].traceId).toBe(started[0].traceId);
    expect(started[1].parentSpanId).toBe(started[0].spanId);
  });

  it("ignores events after a span has ended", () => {
    const tracer = new Tracer();
    const events: string[] = [];
    tracer.addWriter({ onSpanStart: () => {}, onSpanEnd: () => {}, onEvent: (_, e) => events.push(e.name) });

    const span = tracer.startSpan("span");
    span.info("before");
    span.end();
    span.info("after");

    expect(events).toEqual(["before"]);
  });
});
