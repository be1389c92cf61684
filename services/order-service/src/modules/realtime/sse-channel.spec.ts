import { EventEmitter } from "events";
import { formatSseFrame, SSE_HEARTBEAT } from "./sse-format";
import { SseChannel, SseSink } from "./sse-channel";

class FakeSink extends EventEmitter implements SseSink {
  readonly written: string[] = [];
  accepting = true;

  write(chunk: string): boolean {
    this.written.push(chunk);
    return this.accepting;
  }
}

describe("formatSseFrame", () => {
  it("writes order events as data frames", () => {
    expect(formatSseFrame({
      kind: "order",
      event: { type: "new_order", id: "ORD3", orderId: "ORD3", totalAmount: 12.5, status: "PENDING", timestamp: 7 },
    })).toBe('data: {"type":"new_order","id":"ORD3","orderId":"ORD3","totalAmount":12.5,"status":"PENDING","timestamp":7}\n\n');
  });

  it("writes the greeting and heartbeat", () => {
    expect(formatSseFrame({ kind: "connected", message: "hello", connectedAtIso: "2026-03-01T10:00:00.000Z" }))
      .toBe('data: {"type":"connected","message":"hello","connectedAt":"2026-03-01T10:00:00.000Z"}\n\n');
    expect(formatSseFrame({ kind: "heartbeat" })).toBe(SSE_HEARTBEAT);
    expect(SSE_HEARTBEAT).toBe(": heartbeat\n\n");
  });
});

describe("SseChannel", () => {
  it("writes straight through while the sink accepts data", () => {
    const sink = new FakeSink();
    const channel = new SseChannel(sink);

    channel.push("a");
    channel.push("b");

    expect(sink.written).toEqual(["a", "b"]);
    expect(channel.pending).toBe(0);
  });

  it("holds frames until drain", () => {
    const sink = new FakeSink();
    const channel = new SseChannel(sink);
    sink.accepting = false;

    channel.push("a");
    channel.push("b");
    channel.push("c");
    expect(sink.written).toEqual(["a"]);
    expect(channel.pending).toBe(2);

    sink.accepting = true;
    sink.emit("drain");

    expect(sink.written).toEqual(["a", "b", "c"]);
    expect(channel.pending).toBe(0);
  });

  it("drops the oldest waiting frame when full", () => {
    const sink = new FakeSink();
    const channel = new SseChannel(sink, 2);
    sink.accepting = false;

    for (const frame of ["a", "b", "c", "d"]) channel.push(frame);
    expect(channel.droppedFrames).toBe(1);

    sink.accepting = true;
    sink.emit("drain");

    expect(sink.written).toEqual(["a", "c", "d"]);
  });

  it("ignores frames after close", () => {
    const sink = new FakeSink();
    const channel = new SseChannel(sink);
    sink.accepting = false;
    channel.push("a");
    channel.push("b");

    channel.close();
    channel.push("c");
    sink.emit("drain");

    expect(sink.written).toEqual(["a"]);
    expect(channel.pending).toBe(0);
  });
});
