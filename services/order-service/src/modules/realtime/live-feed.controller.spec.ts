import { MemoryDocumentStore } from "@orderdesk/database";
import { EventEmitter } from "node:events";
import { testEnv } from "../../../test/support";
import { LiveFeedController, SseResponse } from "./live-feed.controller";
import { LiveOrderFeedService } from "./live-order-feed.service";

class FakeResponse extends EventEmitter implements SseResponse {
  readonly headers: Record<string, number | string | readonly string[]> = {};
  readonly written: string[] = [];
  statusCode = 0;
  writableEnded = false;

  setHeader(name: string, value: number | string | readonly string[]): this {
    this.headers[name] = value;
    return this;
  }

  writeHead(statusCode: number, headers: Record<string, string>): this {
    this.statusCode = statusCode;
    Object.assign(this.headers, headers);
    return this;
  }

  write(chunk: string): boolean {
    this.written.push(chunk);
    return true;
  }

  end(): this {
    this.writableEnded = true;
    return this;
  }
}

describe("LiveFeedController", () => {
  let store: MemoryDocumentStore;
  let controller: LiveFeedController;

  beforeEach(() => {
    jest.useFakeTimers({ now: new Date("2026-03-01T10:00:00.000Z") });
    store = new MemoryDocumentStore();
    controller = new LiveFeedController(new LiveOrderFeedService(store, testEnv()));
  });

  afterEach(() => {
    controller.onModuleDestroy();
    jest.useRealTimers();
  });

  it("keeps headers set before the hijack and opens an event stream", () => {
    const response = new FakeResponse();

    controller.openStream(response, { "access-control-allow-origin": "*", "x-unset": undefined });

    expect(response.statusCode).toBe(200);
    expect(response.headers).toEqual({
      "access-control-allow-origin": "*",
      "content-type": "text/event-stream",
      "cache-control": "no-cache",
      connection: "keep-alive",
      "x-accel-buffering": "no",
    });
    expect(response.written).toEqual([
      'data: {"type":"connected","message":"Connected to live order feed","connectedAt":"2026-03-01T10:00:00.000Z"}\n\n',
    ]);
    expect(store.subscriptionCount()).toBe(1);
    expect(controller.openStreams).toBe(1);
  });

  it("releases the store listener when the client disconnects", () => {
    const response = new FakeResponse();
    controller.openStream(response);

    response.emit("close");

    expect(store.subscriptionCount()).toBe(0);
    expect(controller.openStreams).toBe(0);
    expect(response.writableEnded).toBe(true);

    response.emit("close");
    expect(controller.openStreams).toBe(0);
  });

  it("stops forwarding heartbeats after a disconnect", () => {
    const response = new FakeResponse();
    controller.openStream(response);

    jest.advanceTimersByTime(30_000);
    expect(response.written).toHaveLength(2);
    expect(response.written[1]).toBe(": heartbeat\n\n");

    response.emit("close");
    jest.advanceTimersByTime(60_000);
    expect(response.written).toHaveLength(2);
  });

  it("ends every open stream on shutdown", () => {
    const first = new FakeResponse();
    const second = new FakeResponse();
    controller.openStream(first);
    controller.openStream(second);
    expect(store.subscriptionCount()).toBe(2);

    controller.onModuleDestroy();

    expect(store.subscriptionCount()).toBe(0);
    expect(controller.openStreams).toBe(0);
    expect(first.writableEnded).toBe(true);
    expect(second.writableEnded).toBe(true);
  });
});
