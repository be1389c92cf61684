export interface SseSink {
  write(chunk: string): boolean;
  once(event: "drain", listener: () => void): unknown;
}

/**
 * Per-connection outbound queue. Frames are written while the socket accepts
 * them; when it signals back-pressure they wait for `drain`. Once `capacity`
 * frames are waiting the oldest is dropped.
 */
export class SseChannel {
  private readonly queue: string[] = [];
  private waitingForDrain = false;
  private closed = false;
  private dropped = 0;

  constructor(private readonly sink: SseSink, private readonly capacity = 256) {}

  push(frame: string): void {
    if (this.closed) return;
    if (this.waitingForDrain) {
      if (this.queue.length >= this.capacity) {
        this.queue.shift();
        this.dropped += 1;
      }
      this.queue.push(frame);
      return;
    }
    this.write(frame);
  }

  close(): void {
    this.closed = true;
    this.queue.length = 0;
  }

  get pending(): number {
    return this.queue.length;
  }

  get droppedFrames(): number {
    return this.dropped;
  }

  private write(frame: string): void {
    if (this.sink.write(frame)) return;
    this.waitingForDrain = true;
    this.sink.once("drain", () => this.flush());
  }

  private flush(): void {
    this.waitingForDrain = false;
    while (!this.closed && !this.waitingForDrain) {
      const next = this.queue.shift();
      if (next === undefined) return;
      this.write(next);
    }
  }
}
