import { Controller, Get, Logger, OnModuleDestroy, Res, UseGuards } from "@nestjs/common";
import { FastifyReply } from "fastify";
import { Subscription } from "rxjs";
import { AdminAuthGuard } from "../auth/auth.guards";
import { LiveOrderFeedService } from "./live-order-feed.service";
import { SseChannel, SseSink } from "./sse-channel";
import { formatSseFrame } from "./sse-format";

/** The slice of `http.ServerResponse` a live stream writes to. */
export interface SseResponse extends SseSink {
  setHeader(name: string, value: number | string | readonly string[]): unknown;
  writeHead(statusCode: number, headers: Record<string, string>): unknown;
  on(event: "close", listener: () => void): unknown;
  end(): unknown;
  readonly writableEnded: boolean;
}

export type InheritedHeaders = Record<string, number | string | string[] | undefined>;

const SSE_HEADERS: Record<string, string> = {
  "content-type": "text/event-stream",
  "cache-control": "no-cache",
  connection: "keep-alive",
  "x-accel-buffering": "no",
};

@Controller("admin/stream")
@UseGuards(AdminAuthGuard)
export class LiveFeedController implements OnModuleDestroy {
  private readonly logger = new Logger(LiveFeedController.name);
  private readonly open = new Set<() => void>();

  constructor(private readonly feed: LiveOrderFeedService) {}

  @Get("orders")
  streamOrders(@Res() reply: FastifyReply): void {
    reply.hijack();
    // Headers set by hooks (CORS) would be lost once the reply is hijacked.
    this.openStream(reply.raw, reply.getHeaders());
  }

  openStream(response: SseResponse, inherited: InheritedHeaders = {}): void {
    for (const [name, value] of Object.entries(inherited)) {
      if (value !== undefined) response.setHeader(name, value);
    }
    response.writeHead(200, SSE_HEADERS);

    const channel = new SseChannel(response);
    let subscription: Subscription | undefined;
    const release = (): void => {
      if (!this.open.delete(release)) return;
      subscription?.unsubscribe();
      channel.close();
      if (!response.writableEnded) response.end();
    };
    this.open.add(release);
    response.on("close", release);

    subscription = this.feed.stream().subscribe({
      next: (frame) => channel.push(formatSseFrame(frame)),
      error: (error: unknown) => {
        this.logger.warn(`Live feed ended with error: ${String(error)}`);
        release();
      },
    });
  }

  get openStreams(): number {
    return this.open.size;
  }

  onModuleDestroy(): void {
    for (const release of Array.from(this.open)) release();
  }
}
