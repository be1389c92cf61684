import { LiveFeedFrame } from "@orderdesk/types";

export const SSE_HEARTBEAT = ": heartbeat\n\n";

/** Data frames carry one JSON object; heartbeats are SSE comments so clients ignore them. */
export function formatSseFrame(frame: LiveFeedFrame): string {
  switch (frame.kind) {
    case "heartbeat":
      return SSE_HEARTBEAT;
    case "connected":
      return `data: ${JSON.stringify({ type: "connected", message: frame.message, connectedAt: frame.connectedAtIso })}\n\n`;
    case "order":
      return `data: ${JSON.stringify(frame.event)}\n\n`;
  }
}
