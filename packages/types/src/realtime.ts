import { OrderStatus } from "./order";

export type LiveOrderEventType = "new_order" | "order_update";

export interface LiveOrderEvent {
  type: LiveOrderEventType;
  id: string;
  orderId: string;
  totalAmount: number;
  status: OrderStatus;
  timestamp: number;
}

export interface LiveFeedConnectedFrame {
  kind: "connected";
  message: string;
  connectedAtIso: string;
}

export interface LiveFeedOrderFrame {
  kind: "order";
  event: LiveOrderEvent;
}

export interface LiveFeedHeartbeatFrame {
  kind: "heartbeat";
}

export type LiveFeedFrame = LiveFeedConnectedFrame | LiveFeedOrderFrame | LiveFeedHeartbeatFrame;

export interface NotificationRecord {
  id: string;
  userId: string;
  title: string;
  body: string;
  type: "order";
  orderId: string;
  status: string;
  createdAtIso: string;
  read: boolean;
}

export type PushPayloadType = "order_update" | "new_order";

export interface PushMessage {
  token: string;
  title: string;
  body: string;
  data: Record<string, string> & { type: PushPayloadType };
}

export interface RegisterDeviceTokenRequest {
  token: string;
}
