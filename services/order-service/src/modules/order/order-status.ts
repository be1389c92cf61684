import { ORDER_STATUSES, OrderStatus } from "@orderdesk/types";

export const TERMINAL_STATUSES: ReadonlySet<OrderStatus> = new Set<OrderStatus>(["DELIVERED", "CANCELLED", "RETURNED"]);

/** Fulfilment order. An open order may jump ahead to any later step. */
const PROGRESSION: readonly OrderStatus[] = [
  "PENDING",
  "CONFIRMED",
  "PREPARING",
  "READY_FOR_PICKUP",
  "OUT_FOR_DELIVERY",
  "DELIVERED",
];

function transitionsFrom(status: OrderStatus): readonly OrderStatus[] {
  if (TERMINAL_STATUSES.has(status)) return [];
  const later = PROGRESSION.slice(PROGRESSION.indexOf(status) + 1);
  return [...later, "CANCELLED", "RETURNED"];
}

const ORDER_TRANSITIONS: Readonly<Record<OrderStatus, readonly OrderStatus[]>> = {
  PENDING: transitionsFrom("PENDING"),
  CONFIRMED: transitionsFrom("CONFIRMED"),
  PREPARING: transitionsFrom("PREPARING"),
  READY_FOR_PICKUP: transitionsFrom("READY_FOR_PICKUP"),
  OUT_FOR_DELIVERY: transitionsFrom("OUT_FOR_DELIVERY"),
  DELIVERED: transitionsFrom("DELIVERED"),
  CANCELLED: transitionsFrom("CANCELLED"),
  RETURNED: transitionsFrom("RETURNED"),
};

export const ORDER_UPDATE_TITLE = "Order Update";

const STATUS_MESSAGES: Readonly<Record<string, string>> = {
  PENDING: "⏳ Your order is pending confirmation",
  CONFIRMED: "✅ Your order has been confirmed!",
  PREPARING: "👨‍🍳 Your order is being prepared",
  PREPARING_ORDER: "👨‍🍳 Your order is being prepared",
  READY_FOR_PICKUP: "📦 Your order is ready for pickup!",
  OUT_FOR_DELIVERY: "🚚 Your order is on the way!",
  ON_WAY: "🚚 Your order is on the way!",
  DELIVERED: "✨ Your order has been delivered!",
  CANCELLED: "❌ Your order has been cancelled",
  RETURNED: "↩️ Your order has been returned",
};

export function isOrderStatus(value: unknown): value is OrderStatus {
  return typeof value === "string" && ORDER_STATUSES.some((status) => status === value);
}

export function allowedTransitions(from: OrderStatus): readonly OrderStatus[] {
  return ORDER_TRANSITIONS[from];
}

export function canTransition(from: OrderStatus, to: OrderStatus): boolean {
  return ORDER_TRANSITIONS[from].includes(to);
}

export function statusMessage(status: string): string {
  return Object.prototype.hasOwnProperty.call(STATUS_MESSAGES, status)
    ? STATUS_MESSAGES[status]
    : `Order status: ${status}`;
}
