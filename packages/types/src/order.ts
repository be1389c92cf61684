export const ORDER_STATUSES = [
  "PENDING",
  "CONFIRMED",
  "PREPARING",
  "READY_FOR_PICKUP",
  "OUT_FOR_DELIVERY",
  "DELIVERED",
  "CANCELLED",
  "RETURNED",
] as const;

export type OrderStatus = (typeof ORDER_STATUSES)[number];

export interface OrderLineItem {
  productId: string;
  name: string;
  quantity: number;
  price: number;
}

export interface OrderRecord {
  id: string;
  orderId: string;
  orderNumber?: number;
  userId: string;
  items: OrderLineItem[];
  totalAmount: number;
  deliveryLocation: string;
  status: OrderStatus;
  timestamp: number;
  createdAtIso: string;
  updatedAtIso: string;
}

export interface CreateOrderRequest {
  orderId?: string;
  items: OrderLineItem[];
  totalAmount: number;
  deliveryLocation: string;
}

export interface SubmitOrderRequest {
  order: CreateOrderRequest;
}

export interface SubmitOrderResponse {
  success: true;
  orderId: string;
  orderNumber: number;
}

export interface OrderPatch {
  items?: OrderLineItem[];
  totalAmount?: number;
  deliveryLocation?: string;
  status?: OrderStatus;
}

export interface OrderListFilter {
  userId?: string;
}

export interface OrderAnalytics {
  totalOrders: number;
  totalRevenue: number;
  statusCounts: Record<string, number>;
}

export interface OrderCounterSnapshot {
  orderCounter: number;
  readAtIso: string;
}
