import { DocumentData, DocumentStore } from "@orderdesk/database";
import { IdempotencyStore } from "@orderdesk/persistence";
import {
  CreateOrderRequest,
  OrderAnalytics,
  OrderLineItem,
  OrderCounterSnapshot,
  OrderListFilter,
  OrderPatch,
  OrderRecord,
  Principal,
  SubmitOrderResponse,
} from "@orderdesk/types";
import { Inject, Injectable, Logger } from "@nestjs/common";
import { randomUUID } from "crypto";
import { OrderServiceEnv } from "../../config/env";
import { ConflictError, NotFoundError, ValidationError } from "../../common/errors";
import { assertValidPayload } from "../../common/validation";
import { DOCUMENT_STORE, SERVICE_ENV, SUBMIT_IDEMPOTENCY } from "../../common/tokens";
import { NotificationsService } from "../notifications/notifications.service";
import { canTransition, ORDER_UPDATE_TITLE, statusMessage, TERMINAL_STATUSES } from "./order-status";
import { CreateOrderDto, UpdateOrderDto } from "./dto/order.dto";
import { OrderRepository } from "./repository/order.repository";
import { formatOrderId, SequenceAllocator } from "./sequence-allocator";

const RESERVED_ORDER_ID = /^ORD\d+$/;

function normalizeItems(items: OrderLineItem[]): OrderLineItem[] {
  return items.map((item) => ({
    productId: item.productId.trim(),
    name: item.name.trim(),
    quantity: item.quantity,
    price: item.price,
  }));
}

function parseSubmitResponse(raw: unknown): SubmitOrderResponse | null {
  if (typeof raw !== "object" || raw === null) return null;
  if (!("orderId" in raw) || typeof raw.orderId !== "string") return null;
  if (!("orderNumber" in raw) || typeof raw.orderNumber !== "number") return null;
  return { success: true, orderId: raw.orderId, orderNumber: raw.orderNumber };
}

@Injectable()
export class OrderService {
  private readonly logger = new Logger(OrderService.name);

  constructor(
    private readonly orders: OrderRepository,
    private readonly allocator: SequenceAllocator,
    private readonly notifications: NotificationsService,
    @Inject(DOCUMENT_STORE) private readonly store: DocumentStore,
    @Inject(SUBMIT_IDEMPOTENCY) private readonly idempotency: IdempotencyStore,
    @Inject(SERVICE_ENV) private readonly env: OrderServiceEnv,
  ) {}

  async createOrder(ownerId: string, input: CreateOrderRequest): Promise<OrderRecord> {
    assertValidPayload(CreateOrderDto, input);
    const clientOrderId = input.orderId;
    if (clientOrderId !== undefined && RESERVED_ORDER_ID.test(clientOrderId)) {
      throw new ValidationError("orderId values of the form ORD<n> are reserved for submitted orders", [
        { field: "orderId", message: "orderId values of the form ORD<n> are reserved for submitted orders" },
      ]);
    }

    const orderId = clientOrderId || randomUUID().replace(/-/g, "").slice(0, 20);
    const order = this.buildOrder(ownerId, orderId, input);

    await this.store.runTransaction(async (tx) => {
      if (await this.orders.existsInTransaction(tx, orderId)) {
        throw new ConflictError(`Order ${orderId} already exists`);
      }
      this.orders.insertInTransaction(tx, order);
    });

    this.logger.log(`Order ${orderId} created for ${ownerId}`);
    return order;
  }

  /**
   * Creates an order numbered from the shared counter. The counter increment
   * and the order write commit together. A repeated idempotency key returns
   * the first result without allocating again.
   */
  async submitOrder(ownerId: string, input: CreateOrderRequest, idempotencyKey?: string): Promise<SubmitOrderResponse> {
    assertValidPayload(CreateOrderDto, input, "order");
    const key = idempotencyKey?.trim();
    if (!key) return this.submitOnce(ownerId, input);
    return this.idempotency.execute(`${ownerId}:${key}`, () => this.submitOnce(ownerId, input), parseSubmitResponse);
  }

  async getOrder(orderId: string, requester: Principal): Promise<OrderRecord> {
    return this.loadAccessible(orderId, requester);
  }

  async updateOrder(orderId: string, requester: Principal, patch: OrderPatch): Promise<OrderRecord> {
    const current = await this.loadAccessible(orderId, requester);
    assertValidPayload(UpdateOrderDto, patch);

    if (patch.status !== undefined) {
      if (TERMINAL_STATUSES.has(current.status)) {
        throw new ValidationError(`Order ${orderId} is ${current.status} and can no longer change status`, [
          { field: "status", message: `Order is ${current.status} and can no longer change status` },
        ]);
      }
      if (!canTransition(current.status, patch.status)) {
        throw new ValidationError(`Cannot move order from ${current.status} to ${patch.status}`, [
          { field: "status", message: `Cannot move order from ${current.status} to ${patch.status}` },
        ]);
      }
    }

    const changes: DocumentData = { updatedAtIso: new Date().toISOString() };
    if (patch.items !== undefined) {
      changes.items = normalizeItems(patch.items).map((item) => ({
        productId: item.productId,
        name: item.name,
        quantity: item.quantity,
        price: item.price,
      }));
    }
    if (patch.totalAmount !== undefined) changes.totalAmount = patch.totalAmount;
    if (patch.deliveryLocation !== undefined) changes.deliveryLocation = patch.deliveryLocation.trim();
    if (patch.status !== undefined) changes.status = patch.status;

    const updated = await this.orders.update(orderId, changes);
    if (!updated) throw new NotFoundError("Order not found");

    if (patch.status !== undefined && requester.kind === "admin") {
      await this.notifyStatusChange(updated, patch.status);
    }
    return updated;
  }

  async deleteOrder(orderId: string, requester: Principal): Promise<void> {
    await this.loadAccessible(orderId, requester);
    const deleted = await this.orders.delete(orderId);
    if (!deleted) throw new NotFoundError("Order not found");
    this.logger.log(`Order ${orderId} deleted by ${requester.kind} ${requester.id}`);
  }

  listOrders(filter: OrderListFilter): Promise<OrderRecord[]> {
    return this.orders.list(filter.userId);
  }

  recentOrders(limit = this.env.recentOrdersLimit): Promise<OrderRecord[]> {
    return this.orders.list(undefined, limit);
  }

  async analytics(filter: OrderListFilter): Promise<OrderAnalytics> {
    const orders = await this.orders.list(filter.userId);
    const statusCounts: Record<string, number> = {};
    let totalRevenue = 0;
    for (const order of orders) {
      totalRevenue += order.totalAmount;
      statusCounts[order.status] = (statusCounts[order.status] || 0) + 1;
    }
    return {
      totalOrders: orders.length,
      totalRevenue: Math.round(totalRevenue * 100) / 100,
      statusCounts,
    };
  }

  counter(): Promise<OrderCounterSnapshot> {
    return this.allocator.peek();
  }

  private async submitOnce(ownerId: string, input: CreateOrderRequest): Promise<SubmitOrderResponse> {
    const { orderId, orderNumber } = await this.store.runTransaction(async (tx) => {
      const next = await this.allocator.allocateNext(tx);
      const id = formatOrderId(next);
      if (await this.orders.existsInTransaction(tx, id)) {
        throw new ConflictError(`Order ${id} already exists`);
      }
      this.orders.insertInTransaction(tx, { ...this.buildOrder(ownerId, id, input), orderNumber: next });
      return { orderId: id, orderNumber: next };
    });

    this.logger.log(`Order ${orderId} submitted for ${ownerId}`);
    try {
      await this.notifications.alertAdminsNewOrder(orderId, input.totalAmount);
    } catch (error) {
      this.logger.warn(`New order alert for ${orderId} failed: ${String(error)}`);
    }
    return { success: true, orderId, orderNumber };
  }

  private async notifyStatusChange(order: OrderRecord, status: string): Promise<void> {
    try {
      await this.notifications.notify(order.userId, order.orderId, status, ORDER_UPDATE_TITLE, statusMessage(status));
    } catch (error) {
      this.logger.warn(`Status notification for ${order.orderId} failed: ${String(error)}`);
    }
  }

  private async loadAccessible(orderId: string, requester: Principal): Promise<OrderRecord> {
    const order = await this.orders.findById(orderId);
    // Orders owned by someone else look exactly like missing ones.
    if (!order || (requester.kind !== "admin" && order.userId !== requester.id)) {
      throw new NotFoundError("Order not found");
    }
    return order;
  }

  private buildOrder(ownerId: string, orderId: string, input: CreateOrderRequest): OrderRecord {
    const now = Date.now();
    const nowIso = new Date(now).toISOString();
    return {
      id: orderId,
      orderId,
      userId: ownerId,
      items: normalizeItems(input.items),
      totalAmount: input.totalAmount,
      deliveryLocation: input.deliveryLocation.trim(),
      status: "PENDING",
      timestamp: now,
      createdAtIso: nowIso,
      updatedAtIso: nowIso,
    };
  }
}
