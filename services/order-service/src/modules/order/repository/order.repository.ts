import { DocumentData, DocumentStore, DocumentTransaction, StoredDocument } from "@orderdesk/database";
import { OrderLineItem, OrderRecord } from "@orderdesk/types";
import { Inject, Injectable } from "@nestjs/common";
import {
  arrayField,
  compactDocument,
  isDocumentData,
  numberField,
  stringField,
} from "../../../common/document-fields";
import { DOCUMENT_STORE } from "../../../common/tokens";
import { isOrderStatus } from "../order-status";

export const ORDERS = "orders";

export function orderToDocument(order: OrderRecord): DocumentData {
  return compactDocument({
    orderId: order.orderId,
    orderNumber: order.orderNumber,
    userId: order.userId,
    items: order.items.map((item) => ({
      productId: item.productId,
      name: item.name,
      quantity: item.quantity,
      price: item.price,
    })),
    totalAmount: order.totalAmount,
    deliveryLocation: order.deliveryLocation,
    status: order.status,
    timestamp: order.timestamp,
    createdAtIso: order.createdAtIso,
    updatedAtIso: order.updatedAtIso,
  });
}

/** Resolves null for documents that are not well-formed orders. */
export function orderFromDocument(doc: StoredDocument): OrderRecord | null {
  const userId = stringField(doc.data, "userId");
  const status = doc.data.status;
  const timestamp = numberField(doc.data, "timestamp");
  const totalAmount = numberField(doc.data, "totalAmount");
  if (!userId || !isOrderStatus(status) || timestamp === undefined || totalAmount === undefined) return null;

  const items: OrderLineItem[] = [];
  for (const raw of arrayField(doc.data, "items") || []) {
    if (!isDocumentData(raw)) continue;
    items.push({
      productId: stringField(raw, "productId") || "",
      name: stringField(raw, "name") || "",
      quantity: numberField(raw, "quantity") ?? 0,
      price: numberField(raw, "price") ?? 0,
    });
  }

  const orderNumber = numberField(doc.data, "orderNumber");
  const createdAtIso = stringField(doc.data, "createdAtIso") || new Date(timestamp).toISOString();
  return {
    id: doc.id,
    orderId: stringField(doc.data, "orderId") || doc.id,
    ...(orderNumber === undefined ? {} : { orderNumber }),
    userId,
    items,
    totalAmount,
    deliveryLocation: stringField(doc.data, "deliveryLocation") || "",
    status,
    timestamp,
    createdAtIso,
    updatedAtIso: stringField(doc.data, "updatedAtIso") || createdAtIso,
  };
}

@Injectable()
export class OrderRepository {
  constructor(@Inject(DOCUMENT_STORE) private readonly store: DocumentStore) {}

  async findById(orderId: string): Promise<OrderRecord | null> {
    const doc = await this.store.get(ORDERS, orderId);
    return doc ? orderFromDocument(doc) : null;
  }

  async existsInTransaction(tx: DocumentTransaction, orderId: string): Promise<boolean> {
    return (await tx.get(ORDERS, orderId)) !== null;
  }

  insertInTransaction(tx: DocumentTransaction, order: OrderRecord): void {
    tx.set(ORDERS, order.id, orderToDocument(order));
  }

  async update(orderId: string, patch: DocumentData): Promise<OrderRecord | null> {
    const doc = await this.store.update(ORDERS, orderId, patch);
    return doc ? orderFromDocument(doc) : null;
  }

  delete(orderId: string): Promise<boolean> {
    return this.store.delete(ORDERS, orderId);
  }

  async list(userId?: string, limit?: number): Promise<OrderRecord[]> {
    const docs = await this.store.query(ORDERS, {
      ...(userId ? { where: [{ field: "userId", value: userId }] } : {}),
      orderBy: { field: "timestamp", direction: "desc" },
      ...(limit === undefined ? {} : { limit }),
    });
    return docs.flatMap((doc) => {
      const order = orderFromDocument(doc);
      return order ? [order] : [];
    });
  }
}
