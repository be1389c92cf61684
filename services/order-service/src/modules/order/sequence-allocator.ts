import { DocumentStore, DocumentTransaction } from "@orderdesk/database";
import { OrderCounterSnapshot } from "@orderdesk/types";
import { Inject, Injectable } from "@nestjs/common";
import { numberField } from "../../common/document-fields";
import { DOCUMENT_STORE } from "../../common/tokens";

export const COUNTER_COLLECTION = "system";
export const COUNTER_DOCUMENT = "counters";
export const COUNTER_FIELD = "orderCounter";

export function formatOrderId(orderNumber: number): string {
  return `ORD${orderNumber}`;
}

/**
 * Issues strictly increasing order numbers from `system/counters`. The counter
 * only moves inside a transaction, so numbers are never reused or skipped by
 * a committed order.
 */
@Injectable()
export class SequenceAllocator {
  constructor(@Inject(DOCUMENT_STORE) private readonly store: DocumentStore) {}

  async allocateNext(tx: DocumentTransaction): Promise<number> {
    const counter = await tx.get(COUNTER_COLLECTION, COUNTER_DOCUMENT);
    const current = (counter && numberField(counter.data, COUNTER_FIELD)) || 0;
    const next = current + 1;
    tx.set(COUNTER_COLLECTION, COUNTER_DOCUMENT, { [COUNTER_FIELD]: next }, { merge: true });
    return next;
  }

  allocate(): Promise<number> {
    return this.store.runTransaction((tx) => this.allocateNext(tx));
  }

  /** Diagnostics only; the value may be stale by the time it is read. */
  async peek(): Promise<OrderCounterSnapshot> {
    const counter = await this.store.get(COUNTER_COLLECTION, COUNTER_DOCUMENT);
    return {
      orderCounter: (counter && numberField(counter.data, COUNTER_FIELD)) || 0,
      readAtIso: new Date().toISOString(),
    };
  }
}
