import { DocumentChange, DocumentStore } from "@orderdesk/database";
import { LiveFeedFrame, LiveFeedHeartbeatFrame, LiveFeedOrderFrame, LiveOrderEvent } from "@orderdesk/types";
import { Inject, Injectable, Logger } from "@nestjs/common";
import { concat, defer, interval, map, merge, Observable, of, share, startWith, switchMap } from "rxjs";
import { OrderServiceEnv } from "../../config/env";
import { DOCUMENT_STORE, SERVICE_ENV } from "../../common/tokens";
import { orderFromDocument, ORDERS } from "../order/repository/order.repository";

const HEARTBEAT: LiveFeedHeartbeatFrame = { kind: "heartbeat" };

export function toLiveOrderEvent(change: DocumentChange): LiveOrderEvent | null {
  if (change.type === "removed") return null;
  const order = orderFromDocument(change.doc);
  if (!order) return null;
  return {
    type: change.type === "added" ? "new_order" : "order_update",
    id: order.id,
    orderId: order.orderId,
    totalAmount: order.totalAmount,
    status: order.status,
    timestamp: order.timestamp,
  };
}

@Injectable()
export class LiveOrderFeedService {
  private readonly logger = new Logger(LiveOrderFeedService.name);

  constructor(
    @Inject(DOCUMENT_STORE) private readonly store: DocumentStore,
    @Inject(SERVICE_ENV) private readonly env: OrderServiceEnv,
  ) {}

  /**
   * Each subscription opens its own store listener over the most recent
   * orders and releases it on unsubscribe. A heartbeat follows every quiet
   * period of `liveFeedHeartbeatMs`.
   */
  stream(): Observable<LiveFeedFrame> {
    return defer(() => {
      const orders$ = this.orderEvents().pipe(share());
      const heartbeat$ = orders$.pipe(
        startWith(null),
        switchMap(() => interval(this.env.liveFeedHeartbeatMs).pipe(map(() => HEARTBEAT))),
      );
      const connected: LiveFeedFrame = {
        kind: "connected",
        message: "Connected to live order feed",
        connectedAtIso: new Date().toISOString(),
      };
      return concat(of(connected), merge(orders$, heartbeat$));
    });
  }

  private orderEvents(): Observable<LiveFeedOrderFrame> {
    return new Observable<LiveFeedOrderFrame>((subscriber) => {
      const unsubscribe = this.store.subscribe(
        ORDERS,
        { orderBy: { field: "timestamp", direction: "desc" }, limit: this.env.liveFeedWindow },
        (changes) => {
          for (const change of changes) {
            const event = toLiveOrderEvent(change);
            if (event) subscriber.next({ kind: "order", event });
          }
        },
        (error) => {
          this.logger.warn(`Live order listener failed: ${error.message}`);
          subscriber.error(error);
        },
      );
      return unsubscribe;
    });
  }
}
