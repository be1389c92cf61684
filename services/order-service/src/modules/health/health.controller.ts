import { DocumentStore } from "@orderdesk/database";
import { Controller, Get, Inject } from "@nestjs/common";
import { DOCUMENT_STORE } from "../../common/tokens";

@Controller()
export class HealthController {
  constructor(@Inject(DOCUMENT_STORE) private readonly store: DocumentStore) {}

  @Get()
  info(): { name: string; status: "running"; endpoints: Record<string, string> } {
    return {
      name: "order-service",
      status: "running",
      endpoints: {
        health: "/health",
        orders: "/orders",
        orderSubmit: "/order/submit",
        products: "/products",
        categories: "/categories",
        notifications: "/notifications",
        admin: "/admin/*",
      },
    };
  }

  @Get("health")
  health(): { service: string; ok: true; store: DocumentStore["kind"]; liveSubscriptions: number; nowIso: string } {
    return {
      service: "order-service",
      ok: true,
      store: this.store.kind,
      liveSubscriptions: this.store.subscriptionCount(),
      nowIso: new Date().toISOString(),
    };
  }
}
