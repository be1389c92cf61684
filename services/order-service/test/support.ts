import { DocumentStore, MemoryDocumentStore } from "@orderdesk/database";
import { IdentityClaims, PushMessage } from "@orderdesk/types";
import { Test, TestingModule } from "@nestjs/testing";
import { AppModule } from "../src/app.module";
import { DOCUMENT_STORE, IDENTITY_VERIFIER, PUSH_SENDER, SERVICE_ENV } from "../src/common/tokens";
import { OrderServiceEnv } from "../src/config/env";
import { IdentityVerifier } from "../src/modules/auth/identity-verifier";
import { hashPassword } from "../src/modules/auth/password";
import { PushSender } from "../src/modules/notifications/push-sender";

export class FakePushSender implements PushSender {
  readonly sent: PushMessage[] = [];
  failure?: Error;

  async send(message: PushMessage): Promise<string> {
    if (this.failure) throw this.failure;
    this.sent.push(message);
    return `fake-${this.sent.length}`;
  }
}

/** Accepts `user:<id>` tokens. */
export class FakeIdentityVerifier implements IdentityVerifier {
  async verify(token: string): Promise<IdentityClaims | null> {
    return token.startsWith("user:") && token.length > "user:".length ? { sub: token.slice("user:".length) } : null;
  }
}

export function testEnv(overrides: Partial<OrderServiceEnv> = {}): OrderServiceEnv {
  return {
    port: 0,
    jwtSecret: "test-secret",
    categoryCacheTtlSeconds: 300,
    liveFeedWindow: 50,
    liveFeedHeartbeatMs: 30_000,
    recentOrdersLimit: 10,
    submitIdempotencyTtlSeconds: 900,
    exposeErrorDetails: false,
    appEnv: "test",
    ...overrides,
  };
}

export interface TestContext {
  module: TestingModule;
  store: MemoryDocumentStore;
  push: FakePushSender;
  env: OrderServiceEnv;
}

export async function createTestContext(envOverrides: Partial<OrderServiceEnv> = {}): Promise<TestContext> {
  const store = new MemoryDocumentStore({ baseDelayMs: 0 });
  const push = new FakePushSender();
  const env = testEnv(envOverrides);

  const module = await Test.createTestingModule({ imports: [AppModule] })
    .overrideProvider(SERVICE_ENV).useValue(env)
    .overrideProvider(DOCUMENT_STORE).useValue(store)
    .overrideProvider(PUSH_SENDER).useValue(push)
    .overrideProvider(IDENTITY_VERIFIER).useValue(new FakeIdentityVerifier())
    .compile();

  return { module, store, push, env };
}

export interface SeedAdmin {
  id: string;
  email: string;
  password?: string;
  name?: string;
  fcmToken?: string;
}

export async function seedAdmin(store: DocumentStore, admin: SeedAdmin): Promise<void> {
  await store.set("admins", admin.id, {
    email: admin.email,
    name: admin.name || "Test Admin",
    passwordHash: hashPassword(admin.password || "test-password", "test-salt"),
    createdAtIso: "2026-01-01T00:00:00.000Z",
    ...(admin.fcmToken ? { fcmToken: admin.fcmToken } : {}),
  });
}

export const pizzaOrder = {
  items: [{ productId: "p1", name: "Pizza", quantity: 2, price: 9.5 }],
  totalAmount: 19.0,
  deliveryLocation: "12 Test Street",
};
