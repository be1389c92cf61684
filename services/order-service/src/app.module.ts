import { createDocumentStore, DocumentStore } from "@orderdesk/database";
import { IdempotencyStore } from "@orderdesk/persistence";
import { Inject, Logger, Module, OnApplicationShutdown, Provider } from "@nestjs/common";
import { getOrderServiceEnv, OrderServiceEnv } from "./config/env";
import { DOCUMENT_STORE, IDENTITY_VERIFIER, PUSH_SENDER, SERVICE_ENV, SUBMIT_IDEMPOTENCY } from "./common/tokens";
import { AdminAuthController } from "./modules/auth/admin-auth.controller";
import { AdminAuthService } from "./modules/auth/admin-auth.service";
import { AdminAuthGuard, UserAuthGuard } from "./modules/auth/auth.guards";
import { JwtIdentityVerifier } from "./modules/auth/identity-verifier";
import { AdminRepository } from "./modules/auth/repository/admin.repository";
import { AdminCategoryController, CatalogController } from "./modules/catalog/catalog.controller";
import { CatalogService } from "./modules/catalog/catalog.service";
import { CatalogRepository } from "./modules/catalog/repository/catalog.repository";
import { HealthController } from "./modules/health/health.controller";
import { NotificationsController } from "./modules/notifications/notifications.controller";
import { NotificationsService } from "./modules/notifications/notifications.service";
import { decodeServiceAccount, FirebasePushSender, LoggingPushSender, PushSender } from "./modules/notifications/push-sender";
import { NotificationsRepository } from "./modules/notifications/repository/notifications.repository";
import { AdminOrderController } from "./modules/order/admin-order.controller";
import { OrderController } from "./modules/order/order.controller";
import { OrderService } from "./modules/order/order.service";
import { OrderRepository } from "./modules/order/repository/order.repository";
import { SequenceAllocator } from "./modules/order/sequence-allocator";
import { LiveFeedController } from "./modules/realtime/live-feed.controller";
import { LiveOrderFeedService } from "./modules/realtime/live-order-feed.service";
import { UsersRepository } from "./modules/users/repository/users.repository";
import { AdminUsersController, UsersController } from "./modules/users/users.controller";
import { UsersService } from "./modules/users/users.service";

const logger = new Logger("OrderServiceModule");

const infrastructure: Provider[] = [
  { provide: SERVICE_ENV, useFactory: getOrderServiceEnv },
  {
    provide: DOCUMENT_STORE,
    inject: [SERVICE_ENV],
    useFactory: (env: OrderServiceEnv): DocumentStore =>
      createDocumentStore({ connectionString: env.databaseUrl, log: (message) => logger.log(message) }),
  },
  {
    provide: IDENTITY_VERIFIER,
    inject: [SERVICE_ENV],
    useFactory: (env: OrderServiceEnv) => new JwtIdentityVerifier(env.jwtSecret),
  },
  {
    provide: PUSH_SENDER,
    inject: [SERVICE_ENV],
    useFactory: (env: OrderServiceEnv): PushSender => {
      if (!env.firebaseServiceAccountBase64) {
        logger.warn("FIREBASE_SERVICE_ACCOUNT_BASE64 is not set; push notifications are logged only");
        return new LoggingPushSender();
      }
      return new FirebasePushSender(decodeServiceAccount(env.firebaseServiceAccountBase64));
    },
  },
  {
    provide: SUBMIT_IDEMPOTENCY,
    inject: [SERVICE_ENV],
    useFactory: (env: OrderServiceEnv) => new IdempotencyStore({
      namespace: "order-service:submit",
      ttlSeconds: env.submitIdempotencyTtlSeconds,
      redisUrl: env.redisUrl,
      log: (message) => logger.log(message),
    }),
  },
];

@Module({
  controllers: [
    HealthController,
    OrderController,
    AdminOrderController,
    NotificationsController,
    UsersController,
    AdminUsersController,
    AdminAuthController,
    CatalogController,
    AdminCategoryController,
    LiveFeedController,
  ],
  providers: [
    ...infrastructure,
    AdminRepository,
    AdminAuthService,
    UserAuthGuard,
    AdminAuthGuard,
    OrderRepository,
    SequenceAllocator,
    OrderService,
    NotificationsRepository,
    NotificationsService,
    CatalogRepository,
    CatalogService,
    LiveOrderFeedService,
    UsersRepository,
    UsersService,
  ],
})
export class AppModule implements OnApplicationShutdown {
  constructor(
    @Inject(DOCUMENT_STORE) private readonly store: DocumentStore,
    @Inject(SUBMIT_IDEMPOTENCY) private readonly idempotency: IdempotencyStore,
  ) {}

  async onApplicationShutdown(): Promise<void> {
    await this.idempotency.close();
    await this.store.close();
  }
}
