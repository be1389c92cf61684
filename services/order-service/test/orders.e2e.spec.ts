import { FastifyAdapter, NestFastifyApplication } from "@nestjs/platform-fastify";
import { configureApp } from "../src/bootstrap";
import { createTestContext, pizzaOrder, seedAdmin, TestContext } from "./support";

describe("order-service HTTP", () => {
  let ctx: TestContext;
  let app: NestFastifyApplication;

  const asUser = (id: string) => ({ authorization: `Bearer user:${id}` });
  const asAdmin = { authorization: "Bearer admin-1" };

  beforeEach(async () => {
    ctx = await createTestContext();
    await seedAdmin(ctx.store, { id: "admin-1", email: "ops@example.com" });
    app = ctx.module.createNestApplication<NestFastifyApplication>(new FastifyAdapter());
    configureApp(app, ctx.env);
    await app.init();
    await app.getHttpAdapter().getInstance().ready();
  });

  afterEach(async () => {
    await app.close();
  });

  it("reports health", async () => {
    const response = await app.inject({ method: "GET", url: "/health" });

    expect(response.statusCode).toBe(200);
    expect(response.json()).toMatchObject({ service: "order-service", ok: true, store: "memory", liveSubscriptions: 0 });
  });

  it("requires a bearer token for orders", async () => {
    const response = await app.inject({ method: "POST", url: "/order/submit", payload: { order: pizzaOrder } });

    expect(response.statusCode).toBe(401);
    expect(response.json()).toEqual({
      status: "error",
      message: "Missing bearer token",
      statusCode: 401,
      code: "AUTHENTICATION_ERROR",
    });
  });

  it("submits an order and serves it only to its owner", async () => {
    const submitted = await app.inject({ method: "POST", url: "/order/submit", headers: asUser("alice"), payload: { order: pizzaOrder } });

    expect(submitted.statusCode).toBe(200);
    expect(submitted.json()).toEqual({ success: true, orderId: "ORD1", orderNumber: 1 });

    const own = await app.inject({ method: "GET", url: "/orders/ORD1", headers: asUser("alice") });
    expect(own.statusCode).toBe(200);
    expect(own.json().order).toMatchObject({ orderId: "ORD1", userId: "alice", status: "PENDING", totalAmount: 19 });

    const foreign = await app.inject({ method: "GET", url: "/orders/ORD1", headers: asUser("bob") });
    expect(foreign.statusCode).toBe(404);
    expect(foreign.json()).toEqual({ status: "error", message: "Order not found", statusCode: 404, code: "NOT_FOUND" });
  });

  it("replays a submission retried with the same idempotency key", async () => {
    const headers = { ...asUser("alice"), "x-idempotency-key": "checkout-1" };

    const first = await app.inject({ method: "POST", url: "/order/submit", headers, payload: { order: pizzaOrder } });
    const second = await app.inject({ method: "POST", url: "/order/submit", headers, payload: { order: pizzaOrder } });

    expect(second.json()).toEqual(first.json());
    const counter = await app.inject({ method: "GET", url: "/admin/orders/counter", headers: asAdmin });
    expect(counter.json().orderCounter).toBe(1);
  });

  it("returns field paths for invalid orders", async () => {
    const response = await app.inject({
      method: "POST",
      url: "/order/submit",
      headers: asUser("alice"),
      payload: { order: { ...pizzaOrder, items: [{ productId: "p1", name: "Pizza", quantity: 2, price: 0 }] } },
    });

    expect(response.statusCode).toBe(400);
    expect(response.json()).toEqual({
      status: "error",
      message: "Item price must be greater than 0",
      statusCode: 400,
      code: "VALIDATION_ERROR",
      details: [{ field: "order.items.0.price", message: "Item price must be greater than 0" }],
    });
  });

  it("reports a missing quantity the same way over HTTP as in the service", async () => {
    const response = await app.inject({
      method: "POST",
      url: "/orders",
      headers: asUser("alice"),
      payload: { ...pizzaOrder, items: [{ productId: "p1", name: "Pizza", price: 9.5 }] },
    });

    expect(response.statusCode).toBe(400);
    expect(response.json().details).toEqual([{ field: "items.0.quantity", message: "Item quantity is required" }]);
  });

  it("rejects unknown body fields", async () => {
    const response = await app.inject({
      method: "POST",
      url: "/orders",
      headers: asUser("alice"),
      payload: { ...pizzaOrder, coupon: "FREE" },
    });

    expect(response.statusCode).toBe(400);
    expect(response.json().message).toBe("property coupon should not exist");
  });

  it("creates orders with client ids", async () => {
    const response = await app.inject({
      method: "POST",
      url: "/orders",
      headers: asUser("alice"),
      payload: { ...pizzaOrder, orderId: "mobile-1" },
    });

    expect(response.statusCode).toBe(201);
    expect(response.json()).toMatchObject({ success: true, orderId: "mobile-1", order: { userId: "alice" } });

    const again = await app.inject({
      method: "POST",
      url: "/orders",
      headers: asUser("alice"),
      payload: { ...pizzaOrder, orderId: "mobile-1" },
    });
    expect(again.statusCode).toBe(409);
  });

  it("tells signed-in users apart from strangers on admin routes", async () => {
    const user = await app.inject({ method: "GET", url: "/admin/orders", headers: asUser("alice") });
    expect(user.statusCode).toBe(403);
    expect(user.json().message).toBe("Admin access required");

    const stranger = await app.inject({ method: "GET", url: "/admin/orders", headers: { authorization: "Bearer nobody" } });
    expect(stranger.statusCode).toBe(401);
    expect(stranger.json().message).toBe("Invalid admin token");

    const stream = await app.inject({ method: "GET", url: "/admin/stream/orders" });
    expect(stream.statusCode).toBe(401);
  });

  it("signs admins in with their password", async () => {
    const login = await app.inject({
      method: "POST",
      url: "/admin/login",
      payload: { email: "ops@example.com", password: "test-password" },
    });

    expect(login.statusCode).toBe(200);
    expect(login.json()).toEqual({
      success: true,
      token: "admin-1",
      adminId: "admin-1",
      email: "ops@example.com",
      name: "Test Admin",
    });

    const wrong = await app.inject({
      method: "POST",
      url: "/admin/login",
      payload: { email: "ops@example.com", password: "guess" },
    });
    expect(wrong.statusCode).toBe(401);
  });

  it("lets admins move orders along and notifies the customer", async () => {
    await app.inject({ method: "POST", url: "/users/fcm-token", headers: asUser("alice"), payload: { token: "alice-device" } });
    await app.inject({ method: "POST", url: "/order/submit", headers: asUser("alice"), payload: { order: pizzaOrder } });

    const confirmed = await app.inject({
      method: "PUT",
      url: "/admin/orders/ORD1",
      headers: asAdmin,
      payload: { status: "CONFIRMED" },
    });
    expect(confirmed.statusCode).toBe(200);
    expect(confirmed.json()).toMatchObject({ success: true, order: { orderId: "ORD1", status: "CONFIRMED" } });
    expect(ctx.push.sent.map((message) => [message.token, message.body])).toEqual([
      ["alice-device", "✅ Your order has been confirmed!"],
    ]);

    const skipped = await app.inject({
      method: "PUT",
      url: "/admin/orders/ORD1",
      headers: asAdmin,
      payload: { status: "SHIPPED" },
    });
    expect(skipped.statusCode).toBe(400);
    expect(skipped.json().details).toEqual([{
      field: "status",
      message: "status must be one of PENDING, CONFIRMED, PREPARING, READY_FOR_PICKUP, OUT_FOR_DELIVERY, DELIVERED, CANCELLED, RETURNED",
    }]);

    const notifications = await app.inject({ method: "GET", url: "/notifications", headers: asUser("alice") });
    expect(notifications.json()).toHaveLength(1);
  });

  it("serves user profiles to their owner and to admins", async () => {
    const created = await app.inject({
      method: "POST",
      url: "/users",
      headers: asUser("alice"),
      payload: { userId: "alice", email: "alice@example.com", displayName: "Alice" },
    });
    expect(created.statusCode).toBe(201);
    expect(created.json()).toMatchObject({ success: true, user: { id: "alice", email: "alice@example.com", phoneNumbers: [] } });

    const own = await app.inject({ method: "GET", url: "/users/alice", headers: asUser("alice") });
    expect(own.statusCode).toBe(200);
    expect(own.json().user).toMatchObject({ userId: "alice", displayName: "Alice" });

    const other = await app.inject({ method: "GET", url: "/users/alice", headers: asUser("bob") });
    expect(other.statusCode).toBe(403);
    expect(other.json()).toEqual({
      status: "error",
      message: "You can only view your own profile",
      statusCode: 403,
      code: "AUTHORIZATION_ERROR",
    });

    const listed = await app.inject({ method: "GET", url: "/admin/users", headers: asAdmin });
    expect(listed.json().users.map((user: { id: string }) => user.id)).toEqual(["alice"]);

    const forbidden = await app.inject({ method: "GET", url: "/admin/users", headers: asUser("alice") });
    expect(forbidden.statusCode).toBe(403);
  });

  it("rejects a profile without an email", async () => {
    const response = await app.inject({ method: "POST", url: "/users", headers: asUser("alice"), payload: { userId: "alice" } });

    expect(response.statusCode).toBe(400);
    expect(response.json().message).toBe("userId and email required");
  });
});
