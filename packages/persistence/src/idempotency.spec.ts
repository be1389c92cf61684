import { MemoryCache } from "./cache";
import { IdempotencyStore } from "./idempotency";

const parseOrderId = (raw: unknown): { orderId: string } | null => {
  if (typeof raw !== "object" || raw === null || !("orderId" in raw)) return null;
  return typeof raw.orderId === "string" ? { orderId: raw.orderId } : null;
};

describe("IdempotencyStore", () => {
  it("replays the stored response for a repeated key", async () => {
    const store = new IdempotencyStore({ namespace: "orders", ttlSeconds: 60 });
    const handler = jest.fn(async () => ({ orderId: "ORD1" }));

    const first = await store.execute(" Key-1 ", handler, parseOrderId);
    const second = await store.execute("key-1", handler, parseOrderId);

    expect(first).toEqual({ orderId: "ORD1" });
    expect(second).toEqual({ orderId: "ORD1" });
    expect(handler).toHaveBeenCalledTimes(1);
  });

  it("shares one run between concurrent callers", async () => {
    const store = new IdempotencyStore({ namespace: "orders" });
    const handler = jest.fn(async () => ({ orderId: "ORD7" }));

    const results = await Promise.all([
      store.execute("same", handler, parseOrderId),
      store.execute("same", handler, parseOrderId),
    ]);

    expect(results).toEqual([{ orderId: "ORD7" }, { orderId: "ORD7" }]);
    expect(handler).toHaveBeenCalledTimes(1);
  });

  it("does not remember failed runs", async () => {
    const store = new IdempotencyStore({ namespace: "orders" });
    const handler = jest.fn()
      .mockRejectedValueOnce(new Error("store offline"))
      .mockResolvedValueOnce({ orderId: "ORD2" });

    await expect(store.execute("retry", handler, parseOrderId)).rejects.toThrow("store offline");
    await expect(store.execute("retry", handler, parseOrderId)).resolves.toEqual({ orderId: "ORD2" });
  });

  it("runs again once the remembered response expires", async () => {
    let clock = 0;
    const store = new IdempotencyStore({ namespace: "orders", ttlSeconds: 10, now: () => clock, cache: new MemoryCache(() => clock) });
    const handler = jest.fn()
      .mockResolvedValueOnce({ orderId: "ORD3" })
      .mockResolvedValueOnce({ orderId: "ORD4" });

    await store.execute("k", handler, parseOrderId);
    await expect(store.lookup("k", parseOrderId)).resolves.toEqual({
      response: { orderId: "ORD3" },
      storedAtIso: "1970-01-01T00:00:00.000Z",
    });

    clock = 10_000;
    await expect(store.execute("k", handler, parseOrderId)).resolves.toEqual({ orderId: "ORD4" });
  });

  it("ignores stored values the caller cannot parse", async () => {
    const cache = new MemoryCache();
    await cache.set("k", JSON.stringify({ response: { orderNumber: 5 } }), 60);
    const store = new IdempotencyStore({ namespace: "orders", cache });

    await expect(store.lookup("k", parseOrderId)).resolves.toBeNull();
  });

  it("treats a corrupt entry as a miss and overwrites it", async () => {
    const cache = new MemoryCache();
    await cache.set("k", "{not json", 60);
    const logged: string[] = [];
    const store = new IdempotencyStore({ namespace: "orders", cache, log: (message) => logged.push(message) });
    const handler = jest.fn(async () => ({ orderId: "ORD9" }));

    await expect(store.lookup("k", parseOrderId)).resolves.toBeNull();
    await expect(store.execute("k", handler, parseOrderId)).resolves.toEqual({ orderId: "ORD9" });

    expect(handler).toHaveBeenCalledTimes(1);
    expect(logged[0]).toMatch(/^ignoring unreadable idempotency entry k: SyntaxError/);
    await expect(store.lookup("k", parseOrderId)).resolves.toMatchObject({ response: { orderId: "ORD9" } });
  });
});
