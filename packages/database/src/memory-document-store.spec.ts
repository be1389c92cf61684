import { DocumentChange, DocumentNotFoundError, TransactionAbortedError } from "./document-store";
import { MemoryDocumentStore } from "./memory-document-store";

describe("MemoryDocumentStore", () => {
  let store: MemoryDocumentStore;

  beforeEach(() => {
    store = new MemoryDocumentStore({ baseDelayMs: 0 });
  });

  it("stores and returns copies of documents", async () => {
    await store.set("orders", "a", { status: "PENDING", items: [{ name: "tea" }] });
    const first = await store.get("orders", "a");
    expect(first?.data).toEqual({ status: "PENDING", items: [{ name: "tea" }] });

    if (first) first.data.status = "CHANGED";
    const second = await store.get("orders", "a");
    expect(second?.data.status).toBe("PENDING");
  });

  it("merges on set when asked and replaces otherwise", async () => {
    await store.set("users", "u1", { name: "Ana", fcmToken: "old" });
    await store.set("users", "u1", { fcmToken: "new" }, { merge: true });
    expect((await store.get("users", "u1"))?.data).toEqual({ name: "Ana", fcmToken: "new" });

    await store.set("users", "u1", { fcmToken: "newer" });
    expect((await store.get("users", "u1"))?.data).toEqual({ fcmToken: "newer" });
  });

  it("returns null or false for updates and deletes of missing documents", async () => {
    await expect(store.update("orders", "missing", { status: "CONFIRMED" })).resolves.toBeNull();
    await expect(store.delete("orders", "missing")).resolves.toBe(false);
  });

  it("generates twenty character ids on add", async () => {
    const id = await store.add("notifications", { read: false });
    expect(id).toHaveLength(20);
    expect((await store.get("notifications", id))?.data).toEqual({ read: false });
  });

  it("filters, orders and limits queries, skipping documents without the order field", async () => {
    await store.set("orders", "a", { userId: "u1", timestamp: 10 });
    await store.set("orders", "b", { userId: "u2", timestamp: 30 });
    await store.set("orders", "c", { userId: "u1", timestamp: 20 });
    await store.set("orders", "d", { userId: "u1" });

    const own = await store.query("orders", {
      where: [{ field: "userId", value: "u1" }],
      orderBy: { field: "timestamp", direction: "desc" },
    });
    expect(own.map((doc) => doc.id)).toEqual(["c", "a"]);

    const newest = await store.query("orders", { orderBy: { field: "timestamp", direction: "desc" }, limit: 2 });
    expect(newest.map((doc) => doc.id)).toEqual(["b", "c"]);
  });

  it("applies nothing when a transaction function throws", async () => {
    await store.set("system", "counters", { orderCounter: 3 });

    await expect(store.runTransaction(async (tx) => {
      tx.set("system", "counters", { orderCounter: 4 });
      throw new Error("order invalid");
    })).rejects.toThrow("order invalid");

    expect((await store.get("system", "counters"))?.data.orderCounter).toBe(3);
  });

  it("rejects the whole commit when a buffered update targets a missing document", async () => {
    await expect(store.runTransaction(async (tx) => {
      tx.set("orders", "x", { status: "PENDING" });
      tx.update("orders", "missing", { status: "CONFIRMED" });
    })).rejects.toBeInstanceOf(DocumentNotFoundError);

    expect(await store.get("orders", "x")).toBeNull();
  });

  it("retries when a read document changes before commit", async () => {
    await store.set("system", "counters", { orderCounter: 1 });
    let attempts = 0;

    const result = await store.runTransaction(async (tx) => {
      attempts += 1;
      const doc = await tx.get("system", "counters");
      const current = typeof doc?.data.orderCounter === "number" ? doc.data.orderCounter : 0;
      if (attempts === 1) await store.set("system", "counters", { orderCounter: 10 });
      tx.set("system", "counters", { orderCounter: current + 1 });
      return current + 1;
    });

    expect(attempts).toBe(2);
    expect(result).toBe(11);
    expect((await store.get("system", "counters"))?.data.orderCounter).toBe(11);
  });

  it("gives up after the configured number of attempts", async () => {
    const limited = new MemoryDocumentStore({ maxAttempts: 2, baseDelayMs: 0 });
    let counter = 0;

    await expect(limited.runTransaction(async (tx) => {
      await tx.get("system", "counters");
      counter += 1;
      await limited.set("system", "counters", { orderCounter: counter });
    })).rejects.toBeInstanceOf(TransactionAbortedError);
    expect(counter).toBe(2);
  });

  it("reports the initial window as added and later changes relative to it", async () => {
    await store.set("orders", "a", { timestamp: 1, status: "PENDING" });
    const deliveries: DocumentChange[][] = [];

    const unsubscribe = store.subscribe(
      "orders",
      { orderBy: { field: "timestamp", direction: "desc" }, limit: 2 },
      (changes) => deliveries.push(changes),
    );

    await store.set("orders", "b", { timestamp: 2, status: "PENDING" });
    await store.update("orders", "a", { status: "CONFIRMED" });
    await store.delete("orders", "b");

    expect(deliveries.map((changes) => changes.map((change) => `${change.type}:${change.doc.id}`))).toEqual([
      ["added:a"],
      ["added:b"],
      ["modified:a"],
      ["removed:b"],
    ]);

    expect(store.subscriptionCount()).toBe(1);
    unsubscribe();
    expect(store.subscriptionCount()).toBe(0);
  });

  it("routes listener failures to the error callback", async () => {
    const errors: string[] = [];
    store.subscribe(
      "orders",
      {},
      () => {
        throw new Error("listener broke");
      },
      (error) => errors.push(error.message),
    );

    await store.set("orders", "a", { status: "PENDING" });
    expect(errors).toEqual(["listener broke"]);
  });
});
