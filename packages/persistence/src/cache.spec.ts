import { MemoryCache, NamespacedCache } from "./cache";

describe("MemoryCache", () => {
  it("expires values after their ttl", async () => {
    let clock = 1_000;
    const cache = new MemoryCache(() => clock);

    await cache.set("k", "v", 5);
    expect(await cache.get("k")).toBe("v");

    clock = 6_000;
    expect(await cache.get("k")).toBeNull();
    expect(cache.size).toBe(0);
  });
});

describe("NamespacedCache without redis", () => {
  it("keeps values in memory until closed", async () => {
    const cache = new NamespacedCache({ namespace: "orders" });

    await cache.set("a", "1", 60);
    expect(await cache.get("a")).toBe("1");
    expect(await cache.get("b")).toBeNull();

    await cache.close();
    expect(await cache.get("a")).toBeNull();
  });
});
