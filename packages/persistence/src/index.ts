export * from "./cache";
export * from "./idempotency";
