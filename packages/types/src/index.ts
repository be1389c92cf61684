export * from "./auth";
export * from "./catalog";
export * from "./order";
export * from "./realtime";
export * from "./user";
