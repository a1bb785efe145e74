export * from "./BurstStore";
export * from "./BurstStoreJson";
