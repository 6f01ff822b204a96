export * from "./entities/file-record";
export * from "./entities/snapshot";
export * from "./entities/change-set";
export * from "./entities/topic-rule";
export * from "./entities/inventory-columns";
