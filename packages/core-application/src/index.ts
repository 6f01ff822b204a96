// Public API of the core-application package: ports, value objects,
// services and the Node adapters behind them.

// Ports (interfaces)
export * from "./ports/clock";
export * from "./ports/logger";
export * from "./ports/folder-scanner";
export * from "./ports/inventory-store";
export * from "./ports/table-codec";
export * from "./ports/recent-folders-store";

// Errors and config
export * from "./application/errors";
export * from "./config/inventory-config";

// Value objects
export * from "./value-objects/display-row";
export * from "./value-objects/note-edit";

// Services
export * from "./services/topic-classifier";
export * from "./services/reconcile";
export * from "./services/inventory-filter";
export * from "./services/inventory-service";

// Node adapters
export * from "./adapters/content-hints";
export * from "./adapters/office-documents";
export * from "./adapters/node-folder-scanner";
export * from "./adapters/node-inventory-store";
export * from "./adapters/xlsx-table-codec";
export * from "./adapters/location-lock";
export * from "./adapters/inventory-ignore";
export * from "./adapters/inventory-paths";
export * from "./adapters/node-recent-folders-store";
export * from "./adapters/pino-logger";

export * from "./create-inventory";
