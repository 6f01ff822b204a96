import type { Clock } from "./ports/clock";
import type { Logger } from "./ports/logger";
import type { TableCodec } from "./ports/table-codec";
import { loadInventoryConfig, type InventoryConfig } from "./config/inventory-config";
import { createPinoLogger } from "./adapters/pino-logger";
import { XlsxTableCodec } from "./adapters/xlsx-table-codec";
import { NodeInventoryStore } from "./adapters/node-inventory-store";
import { NodeFolderScanner } from "./adapters/node-folder-scanner";
import { NodeRecentFoldersStore } from "./adapters/node-recent-folders-store";
import { InventoryService } from "./services/inventory-service";

export type CreateInventoryOptions = {
  config?: Partial<InventoryConfig>;
  logger?: Logger;
  codec?: TableCodec;
  clock?: Clock;
};

/** Wire the Node adapters into a ready-to-use inventory. */
export function createInventory(options: CreateInventoryOptions = {}) {
  const config = loadInventoryConfig(options.config);
  const logger = options.logger ?? createPinoLogger({ level: config.logLevel });

  const store = new NodeInventoryStore({
    codec: options.codec ?? new XlsxTableCodec(),
    logger,
    clock: options.clock,
    maxBackups: config.maxBackups,
  });
  const scanner = new NodeFolderScanner(logger);
  const service = new InventoryService({ scanner, store, logger, config, clock: options.clock });
  const recentFolders = new NodeRecentFoldersStore(config.recentFoldersFile, logger, config.maxRecentFolders);

  return { config, logger, store, scanner, service, recentFolders };
}

export type Inventory = ReturnType<typeof createInventory>;
