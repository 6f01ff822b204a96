import os from "node:os";
import path from "node:path";
import { describe, expect, it } from "vitest";

import { InvalidConfigError } from "../application/errors";
import { DEFAULT_EXCLUDED_DIR_NAMES, DEFAULT_TOPIC_RULES, loadInventoryConfig } from "./inventory-config";

describe("loadInventoryConfig", () => {
  it("fills every setting from defaults", () => {
    const config = loadInventoryConfig({}, {});

    expect(config).toEqual({
      inventoryFileName: "inventory.xlsx",
      maxBackups: 5,
      excludedDirNames: DEFAULT_EXCLUDED_DIR_NAMES,
      tempFilePrefixes: ["~$"],
      topicRules: DEFAULT_TOPIC_RULES,
      recentFoldersFile: path.join(os.homedir(), "FileInventory", "recent_folders.txt"),
      maxRecentFolders: 15,
      logLevel: "info",
    });
  });

  it("reads the environment", () => {
    const config = loadInventoryConfig(
      {},
      { INVENTORY_MAX_BACKUPS: "3", LOCALAPPDATA: "/data", LOG_LEVEL: "warn" }
    );

    expect(config.maxBackups).toBe(3);
    expect(config.recentFoldersFile).toBe(path.join("/data", "FileInventory", "recent_folders.txt"));
    expect(config.logLevel).toBe("warn");
  });

  it("turns on debug logging when DEBUG is set", () => {
    expect(loadInventoryConfig({}, { DEBUG: "1" }).logLevel).toBe("debug");
  });

  it("lets explicit overrides win over the environment", () => {
    const config = loadInventoryConfig(
      { maxBackups: 2, inventoryFileName: "files.xlsx" },
      { INVENTORY_MAX_BACKUPS: "9" }
    );

    expect(config.maxBackups).toBe(2);
    expect(config.inventoryFileName).toBe("files.xlsx");
  });

  it("rejects invalid values with every issue listed", () => {
    let error: unknown;
    try {
      loadInventoryConfig({ maxBackups: 0, inventoryFileName: "sub/inventory.xlsx" }, {});
    } catch (err) {
      error = err;
    }

    expect(error).toBeInstanceOf(InvalidConfigError);
    if (!(error instanceof InvalidConfigError)) return;
    expect(error.issues).toEqual([
      "inventoryFileName: must be a file name, not a path",
      "maxBackups: Number must be greater than or equal to 1",
    ]);
  });

  it("rejects a non-numeric backup count from the environment", () => {
    expect(() => loadInventoryConfig({}, { INVENTORY_MAX_BACKUPS: "many" })).toThrow(InvalidConfigError);
  });
});
