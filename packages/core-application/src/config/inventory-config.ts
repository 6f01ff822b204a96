import os from "node:os";
import path from "node:path";
import { z } from "zod";

import type { TopicRule } from "@file-inventory/core-domain";
import { InvalidConfigError } from "../application/errors";

export const DEFAULT_TOPIC_RULES: TopicRule[] = [
  { name: "PET", requiredKeywords: ["pet"], optionalAnyOf: ["scan", "imaging", "tracer"] },
  { name: "DID", requiredKeywords: ["did"], optionalAnyOf: ["dementia", "cognitive", "decline"] },
  { name: "AD", requiredKeywords: ["alzheimer"], optionalAnyOf: ["disease", "dementia", "ad"] },
];

export const DEFAULT_EXCLUDED_DIR_NAMES = [
  ".git",
  ".svn",
  ".hg",
  "__pycache__",
  ".cache",
  ".ipynb_checkpoints",
];

const LOG_LEVELS = ["fatal", "error", "warn", "info", "debug", "trace", "silent"] as const;

function defaultRecentFoldersFile(env: NodeJS.ProcessEnv): string {
  const base = env.LOCALAPPDATA || os.homedir();
  return path.join(base, "FileInventory", "recent_folders.txt");
}

const topicRuleSchema = z.object({
  name: z.string().min(1),
  requiredKeywords: z.array(z.string().min(1)),
  optionalAnyOf: z.array(z.string().min(1)).default([]),
});

const configSchema = z.object({
  inventoryFileName: z
    .string()
    .min(1)
    .refine((name) => path.basename(name) === name, "must be a file name, not a path"),
  maxBackups: z.coerce.number().int().min(1),
  excludedDirNames: z.array(z.string().min(1)),
  tempFilePrefixes: z.array(z.string().min(1)),
  topicRules: z.array(topicRuleSchema),
  recentFoldersFile: z.string().min(1),
  maxRecentFolders: z.coerce.number().int().min(1),
  logLevel: z.enum(LOG_LEVELS),
});

export type InventoryConfig = z.infer<typeof configSchema>;
export type LogLevel = InventoryConfig["logLevel"];

/**
 * Build the effective configuration: defaults, then environment, then explicit
 * overrides. Throws {@link InvalidConfigError} when the result does not
 * validate.
 */
export function loadInventoryConfig(
  overrides: Partial<InventoryConfig> = {},
  env: NodeJS.ProcessEnv = process.env
): InventoryConfig {
  const candidate = {
    inventoryFileName: overrides.inventoryFileName ?? "inventory.xlsx",
    maxBackups: overrides.maxBackups ?? env.INVENTORY_MAX_BACKUPS ?? 5,
    excludedDirNames: overrides.excludedDirNames ?? DEFAULT_EXCLUDED_DIR_NAMES,
    tempFilePrefixes: overrides.tempFilePrefixes ?? ["~$"],
    topicRules: overrides.topicRules ?? DEFAULT_TOPIC_RULES,
    recentFoldersFile:
      overrides.recentFoldersFile ?? env.INVENTORY_RECENT_FOLDERS_FILE ?? defaultRecentFoldersFile(env),
    maxRecentFolders: overrides.maxRecentFolders ?? 15,
    logLevel: overrides.logLevel ?? env.LOG_LEVEL ?? (env.DEBUG ? "debug" : "info"),
  };

  const parsed = configSchema.safeParse(candidate);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`);
    throw new InvalidConfigError(`Invalid inventory configuration: ${issues.join("; ")}`, issues);
  }
  return parsed.data;
}
