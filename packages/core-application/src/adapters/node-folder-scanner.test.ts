import fs from "node:fs/promises";
import path from "node:path";
import { afterAll, beforeAll, describe, expect, it } from "vitest";

import { DEFAULT_EXCLUDED_DIR_NAMES, DEFAULT_TOPIC_RULES } from "../config/inventory-config";
import type { ScanRequest } from "../ports/folder-scanner";
import { makeTempDir, silentLogger, writeDocx } from "../testing/fixtures";
import { NodeFolderScanner } from "./node-folder-scanner";

describe("NodeFolderScanner", () => {
  let root: string;
  const scanner = new NodeFolderScanner(silentLogger);

  const request = (overrides: Partial<ScanRequest> = {}): ScanRequest => ({
    rootFolder: root,
    outputFilePath: path.join(root, "inventory.xlsx"),
    excludedDirNames: DEFAULT_EXCLUDED_DIR_NAMES,
    tempFilePrefixes: ["~$"],
    topicRules: DEFAULT_TOPIC_RULES,
    ...overrides,
  });

  beforeAll(async () => {
    root = await makeTempDir("scanner");
    await fs.mkdir(path.join(root, "sub", "deeper"), { recursive: true });
    await fs.mkdir(path.join(root, ".git"));
    await fs.mkdir(path.join(root, "__pycache__"));

    await fs.writeFile(path.join(root, "a.txt"), "hello\nworld\nthird");
    await fs.writeFile(path.join(root, "data.CSV"), "x,y\n1,2\n");
    await fs.writeFile(path.join(root, "~$lock.docx"), "owner");
    await fs.writeFile(path.join(root, "inventory.xlsx"), "table");
    await fs.writeFile(path.join(root, "inventory.xlsx.bak"), "table");
    await fs.writeFile(path.join(root, "inventory.xlsx.bak.20240101_000000"), "table");
    await fs.writeFile(path.join(root, "inventory.xlsx_temp.xlsx"), "table");
    await fs.writeFile(path.join(root, ".git", "config"), "[core]");
    await fs.writeFile(path.join(root, "__pycache__", "m.pyc"), "bytes");
    await fs.writeFile(path.join(root, "sub", "b.md"), "# B");
    await fs.writeFile(path.join(root, "sub", "Inventory.XLSX"), "other table");
    await writeDocx(path.join(root, "sub", "deeper", "paper.docx"), ["PET tracer uptake"]);
  });

  afterAll(async () => {
    await fs.rm(root, { recursive: true, force: true });
  });

  it("lists files before subdirectories and skips housekeeping entries", async () => {
    const result = await scanner.scan(request());
    if (!result.ok) throw new Error(result.message);

    expect(result.records.map((r) => path.relative(root, r.fullPath))).toEqual([
      "a.txt",
      "data.CSV",
      path.join("sub", "b.md"),
      path.join("sub", "deeper", "paper.docx"),
    ]);
    expect(result.warnings).toEqual([]);
  });

  it("builds fresh records from file metadata and content", async () => {
    const result = await scanner.scan(request());
    if (!result.ok) throw new Error(result.message);

    const stat = await fs.stat(path.join(root, "a.txt"));
    const [a, csv, , docx] = result.records;

    expect(a).toEqual({
      folderPath: root,
      fileName: "a.txt",
      extension: ".txt",
      sizeBytes: 17,
      lastModified: stat.mtime.toISOString(),
      fullPath: path.join(root, "a.txt"),
      contentHint: "First 2 lines: hello world...",
      topics: [],
      status: "Added",
      manualNotes: "",
    });
    expect(csv?.extension).toBe(".csv");
    expect(csv?.contentHint).toBe("Spreadsheet file.");
    expect(docx?.folderPath).toBe(path.join(root, "sub", "deeper"));
    expect(docx?.topics).toEqual(["PET"]);
  });

  it("lists the output file's companions when the table lives elsewhere", async () => {
    const elsewhere = path.join(root, "sub", "inventory.xlsx");
    const result = await scanner.scan(request({ outputFilePath: elsewhere }));
    if (!result.ok) throw new Error(result.message);

    const names = result.records.map((r) => r.fileName);
    expect(names).toContain("inventory.xlsx.bak");
    expect(names).not.toContain("inventory.xlsx");
    expect(names).not.toContain("Inventory.XLSX");
  });

  it("reports a missing root folder", async () => {
    const result = await scanner.scan(request({ rootFolder: path.join(root, "nope") }));
    expect(result).toEqual({
      ok: false,
      kind: "FolderNotFound",
      message: `Start folder '${path.join(root, "nope")}' not found.`,
    });
  });

  it("reports a file given as root folder", async () => {
    const result = await scanner.scan(request({ rootFolder: path.join(root, "a.txt") }));
    expect(result.ok).toBe(false);
  });
});

describe("NodeFolderScanner with links and unreadable entries", () => {
  let root: string;
  let outside: string;
  const scanner = new NodeFolderScanner(silentLogger);

  beforeAll(async () => {
    root = await makeTempDir("scanner-links");
    outside = await makeTempDir("scanner-target");
    await fs.writeFile(path.join(root, "a.txt"), "alpha");
    await fs.writeFile(path.join(outside, "target.txt"), "linked content");
    await fs.mkdir(path.join(outside, "folder"));
    await fs.symlink(path.join(outside, "target.txt"), path.join(root, "link.txt"));
    await fs.symlink(path.join(outside, "missing.txt"), path.join(root, "dangling.txt"));
    await fs.symlink(path.join(outside, "folder"), path.join(root, "folder-link"));
  });

  afterAll(async () => {
    await fs.rm(root, { recursive: true, force: true });
    await fs.rm(outside, { recursive: true, force: true });
  });

  it("lists files reached through links and warns about broken ones", async () => {
    const result = await scanner.scan({
      rootFolder: root,
      outputFilePath: path.join(root, "inventory.xlsx"),
      excludedDirNames: DEFAULT_EXCLUDED_DIR_NAMES,
      tempFilePrefixes: ["~$"],
      topicRules: DEFAULT_TOPIC_RULES,
    });
    if (!result.ok) throw new Error(result.message);

    expect(result.records.map((r) => r.fileName)).toEqual(["a.txt", "link.txt"]);
    const link = result.records[1];
    expect(link?.fullPath).toBe(path.join(root, "link.txt"));
    expect(link?.sizeBytes).toBe(14);
    expect(link?.contentHint).toBe("First 2 lines: linked content...");

    expect(result.warnings).toHaveLength(1);
    expect(result.warnings[0]).toMatchObject({
      kind: "RecordReadFailure",
      path: path.join(root, "dangling.txt"),
    });
  });
});
