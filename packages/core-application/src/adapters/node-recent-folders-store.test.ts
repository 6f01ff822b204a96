import fs from "node:fs/promises";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { makeTempDir, silentLogger } from "../testing/fixtures";
import { NodeRecentFoldersStore } from "./node-recent-folders-store";

describe("NodeRecentFoldersStore", () => {
  let dir: string;
  let listFile: string;

  beforeEach(async () => {
    dir = await makeTempDir("recent");
    listFile = path.join(dir, "state", "recent_folders.txt");
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  async function makeFolders(...names: string[]) {
    const folders = names.map((n) => path.join(dir, n));
    for (const f of folders) await fs.mkdir(f);
    return folders;
  }

  it("starts empty when no list was saved", async () => {
    const store = new NodeRecentFoldersStore(listFile, silentLogger);
    expect(await store.list()).toEqual([]);
  });

  it("moves an added folder to the front", async () => {
    const [a, b] = await makeFolders("a", "b");
    const store = new NodeRecentFoldersStore(listFile, silentLogger);

    await store.add(a);
    await store.add(b);
    await store.add(a);

    expect(await store.list()).toEqual([a, b]);
    expect(await fs.readFile(listFile, "utf-8")).toBe(`${a}\n${b}\n`);
  });

  it("ignores paths that are not directories", async () => {
    const store = new NodeRecentFoldersStore(listFile, silentLogger);
    const file = path.join(dir, "note.txt");
    await fs.writeFile(file, "x");

    await store.add(file);
    await store.add(path.join(dir, "missing"));
    await store.add("   ");

    expect(await store.list()).toEqual([]);
  });

  it("caps the list and drops duplicate lines", async () => {
    const [a, b, c] = await makeFolders("a", "b", "c");
    await fs.mkdir(path.dirname(listFile), { recursive: true });
    await fs.writeFile(listFile, `${a}\r\n${a}\n\n${b}\n${c}\n`);

    const store = new NodeRecentFoldersStore(listFile, silentLogger, 2);
    expect(await store.list()).toEqual([a, b]);
  });
});
