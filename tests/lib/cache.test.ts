import { describe, it, expect, afterEach, vi } from "vitest";
import fs from "node:fs";
import path from "node:path";
import { Cache, clearCache, parseCacheName } from "../../src/lib/cache.js";
import { IoError } from "../../src/lib/errors.js";
import { createTmpDir, listDir, writeFile } from "../helpers.js";

let tmpDirs: string[] = [];

function useTmpDir(): string {
  const dir = createTmpDir();
  tmpDirs.push(dir);
  return dir;
}

afterEach(() => {
  for (const dir of tmpDirs) {
    fs.rmSync(dir, { recursive: true, force: true });
  }
  tmpDirs = [];
  vi.restoreAllMocks();
});

// ── parseCacheName ──

describe("parseCacheName", () => {
  it.each([
    ["Foo_1.0.0.zip", { name: "Foo", version: "1.0.0" }],
    ["Server_Utilities_2.1.3.zip", { name: "Server_Utilities", version: "2.1.3" }],
    ["Foo-1.2.3", { name: "Foo", version: "1.2.3" }],
  ])("parses %s", (file, expected) => {
    expect(parseCacheName(file)).toEqual(expected);
  });

  it.each(["readme.txt", "Foo.zip", "Foo_1.0.zip", "_1.0.0.zip"])("rejects %s", (file) => {
    expect(parseCacheName(file)).toBeUndefined();
  });
});

// ── Cache ──

describe("Cache", () => {
  it("creates the directory and tracks recognised files", () => {
    const dir = path.join(useTmpDir(), "cache");
    fs.mkdirSync(dir);
    writeFile(dir, "Foo_1.0.0.zip", "a");
    writeFile(dir, "notes.txt", "ignored");
    fs.mkdirSync(path.join(dir, "Bar_1.0.0.zip"));

    const cache = Cache.build(dir);
    expect(cache.entries()).toEqual([
      { name: "Foo", version: "1.0.0", path: path.join(dir, "Foo_1.0.0.zip") },
    ]);
  });

  it("creates a missing directory", () => {
    const dir = path.join(useTmpDir(), "a", "b");
    const cache = Cache.build(dir);
    expect(fs.statSync(dir).isDirectory()).toBe(true);
    expect(cache.entries()).toEqual([]);
  });

  it("check matches on name and version only", () => {
    const dir = useTmpDir();
    writeFile(dir, "Foo_1.0.0.zip", "a");
    const cache = Cache.build(dir);
    expect(cache.check("/somewhere/else/Foo_1.0.0.zip")).toBe(true);
    expect(cache.check("Foo-1.0.0")).toBe(true);
    expect(cache.check("Foo_2.0.0.zip")).toBe(false);
    expect(cache.check("garbage")).toBe(false);
  });

  it("get and pathFor agree after track", () => {
    const dir = useTmpDir();
    const cache = Cache.build(dir);
    const target = cache.pathFor("Foo", "3.0.0");
    expect(target).toBe(path.join(dir, "Foo_3.0.0.zip"));
    expect(cache.get("Foo", "3.0.0")).toBeUndefined();

    fs.writeFileSync(target, "zip");
    expect(cache.track(target)).toEqual({ name: "Foo", version: "3.0.0", path: target });
    expect(cache.get("Foo", "3.0.0")).toBe(target);
  });

  it("track ignores unrecognised names", () => {
    const cache = Cache.build(useTmpDir());
    expect(cache.track("/tmp/whatever.bin")).toBeUndefined();
    expect(cache.entries()).toEqual([]);
  });

  it("clean removes other versions of the package only", () => {
    const dir = useTmpDir();
    writeFile(dir, "Foo_1.0.0.zip", "old");
    writeFile(dir, "Foo_2.0.0.zip", "new");
    writeFile(dir, "Bar_1.0.0.zip", "other");
    const cache = Cache.build(dir);

    expect(cache.clean("Foo", "2.0.0")).toBe(true);
    expect(listDir(dir)).toEqual(["Bar_1.0.0.zip", "Foo_2.0.0.zip"]);
    expect(cache.get("Foo", "1.0.0")).toBeUndefined();
    expect(cache.clean("Foo", "2.0.0")).toBe(false);
  });

  it("clean stops with IoError and keeps the entry when deletion fails", () => {
    const dir = useTmpDir();
    writeFile(dir, "Foo_1.0.0.zip", "old");
    const cache = Cache.build(dir);
    vi.spyOn(fs, "rmSync").mockImplementationOnce(() => {
      throw Object.assign(new Error("EACCES: permission denied"), { code: "EACCES" });
    });

    expect(() => cache.clean("Foo", "2.0.0")).toThrow(IoError);
    expect(cache.get("Foo", "1.0.0")).toBe(path.join(dir, "Foo_1.0.0.zip"));
    expect(listDir(dir)).toEqual(["Foo_1.0.0.zip"]);
  });

  it("clean forgets entries whose file is already gone", () => {
    const dir = useTmpDir();
    writeFile(dir, "Foo_1.0.0.zip", "old");
    const cache = Cache.build(dir);
    fs.rmSync(path.join(dir, "Foo_1.0.0.zip"));

    expect(cache.clean("Foo", "2.0.0")).toBe(true);
    expect(cache.entries()).toEqual([]);
  });
});

// ── clearCache ──

describe("clearCache", () => {
  it("removes archives recursively and prunes empty directories", () => {
    const dir = useTmpDir();
    writeFile(dir, "Foo_1.0.0.zip", "a");
    writeFile(dir, "nested/Bar_1.0.0.zip", "b");
    writeFile(dir, "catalog.json", "[]");

    expect(clearCache(dir)).toBe(2);
    expect(listDir(dir)).toEqual(["catalog.json"]);
  });

  it("removes every file with force", () => {
    const dir = useTmpDir();
    writeFile(dir, "Foo_1.0.0.zip", "a");
    writeFile(dir, "catalog.json", "[]");
    writeFile(dir, "nested/keep.txt", "b");

    expect(clearCache(dir, true)).toBe(3);
    expect(listDir(dir)).toEqual([]);
  });
});
