import { describe, it, expect, afterEach } from "vitest";
import fs from "node:fs";
import path from "node:path";
import {
  enclosedPath,
  extractArchive,
  extractPrefixed,
  openArchive,
  withScratchDir,
  withScratchDirSync,
} from "../../src/lib/archive.js";
import { ArchiveError } from "../../src/lib/errors.js";
import { createTmpDir, listDir, makeZip } from "../helpers.js";

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
});

// ── openArchive ──

describe("openArchive", () => {
  it("lists file and directory entries", () => {
    const entries = openArchive(makeZip({ "mods/": "", "mods/a.txt": "hello" }));
    const byName = new Map(entries.map((e) => [e.name, e]));
    expect(byName.get("mods/")?.isDirectory).toBe(true);
    expect(byName.get("mods/a.txt")?.isDirectory).toBe(false);
    expect(byName.get("mods/a.txt")?.getData().toString("utf-8")).toBe("hello");
  });

  it("throws ArchiveError for bytes that aren't a zip", () => {
    expect(() => openArchive(Buffer.from("definitely not a zip file"))).toThrow(ArchiveError);
  });
});

// ── enclosedPath ──

describe("enclosedPath", () => {
  const root = path.resolve("/tmp/extract-root");

  it("resolves names inside the root", () => {
    expect(enclosedPath(root, "mods/a.txt")).toBe(path.join(root, "mods", "a.txt"));
  });

  it("allows parent segments that stay inside the root", () => {
    expect(enclosedPath(root, "mods/../b.txt")).toBe(path.join(root, "b.txt"));
  });

  it.each(["../evil.txt", "mods/../../evil.txt", "/etc/passwd", "", "./"])(
    "rejects %j",
    (name) => {
      expect(enclosedPath(root, name)).toBeUndefined();
    },
  );
});

// ── extractArchive ──

describe("extractArchive", () => {
  it("writes files and directories", () => {
    const dest = useTmpDir();
    const summary = extractArchive(
      makeZip({ "empty/": "", "mods/Foo/mod.json": "{}", "README.md": "# hi" }),
      dest,
    );
    expect(fs.statSync(path.join(dest, "empty")).isDirectory()).toBe(true);
    expect(fs.readFileSync(path.join(dest, "mods/Foo/mod.json"), "utf-8")).toBe("{}");
    expect(fs.readFileSync(path.join(dest, "README.md"), "utf-8")).toBe("# hi");
    expect(summary.skipped).toEqual([]);
    expect(summary.written).toHaveLength(3);
  });

  it("overwrites existing files", () => {
    const dest = useTmpDir();
    fs.writeFileSync(path.join(dest, "a.txt"), "old");
    extractArchive(makeZip({ "a.txt": "new" }), dest);
    expect(fs.readFileSync(path.join(dest, "a.txt"), "utf-8")).toBe("new");
  });

  it("skips hidden entries without failing", () => {
    const dest = useTmpDir();
    const summary = extractArchive(
      makeZip({ ".git/config": "x", ".hidden": "x", "keep.txt": "kept" }),
      dest,
    );
    expect(listDir(dest)).toEqual(["keep.txt"]);
    expect(summary.skipped.sort()).toEqual([".git/config", ".hidden"]);
  });

  it("never writes outside the destination", () => {
    const parent = useTmpDir();
    const dest = path.join(parent, "out");
    fs.mkdirSync(dest);
    extractArchive(makeZip({ "../evil.txt": "x", "good.txt": "ok" }), dest);
    expect(fs.existsSync(path.join(parent, "evil.txt"))).toBe(false);
    expect(fs.readFileSync(path.join(dest, "good.txt"), "utf-8")).toBe("ok");
  });

  it("fails on a corrupt container", () => {
    const dest = useTmpDir();
    expect(() => extractArchive(Buffer.from("PK garbage"), dest)).toThrow(ArchiveError);
  });
});

// ── extractPrefixed ──

describe("extractPrefixed", () => {
  it("extracts only entries under the prefix, with the prefix removed", () => {
    const dest = useTmpDir();
    extractPrefixed(
      makeZip({
        "Northstar/": "",
        "Northstar/NorthstarLauncher.exe": "bin",
        "Northstar/R2Northstar/mods/Core/mod.json": "{}",
        "icon.png": "png",
      }),
      "Northstar",
      dest,
    );
    expect(listDir(dest)).toEqual(["NorthstarLauncher.exe", "R2Northstar"]);
    expect(fs.readFileSync(path.join(dest, "R2Northstar/mods/Core/mod.json"), "utf-8")).toBe("{}");
  });
});

// ── scratch directories ──

describe("withScratchDir", () => {
  it("removes the directory after success", async () => {
    const parent = useTmpDir();
    let seen = "";
    const result = await withScratchDir(parent, async (dir) => {
      seen = dir;
      fs.writeFileSync(path.join(dir, "x"), "1");
      return 42;
    });
    expect(result).toBe(42);
    expect(path.basename(seen).startsWith(".modkeep-")).toBe(true);
    expect(fs.existsSync(seen)).toBe(false);
  });

  it("removes the directory after failure and rethrows", async () => {
    const parent = useTmpDir();
    let seen = "";
    await expect(
      withScratchDir(parent, async (dir) => {
        seen = dir;
        throw new Error("boom");
      }),
    ).rejects.toThrow("boom");
    expect(fs.existsSync(seen)).toBe(false);
  });

  it("gives nested callers distinct directories", () => {
    const parent = useTmpDir();
    const dirs = withScratchDirSync(parent, (a) => withScratchDirSync(parent, (b) => [a, b]));
    expect(dirs[0]).not.toBe(dirs[1]);
    expect(listDir(parent)).toEqual([]);
  });
});
