import { describe, it, expect, afterEach } from "vitest";
import fs from "node:fs";
import path from "node:path";
import {
  AUTHOR_FILE,
  parseManifest,
  parseModJson,
  readAuthor,
  readManifest,
  readModJson,
  serializeModJson,
  splitExtra,
  writeModJson,
} from "../../src/lib/manifest.js";
import { MissingFileError, ParseError } from "../../src/lib/errors.js";
import { createTmpDir, manifestJson, writeFile } from "../helpers.js";

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

// ── parseManifest ──

describe("parseManifest", () => {
  it("parses a package manifest", () => {
    const result = parseManifest(
      manifestJson({ name: "Server_Utilities", dependencies: ["northstar-Northstar-1.9.0"] }),
    );
    expect(result).toEqual({
      name: "Server_Utilities",
      version_number: "1.0.0",
      website_url: "",
      description: "A test package",
      dependencies: ["northstar-Northstar-1.9.0"],
    });
  });

  it("fills defaults for optional fields", () => {
    const result = parseManifest(JSON.stringify({ name: "Foo", version_number: "0.1.0" }));
    expect(result.website_url).toBe("");
    expect(result.description).toBe("");
    expect(result.dependencies).toEqual([]);
  });

  it("throws ParseError on malformed JSON", () => {
    expect(() => parseManifest("{ name: ")).toThrow(ParseError);
  });

  it("throws ParseError naming the missing field", () => {
    expect(() => parseManifest(JSON.stringify({ name: "Foo" }), "pkg/manifest.json")).toThrow(
      /^Error parsing pkg\/manifest\.json: version_number/,
    );
  });
});

describe("readManifest", () => {
  it("returns undefined when there is no manifest", () => {
    expect(readManifest(useTmpDir())).toBeUndefined();
  });

  it("reads manifest.json from a directory", () => {
    const dir = useTmpDir();
    writeFile(dir, "manifest.json", manifestJson({ name: "Foo" }));
    expect(readManifest(dir)?.name).toBe("Foo");
  });
});

// ── mod.json ──

describe("parseModJson", () => {
  it("accepts JSON5 with comments and trailing commas", () => {
    const raw = `{
      // shown in the mod browser
      "Name": "Fifty.ServerUtils",
      "Description": "Server tools",
      "Version": "2.1.3",
      "LoadPriority": 2,
    }`;
    expect(parseModJson(raw)).toEqual({
      name: "Fifty.ServerUtils",
      description: "Server tools",
      version: "2.1.3",
      loadPriority: 2,
      extra: {},
    });
  });

  it("keeps unknown keys in extra", () => {
    const mod = parseModJson(
      JSON.stringify({ Name: "Foo", Scripts: [{ Path: "foo.nut" }], RequiredOnClient: false }),
    );
    expect(mod.extra).toEqual({ Scripts: [{ Path: "foo.nut" }], RequiredOnClient: false });
    expect(mod.description).toBe("");
    expect(mod.version).toBe("");
    expect(mod.loadPriority).toBeUndefined();
  });

  it("rejects a descriptor without a name", () => {
    expect(() => parseModJson(JSON.stringify({ Version: "1.0.0" }))).toThrow(ParseError);
    expect(() => parseModJson(JSON.stringify({ Name: "" }))).toThrow(ParseError);
  });

  it("rejects unparsable input", () => {
    expect(() => parseModJson("not json at all")).toThrow(ParseError);
  });
});

describe("readModJson / writeModJson", () => {
  it("throws MissingFileError for an absent file", () => {
    const file = path.join(useTmpDir(), "mod.json");
    expect(() => readModJson(file)).toThrow(MissingFileError);
  });

  it("writes known keys first and preserves extras", () => {
    const file = path.join(useTmpDir(), "mod.json");
    const mod = parseModJson(
      JSON.stringify({ ConVars: [], Name: "Foo", Version: "1.0.0", LoadPriority: 1 }),
    );
    writeModJson(file, mod);

    expect(Object.keys(JSON.parse(fs.readFileSync(file, "utf-8")))).toEqual([
      "Name",
      "Description",
      "Version",
      "LoadPriority",
      "ConVars",
    ]);
    expect(readModJson(file)).toEqual(mod);
  });

  it("ends serialized output with a newline", () => {
    const out = serializeModJson({ name: "A", description: "", version: "", extra: {} });
    expect(out).toBe('{\n  "Name": "A",\n  "Description": "",\n  "Version": ""\n}\n');
  });
});

// ── helpers ──

describe("splitExtra", () => {
  it("returns keys outside the known set in order", () => {
    expect(splitExtra({ a: 1, b: 2, c: 3 }, new Set(["b"]))).toEqual({ a: 1, c: 3 });
  });
});

describe("readAuthor", () => {
  it("reads and trims the author file", () => {
    const dir = useTmpDir();
    writeFile(dir, AUTHOR_FILE, "Fifty\n");
    expect(readAuthor(dir)).toBe("Fifty");
  });

  it("returns undefined when absent", () => {
    expect(readAuthor(useTmpDir())).toBeUndefined();
  });
});
