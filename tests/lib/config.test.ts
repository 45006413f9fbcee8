import { describe, it, expect, afterEach, beforeEach } from "vitest";
import fs from "node:fs";
import path from "node:path";
import {
  DEFAULT_CATALOG_URL,
  getCacheDir,
  getCatalogTTL,
  getCatalogUrl,
  getConfigPath,
  getConfigValue,
  getIndexPath,
  getModsDir,
  isConfigKey,
  readConfig,
  setConfigValue,
} from "../../src/lib/config.js";
import { ParseError } from "../../src/lib/errors.js";
import { createTmpDir, writeFile } from "../helpers.js";

let home: string;
const previousHome = process.env["MODKEEP_HOME"];

beforeEach(() => {
  home = createTmpDir();
  process.env["MODKEEP_HOME"] = home;
});

afterEach(() => {
  fs.rmSync(home, { recursive: true, force: true });
  if (previousHome === undefined) {
    delete process.env["MODKEEP_HOME"];
  } else {
    process.env["MODKEEP_HOME"] = previousHome;
  }
});

describe("config defaults", () => {
  it("uses built-in values when no file exists", () => {
    expect(readConfig()).toEqual({});
    expect(getConfigPath()).toBe(path.join(home, "config"));
    expect(getIndexPath()).toBe(path.join(home, "index.yaml"));
    expect(getCacheDir()).toBe(path.join(home, "cache"));
    expect(getModsDir()).toBe(path.resolve("mods"));
    expect(getCatalogUrl()).toBe(DEFAULT_CATALOG_URL);
    expect(getCatalogTTL()).toBe(3600);
  });
});

describe("config file", () => {
  it("reads paths and catalog settings", () => {
    writeFile(
      home,
      "config",
      "paths:\n  mods: /games/profile/mods\n  cache: /var/cache/modkeep\ncatalog:\n  url: https://example.test/api/\n  ttl: 60\n",
    );
    expect(getModsDir()).toBe(path.resolve("/games/profile/mods"));
    expect(getCacheDir()).toBe("/var/cache/modkeep");
    expect(getCatalogUrl()).toBe("https://example.test/api/");
    expect(getCatalogTTL()).toBe(60);
  });

  it("throws ParseError for invalid values", () => {
    writeFile(home, "config", "catalog:\n  ttl: soon\n");
    expect(() => readConfig()).toThrow(ParseError);
  });

  it("throws ParseError for malformed YAML", () => {
    writeFile(home, "config", "paths: [unclosed\n");
    expect(() => readConfig()).toThrow(ParseError);
  });
});

describe("setConfigValue", () => {
  it("writes values that getConfigValue reads back", () => {
    setConfigValue("paths.game", "/games/Titanfall2");
    setConfigValue("catalog.ttl", "120");
    expect(getConfigValue("paths.game")).toBe("/games/Titanfall2");
    expect(getConfigValue("catalog.ttl")).toBe(120);
    expect(readConfig()).toEqual({ paths: { game: "/games/Titanfall2" }, catalog: { ttl: 120 } });
  });

  it("rejects a ttl that isn't a non-negative number", () => {
    expect(() => setConfigValue("catalog.ttl", "-5")).toThrow(ParseError);
    expect(() => setConfigValue("catalog.ttl", "later")).toThrow(ParseError);
    expect(fs.existsSync(getConfigPath())).toBe(false);
  });

  it("recognises settable keys", () => {
    expect(isConfigKey("paths.mods")).toBe(true);
    expect(isConfigKey("paths.unknown")).toBe(false);
  });
});
