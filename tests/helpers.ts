import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import AdmZip from "adm-zip";
import type { Manifest, RemotePackage } from "../src/types/index.js";

export function createTmpDir(): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), "modkeep-test-"));
}

export function writeFile(dir: string, relativePath: string, content: string): void {
  const fullPath = path.join(dir, relativePath);
  fs.mkdirSync(path.dirname(fullPath), { recursive: true });
  fs.writeFileSync(fullPath, content, "utf-8");
}

/** Builds a zip in memory. Keys ending in "/" become directory entries. */
export function makeZip(files: Record<string, string>): Buffer {
  const zip = new AdmZip();
  for (const [name, content] of Object.entries(files)) {
    if (name.endsWith("/")) {
      zip.addFile(name, Buffer.alloc(0));
    } else {
      zip.addFile(name, Buffer.from(content, "utf-8"));
    }
  }
  return zip.toBuffer();
}

export function modJson(name: string, version = "1.0.0"): string {
  return JSON.stringify({ Name: name, Description: `${name} test mod`, Version: version });
}

export function manifestJson(overrides: Partial<Manifest> = {}): string {
  const manifest: Manifest = {
    name: "TestMod",
    version_number: "1.0.0",
    website_url: "",
    description: "A test package",
    dependencies: [],
    ...overrides,
  };
  return JSON.stringify(manifest);
}

export function remotePackage(
  name: string,
  options: { author?: string; versions?: string[]; deps?: string[] } = {},
): RemotePackage {
  const author = options.author ?? "tester";
  const versionTags = options.versions ?? ["1.0.0"];
  const versions: RemotePackage["versions"] = {};
  for (const version of versionTags) {
    versions[version] = {
      name,
      fullName: `${author}-${name}-${version}`,
      version,
      url: `https://example.test/${author}/${name}/${version}.zip`,
      description: `${name} package`,
      deps: options.deps ?? [],
      fileSize: 1024,
      installed: false,
    };
  }
  return {
    name,
    author,
    fullName: `${author}-${name}`,
    latest: versionTags[0] ?? "1.0.0",
    versions,
    installed: false,
    upgradable: false,
    extra: {},
  };
}

export function listDir(dir: string): string[] {
  return fs.readdirSync(dir).sort();
}
