import fs from "node:fs";
import path from "node:path";
import JSON5 from "json5";
import { z } from "zod/v4";
import type { Manifest, ModJson } from "../types/index.js";
import { MissingFileError, ParseError, errorMessage } from "./errors.js";

export const MANIFEST_FILE = "manifest.json";
export const MOD_JSON_FILE = "mod.json";
export const AUTHOR_FILE = "thunderstore_author.txt";

const manifestSchema = z.object({
  name: z.string(),
  version_number: z.string(),
  website_url: z.string().default(""),
  description: z.string().default(""),
  dependencies: z.array(z.string()).default([]),
});

const modJsonSchema = z.looseObject({
  Name: z.string().min(1),
  Description: z.string().default(""),
  Version: z.string().default(""),
  LoadPriority: z.number().optional(),
});

const MOD_JSON_KEYS = new Set(["Name", "Description", "Version", "LoadPriority"]);

function issues(error: z.ZodError): string {
  return error.issues
    .map((i) => (i.path.length > 0 ? `${i.path.join(".")}: ${i.message}` : i.message))
    .join("; ");
}

/** Copies every key of `data` not in `known` into a side map, in order. */
export function splitExtra(
  data: Record<string, unknown>,
  known: ReadonlySet<string>,
): Record<string, unknown> {
  const extra: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(data)) {
    if (!known.has(key)) extra[key] = value;
  }
  return extra;
}

export function parseManifest(raw: string, source = MANIFEST_FILE): Manifest {
  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch (err) {
    throw new ParseError(source, errorMessage(err), err);
  }
  const result = manifestSchema.safeParse(data);
  if (!result.success) {
    throw new ParseError(source, issues(result.error));
  }
  return result.data;
}

export function readManifest(dir: string): Manifest | undefined {
  const manifestPath = path.join(dir, MANIFEST_FILE);
  if (!fs.existsSync(manifestPath)) return undefined;
  return parseManifest(fs.readFileSync(manifestPath, "utf-8"), manifestPath);
}

export function parseModJson(raw: string, source = MOD_JSON_FILE): ModJson {
  let data: unknown;
  try {
    data = JSON5.parse(raw);
  } catch (err) {
    throw new ParseError(source, errorMessage(err), err);
  }
  const result = modJsonSchema.safeParse(data);
  if (!result.success) {
    throw new ParseError(source, issues(result.error));
  }

  const { Name, Description, Version, LoadPriority } = result.data;
  return {
    name: Name,
    description: Description,
    version: Version,
    ...(LoadPriority !== undefined ? { loadPriority: LoadPriority } : {}),
    extra: splitExtra(result.data, MOD_JSON_KEYS),
  };
}

export function readModJson(file: string): ModJson {
  if (!fs.existsSync(file)) {
    throw new MissingFileError(file);
  }
  return parseModJson(fs.readFileSync(file, "utf-8"), file);
}

export function serializeModJson(mod: ModJson): string {
  const out: Record<string, unknown> = {
    Name: mod.name,
    Description: mod.description,
    Version: mod.version,
  };
  if (mod.loadPriority !== undefined) out["LoadPriority"] = mod.loadPriority;
  return `${JSON.stringify({ ...out, ...mod.extra }, null, 2)}\n`;
}

export function writeModJson(file: string, mod: ModJson): void {
  fs.writeFileSync(file, serializeModJson(mod), "utf-8");
}

export function readAuthor(dir: string): string | undefined {
  const file = path.join(dir, AUTHOR_FILE);
  if (!fs.existsSync(file)) return undefined;
  return fs.readFileSync(file, "utf-8").trim();
}
