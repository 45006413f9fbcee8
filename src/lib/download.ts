import fs from "node:fs";
import path from "node:path";
import { NetworkError } from "./errors.js";
import { logger } from "./logger.js";

/** Called per chunk with the chunk size, bytes so far and the expected total (0 if unknown). */
export type ProgressFn = (delta: number, downloaded: number, total: number) => void;

export async function download(url: string, onProgress?: ProgressFn): Promise<Buffer> {
  const response = await fetch(url, { headers: { "User-Agent": "modkeep-cli" } });
  if (!response.ok) {
    throw new NetworkError(url, response.status, response.statusText);
  }

  const total = Number(response.headers.get("content-length") ?? 0);
  if (!response.body) {
    return Buffer.from(await response.arrayBuffer());
  }

  const chunks: Buffer[] = [];
  let downloaded = 0;
  const reader = response.body.getReader();
  for (;;) {
    const { done, value } = await reader.read();
    if (done) break;
    chunks.push(Buffer.from(value));
    downloaded += value.byteLength;
    onProgress?.(value.byteLength, downloaded, total);
  }
  return Buffer.concat(chunks);
}

export async function downloadFile(
  url: string,
  dest: string,
  onProgress?: ProgressFn,
): Promise<string> {
  logger.debug(`Starting download from ${url}`);
  const data = await download(url, onProgress);
  fs.mkdirSync(path.dirname(dest), { recursive: true });
  fs.writeFileSync(dest, data);
  logger.debug(`Finished download to ${dest}`);
  return dest;
}
