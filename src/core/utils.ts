import crypto, { randomUUID } from "node:crypto";
import fs from "node:fs/promises";
import path from "node:path";

import fse from "fs-extra";

export function isoNow(): string {
  return new Date().toISOString();
}

export function defaultSessionId(date: Date = new Date()): string {
  // test-YYYYMMDD_HHMMSS (local time, matches directory sorting)
  const yyyy = date.getFullYear();
  const mm = String(date.getMonth() + 1).padStart(2, "0");
  const dd = String(date.getDate()).padStart(2, "0");
  const hh = String(date.getHours()).padStart(2, "0");
  const mi = String(date.getMinutes()).padStart(2, "0");
  const ss = String(date.getSeconds()).padStart(2, "0");
  return `test-${yyyy}${mm}${dd}_${hh}${mi}${ss}`;
}

export function sha1Hex(text: string, length = 40): string {
  return crypto.createHash("sha1").update(text).digest("hex").slice(0, length);
}

// Code-unit order, independent of locale.
export function compareStrings(a: string, b: string): number {
  if (a < b) return -1;
  return a > b ? 1 : 0;
}

export function uniqueInOrder<T>(items: Iterable<T>): T[] {
  const seen = new Set<T>();
  const out: T[] = [];
  for (const item of items) {
    if (seen.has(item)) continue;
    seen.add(item);
    out.push(item);
  }
  return out;
}

export function parseList(values: string | string[] | undefined): string[] {
  if (values === undefined) return [];
  const raw = Array.isArray(values) ? values : [values];
  return uniqueInOrder(
    raw
      .flatMap((value) => value.split(","))
      .map((value) => value.trim())
      .filter(Boolean),
  );
}

export async function writeJsonFile(filePath: string, data: unknown): Promise<void> {
  await fse.ensureDir(path.dirname(filePath));
  await fse.writeFile(filePath, JSON.stringify(data, null, 2) + "\n", "utf8");
}

// Temp file + fsync + rename so readers never see a half-written document.
export async function writeJsonFileAtomic(filePath: string, data: unknown): Promise<void> {
  await fse.ensureDir(path.dirname(filePath));

  const tmpPath = `${filePath}.${randomUUID()}.tmp`;
  const handle = await fs.open(tmpPath, "w");

  try {
    await handle.writeFile(JSON.stringify(data, null, 2) + "\n", "utf8");
    await handle.sync();
    await handle.close();
    await fs.rename(tmpPath, filePath);
  } catch (err) {
    await handle.close().catch(() => undefined);
    await fse.remove(tmpPath).catch(() => undefined);
    throw err;
  }
}

export async function writeTextFile(filePath: string, content: string): Promise<void> {
  await fse.ensureDir(path.dirname(filePath));
  await fse.writeFile(filePath, content, "utf8");
}

async function readJsonFile(filePath: string): Promise<unknown> {
  const raw = await fse.readFile(filePath, "utf8");
  const parsed: unknown = JSON.parse(raw);
  return parsed;
}

export async function readJsonFileOrNull(filePath: string): Promise<unknown> {
  if (!(await fse.pathExists(filePath))) return null;
  try {
    return await readJsonFile(filePath);
  } catch {
    return null;
  }
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
