import fs from "node:fs/promises";
import path from "node:path";

import fse from "fs-extra";
import { z } from "zod";

import { currentPointerPath, latestLinkPath, latestPointerPath } from "../core/paths.js";
import { readJsonFileOrNull, writeJsonFileAtomic } from "../core/utils.js";

export const SessionPointerSchema = z.object({
  session_id: z.string(),
  session_dir: z.string(),
  started_at: z.string(),
  finished_at: z.string().optional(),
  return_code: z.number().int().optional(),
});

export type SessionPointer = z.infer<typeof SessionPointerSchema>;

// "current" references the session in flight; "latest" the last one that finished.
export interface SessionPointerStore {
  setCurrent(pointer: SessionPointer): Promise<void>;
  clearCurrent(): Promise<void>;
  readCurrent(): Promise<SessionPointer | null>;
  setLatest(pointer: SessionPointer): Promise<void>;
  readLatest(): Promise<SessionPointer | null>;
}

function parsePointer(raw: unknown): SessionPointer | null {
  const parsed = SessionPointerSchema.safeParse(raw);
  return parsed.success ? parsed.data : null;
}

export class FileSessionPointerStore implements SessionPointerStore {
  constructor(
    public readonly logRoot: string,
    private readonly warn: (message: string) => void = (message) => console.warn(message),
  ) {}

  async setCurrent(pointer: SessionPointer): Promise<void> {
    await writeJsonFileAtomic(currentPointerPath(this.logRoot), pointer);
  }

  async clearCurrent(): Promise<void> {
    await fse.remove(currentPointerPath(this.logRoot));
  }

  async readCurrent(): Promise<SessionPointer | null> {
    return parsePointer(await readJsonFileOrNull(currentPointerPath(this.logRoot)));
  }

  async setLatest(pointer: SessionPointer): Promise<void> {
    await writeJsonFileAtomic(latestPointerPath(this.logRoot), pointer);
    await this.relinkLatest(pointer.session_dir);
  }

  async readLatest(): Promise<SessionPointer | null> {
    return parsePointer(await readJsonFileOrNull(latestPointerPath(this.logRoot)));
  }

  // The symlink is a convenience; latest.json is authoritative.
  private async relinkLatest(target: string): Promise<void> {
    const link = latestLinkPath(this.logRoot);
    try {
      await fse.remove(link);
      await fs.symlink(path.relative(this.logRoot, target) || ".", link);
    } catch (error) {
      const detail = error instanceof Error ? error.message : String(error);
      this.warn(`Warning: could not update ${link}: ${detail}`);
    }
  }
}

export class MemorySessionPointerStore implements SessionPointerStore {
  current: SessionPointer | null = null;
  latest: SessionPointer | null = null;
  readonly history: string[] = [];

  async setCurrent(pointer: SessionPointer): Promise<void> {
    this.history.push(`current:${pointer.session_id}`);
    this.current = { ...pointer };
  }

  async clearCurrent(): Promise<void> {
    this.history.push("current:cleared");
    this.current = null;
  }

  async readCurrent(): Promise<SessionPointer | null> {
    return this.current;
  }

  async setLatest(pointer: SessionPointer): Promise<void> {
    this.history.push(`latest:${pointer.session_id}`);
    this.latest = { ...pointer };
  }

  async readLatest(): Promise<SessionPointer | null> {
    return this.latest;
  }
}
