import fse from "fs-extra";
import { z } from "zod";

import { readJsonFileOrNull, writeJsonFileAtomic } from "../core/utils.js";

export const TemplateRecordSchema = z.object({
  name: z.string().min(1),
  // epoch seconds
  created: z.number().nonnegative(),
});

export type TemplateRecord = z.infer<typeof TemplateRecordSchema>;

export interface TemplateRecordStore {
  read(): Promise<TemplateRecord | null>;
  write(record: TemplateRecord): Promise<void>;
  clear(): Promise<void>;
}

// ttlSeconds = 0 means the record never expires.
export function isTemplateFresh(record: TemplateRecord, nowSeconds: number, ttlSeconds: number): boolean {
  if (ttlSeconds <= 0) return true;
  return nowSeconds - record.created <= ttlSeconds;
}

export class FileTemplateRecordStore implements TemplateRecordStore {
  constructor(public readonly filePath: string) {}

  async read(): Promise<TemplateRecord | null> {
    const parsed = TemplateRecordSchema.safeParse(await readJsonFileOrNull(this.filePath));
    return parsed.success ? parsed.data : null;
  }

  async write(record: TemplateRecord): Promise<void> {
    await writeJsonFileAtomic(this.filePath, record);
  }

  async clear(): Promise<void> {
    await fse.remove(this.filePath);
  }
}

export class MemoryTemplateRecordStore implements TemplateRecordStore {
  constructor(public record: TemplateRecord | null = null) {}

  async read(): Promise<TemplateRecord | null> {
    return this.record;
  }

  async write(record: TemplateRecord): Promise<void> {
    this.record = { ...record };
  }

  async clear(): Promise<void> {
    this.record = null;
  }
}
