import fs from "node:fs/promises";
import { z } from "zod";
import { DataFormatError } from "../../errors/index.js";
import type { ReferenceEntry } from "./types.js";

const referenceEntrySchema = z.object({
  id: z.string().trim().min(1, "id is required"),
  description: z.string().trim().min(1, "description is required")
});

const referenceListSchema = z.array(referenceEntrySchema);

export class ReferenceStore<T extends ReferenceEntry = ReferenceEntry> {
  private readonly entries: ReadonlyMap<string, T>;

  constructor(entries: Iterable<T>) {
    const byId = new Map<string, T>();
    for (const entry of entries) {
      byId.set(entry.id, Object.freeze({ ...entry }));
    }
    this.entries = byId;
  }

  static empty<T extends ReferenceEntry = ReferenceEntry>(): ReferenceStore<T> {
    return new ReferenceStore<T>([]);
  }

  get size(): number {
    return this.entries.size;
  }

  has(id: string): boolean {
    return this.entries.has(id);
  }

  get(id: string): T | null {
    return this.entries.get(id) ?? null;
  }

  list(): T[] {
    return [...this.entries.values()];
  }
}

export const parseReferenceEntries = (raw: unknown, source: string): ReferenceEntry[] => {
  const parsed = referenceListSchema.safeParse(raw);
  if (!parsed.success) {
    throw new DataFormatError(
      source,
      parsed.error.issues.map((issue) => `${issue.path.join(".") || "root"}: ${issue.message}`)
    );
  }

  const seen = new Set<string>();
  const duplicates: string[] = [];
  for (const entry of parsed.data) {
    if (seen.has(entry.id)) {
      duplicates.push(`duplicate id ${entry.id}`);
    }
    seen.add(entry.id);
  }
  if (duplicates.length > 0) {
    throw new DataFormatError(source, duplicates);
  }

  return parsed.data;
};

export const parseReferenceStore = (json: string, source = "inline"): ReferenceStore => {
  let raw: unknown;
  try {
    raw = JSON.parse(json);
  } catch (error) {
    const message = error instanceof Error ? error.message : "invalid json";
    throw new DataFormatError(source, [`not valid JSON: ${message}`], { cause: error });
  }

  return new ReferenceStore(parseReferenceEntries(raw, source));
};

export const loadReferenceStore = async (filePath: string): Promise<ReferenceStore> => {
  let content: string;
  try {
    content = await fs.readFile(filePath, "utf8");
  } catch (error) {
    const message = error instanceof Error ? error.message : "unreadable file";
    throw new DataFormatError(filePath, [`cannot read file: ${message}`], { cause: error });
  }

  return parseReferenceStore(content, filePath);
};
