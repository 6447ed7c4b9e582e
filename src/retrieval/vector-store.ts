import { mkdir, readFile, rename, writeFile } from "fs/promises";
import { join } from "path";
import type { VectorMatch, VectorRecord, VectorStore } from "./types";

export interface FileVectorStoreOptions {
  dataDir: string;
  fileName?: string;
}

type StoreFile = {
  model: string | null;
  dimensions: number | null;
  records: VectorRecord[];
};

function emptyStore(): StoreFile {
  return { model: null, dimensions: null, records: [] };
}

function isVectorRecord(value: unknown): value is VectorRecord {
  return (
    typeof value === "object" &&
    value !== null &&
    "id" in value &&
    typeof value.id === "string" &&
    "text" in value &&
    typeof value.text === "string" &&
    "vector" in value &&
    Array.isArray(value.vector) &&
    value.vector.every((entry: unknown) => typeof entry === "number")
  );
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

function parseStoreFile(raw: string, path: string): StoreFile {
  const parsed: unknown = JSON.parse(raw);
  if (!parsed || typeof parsed !== "object" || !("records" in parsed) || !Array.isArray(parsed.records)) {
    throw new Error(`Vector store file ${path} is malformed`);
  }
  const model = "model" in parsed && typeof parsed.model === "string" ? parsed.model : null;
  const dimensions = "dimensions" in parsed && typeof parsed.dimensions === "number" ? parsed.dimensions : null;
  const records: unknown[] = parsed.records;
  return {
    model,
    dimensions,
    records: records.filter(isVectorRecord),
  };
}

/**
 * Euclidean distance; vectors of different length are infinitely far apart
 */
export function l2Distance(a: number[], b: number[]): number {
  if (a.length !== b.length) {
    return Number.POSITIVE_INFINITY;
  }
  let sum = 0;
  for (let i = 0; i < a.length; i++) {
    const diff = (a[i] ?? 0) - (b[i] ?? 0);
    sum += diff * diff;
  }
  return Math.sqrt(sum);
}

/**
 * Persistent vector store backed by one JSON file.
 *
 * The file is read once per process and cached; writes replace it atomically.
 * Append-mostly: upsert replaces records by id and nothing is ever deleted
 * except through clear(). A single process should own the file for writing.
 */
export class FileVectorStore implements VectorStore {
  private readonly dataDir: string;
  private readonly filePath: string;
  private state: StoreFile | null = null;
  private loading: Promise<StoreFile> | null = null;

  constructor(options: FileVectorStoreOptions) {
    this.dataDir = options.dataDir;
    this.filePath = join(options.dataDir, options.fileName ?? "tool-index.json");
  }

  get path(): string {
    return this.filePath;
  }

  private async load(): Promise<StoreFile> {
    if (this.state) {
      return this.state;
    }
    if (!this.loading) {
      this.loading = this.readFromDisk().then(state => {
        this.state = state;
        return state;
      });
    }
    return this.loading;
  }

  private async readFromDisk(): Promise<StoreFile> {
    let raw: string;
    try {
      raw = await readFile(this.filePath, "utf-8");
    } catch (error) {
      if (isMissingFile(error)) {
        return emptyStore();
      }
      throw error;
    }
    return parseStoreFile(raw, this.filePath);
  }

  private async persist(state: StoreFile): Promise<void> {
    await mkdir(this.dataDir, { recursive: true });
    const tmpPath = `${this.filePath}.tmp`;
    await writeFile(tmpPath, JSON.stringify(state), "utf-8");
    await rename(tmpPath, this.filePath);
  }

  async model(): Promise<string | null> {
    return (await this.load()).model;
  }

  async pin(model: string, dimensions: number): Promise<void> {
    const state = await this.load();
    if (state.model === model && state.dimensions === dimensions) {
      return;
    }
    if (state.model !== null && state.records.length > 0) {
      throw new Error(`Store already holds vectors from ${state.model}`);
    }
    state.model = model;
    state.dimensions = dimensions;
    await this.persist(state);
  }

  async count(): Promise<number> {
    return (await this.load()).records.length;
  }

  async get(id: string): Promise<VectorRecord | undefined> {
    return (await this.load()).records.find(record => record.id === id);
  }

  async upsert(records: VectorRecord[]): Promise<void> {
    if (records.length === 0) {
      return;
    }
    const state = await this.load();
    const incoming = new Map(records.map(record => [record.id, record]));
    const kept = state.records.filter(record => !incoming.has(record.id));
    state.records = [...kept, ...incoming.values()];
    await this.persist(state);
  }

  async nearest(vector: number[], k: number): Promise<VectorMatch[]> {
    const state = await this.load();
    return state.records
      .map(record => ({ id: record.id, distance: l2Distance(vector, record.vector) }))
      .sort((a, b) => (a.distance === b.distance ? a.id.localeCompare(b.id) : a.distance - b.distance))
      .slice(0, Math.max(0, k));
  }

  async clear(): Promise<void> {
    this.state = emptyStore();
    this.loading = null;
    await this.persist(this.state);
  }
}
