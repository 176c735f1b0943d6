import {mkdir, readFile, rename, rm, writeFile} from "node:fs/promises";
import {dirname} from "node:path";
import {randomBytes} from "node:crypto";
import {isRecord} from "./strategies/shared.ts";
import type {CheckOutcome} from "./types.ts";

export type KeyValueStore = {
  get: (key: string) => Promise<string | undefined>,
  set: (key: string, value: string) => Promise<void>,
  delete: (key: string) => Promise<void>,
};

export type CacheEntry = {
  outcome: CheckOutcome,
  checkedAt: string,
  validUntil: string,
};

export const defaultCacheTtl = 24 * 3600 * 1000;

const statuses = new Set(["success", "error", "skipped", "deprecated", "versioned"]);

function isCheckOutcome(value: unknown): value is CheckOutcome {
  return isRecord(value) &&
    typeof value.name === "string" &&
    typeof value.fullName === "string" &&
    typeof value.status === "string" && statuses.has(value.status) &&
    typeof value.outdated === "boolean" &&
    typeof value.newerThanUpstream === "boolean" &&
    Array.isArray(value.messages);
}

function parseEntry(key: string, raw: string): CacheEntry {
  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch (err) {
    throw new Error(`Corrupted cache entry for ${key}`, {cause: err});
  }
  if (!isRecord(data) || !isCheckOutcome(data.outcome) ||
    typeof data.checkedAt !== "string" || Number.isNaN(Date.parse(data.checkedAt)) ||
    typeof data.validUntil !== "string" || Number.isNaN(Date.parse(data.validUntil))) {
    throw new Error(`Corrupted cache entry for ${key}`);
  }
  return {outcome: data.outcome, checkedAt: data.checkedAt, validUntil: data.validUntil};
}

export class ResultCache {
  private readonly store: KeyValueStore;
  private readonly now: () => number;

  constructor(store: KeyValueStore, {now = Date.now}: {now?: () => number} = {}) {
    this.store = store;
    this.now = now;
  }

  /** Returns the cached entry, expired or not */
  async peek(key: string): Promise<CacheEntry | null> {
    const raw = await this.store.get(key);
    return raw === undefined ? null : parseEntry(key, raw);
  }

  /** Returns the cached entry, deleting it when it has expired */
  async lookup(key: string): Promise<CacheEntry | null> {
    const entry = await this.peek(key);
    if (!entry) return null;
    if (Date.parse(entry.validUntil) <= this.now()) {
      await this.store.delete(key);
      return null;
    }
    return entry;
  }

  async get(key: string): Promise<CheckOutcome | null> {
    return (await this.lookup(key))?.outcome ?? null;
  }

  async set(key: string, outcome: CheckOutcome, ttl: number = defaultCacheTtl): Promise<void> {
    const now = this.now();
    const entry: CacheEntry = {
      outcome,
      checkedAt: new Date(now).toISOString(),
      validUntil: new Date(now + ttl).toISOString(),
    };
    await this.store.set(key, JSON.stringify(entry));
  }

  async delete(key: string): Promise<void> {
    await this.store.delete(key);
  }
}

export class MemoryStore implements KeyValueStore {
  readonly data = new Map<string, string>();

  async get(key: string): Promise<string | undefined> {
    return this.data.get(key);
  }

  async set(key: string, value: string): Promise<void> {
    this.data.set(key, value);
  }

  async delete(key: string): Promise<void> {
    this.data.delete(key);
  }
}

export async function atomicWriteJson(path: string, data: unknown): Promise<void> {
  await mkdir(dirname(path), {recursive: true});
  const tmp = `${path}.${randomBytes(6).toString("hex")}.tmp`;
  try {
    await writeFile(tmp, `${JSON.stringify(data, null, 2)}\n`, {mode: 0o600});
    await rename(tmp, path);
  } catch (err) {
    await rm(tmp, {force: true});
    throw err;
  }
}

// a whole JSON file per store, every write replaces the file
export class FileStore implements KeyValueStore {
  readonly path: string;
  private data: Promise<Map<string, string>> | null = null;
  private writing: Promise<void> = Promise.resolve();

  constructor(path: string) {
    this.path = path;
  }

  private async read(): Promise<Map<string, string>> {
    let raw: string;
    try {
      raw = await readFile(this.path, "utf8");
    } catch (err) {
      if (isRecord(err) && err.code === "ENOENT") return new Map();
      throw err;
    }
    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (err) {
      throw new Error(`Unable to parse cache file ${this.path}`, {cause: err});
    }
    if (!isRecord(parsed)) throw new Error(`Unable to parse cache file ${this.path}`);
    const ret = new Map<string, string>();
    for (const [key, value] of Object.entries(parsed)) {
      ret.set(key, typeof value === "string" ? value : JSON.stringify(value));
    }
    return ret;
  }

  private load(): Promise<Map<string, string>> {
    if (!this.data) this.data = this.read();
    return this.data;
  }

  // writes are serialized so that a later snapshot never lands before an earlier one
  private flush(): Promise<void> {
    const write = this.writing.then(async () => {
      await atomicWriteJson(this.path, Object.fromEntries(await this.load()));
    });
    this.writing = Promise.allSettled([write]).then(() => undefined);
    return write;
  }

  async get(key: string): Promise<string | undefined> {
    return (await this.load()).get(key);
  }

  async set(key: string, value: string): Promise<void> {
    (await this.load()).set(key, value);
    await this.flush();
  }

  async delete(key: string): Promise<void> {
    if ((await this.load()).delete(key)) await this.flush();
  }
}
