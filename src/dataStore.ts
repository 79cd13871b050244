/**
 * App data persistence: an async key-value store with string values, and a JSON layer on top
 * with per-key serialized read-modify-write.
 */

import fs from "node:fs";
import path from "node:path";
import Database from "better-sqlite3";

export interface KeyValueEntry {
  key: string;
  value: string;
}

export interface KeyValueStore {
  get(key: string): Promise<string | undefined>;
  set(entries: KeyValueEntry | KeyValueEntry[]): Promise<void>;
  delete(key: string): Promise<void>;
  close(): void;
}

export class SqliteKeyValueStore implements KeyValueStore {
  private readonly db: Database.Database;

  constructor(filename: string) {
    if (filename !== ":memory:") {
      fs.mkdirSync(path.dirname(filename), { recursive: true });
    }
    this.db = new Database(filename);
    this.db.pragma("journal_mode = WAL");
    this.db.exec(
      "CREATE TABLE IF NOT EXISTS app_data (key TEXT PRIMARY KEY, value TEXT NOT NULL)"
    );
  }

  async get(key: string): Promise<string | undefined> {
    const row = this.db
      .prepare<[string], { value: string }>("SELECT value FROM app_data WHERE key = ?")
      .get(key);
    return row?.value;
  }

  async set(entries: KeyValueEntry | KeyValueEntry[]): Promise<void> {
    const list = Array.isArray(entries) ? entries : [entries];
    const upsert = this.db.prepare<[string, string]>(
      "INSERT INTO app_data (key, value) VALUES (?, ?) ON CONFLICT(key) DO UPDATE SET value = excluded.value"
    );
    const writeAll = this.db.transaction((items: KeyValueEntry[]) => {
      for (const item of items) upsert.run(item.key, item.value);
    });
    writeAll(list);
  }

  async delete(key: string): Promise<void> {
    this.db.prepare<[string]>("DELETE FROM app_data WHERE key = ?").run(key);
  }

  close(): void {
    this.db.close();
  }
}

export class MemoryKeyValueStore implements KeyValueStore {
  private readonly data = new Map<string, string>();

  async get(key: string): Promise<string | undefined> {
    return this.data.get(key);
  }

  async set(entries: KeyValueEntry | KeyValueEntry[]): Promise<void> {
    const list = Array.isArray(entries) ? entries : [entries];
    for (const item of list) this.data.set(item.key, item.value);
  }

  async delete(key: string): Promise<void> {
    this.data.delete(key);
  }

  close(): void {
    this.data.clear();
  }
}

/** Turns a decoded JSON value (or undefined when the key is missing) into a typed value. */
export type Parser<T> = (raw: unknown) => T;

export interface Transaction<T, R> {
  /** New value to persist; leave undefined to skip the write */
  value?: T;
  result: R;
}

export class JsonStore {
  private readonly locks = new Map<string, Promise<void>>();

  constructor(readonly kv: KeyValueStore) {}

  async read<T>(key: string, parse: Parser<T>): Promise<T> {
    const raw = await this.kv.get(key);
    if (raw === undefined) return parse(undefined);
    let decoded: unknown;
    try {
      decoded = JSON.parse(raw);
    } catch {
      console.error(`[Store] Ignoring malformed JSON under "${key}"`);
      decoded = undefined;
    }
    return parse(decoded);
  }

  async write(key: string, value: unknown): Promise<void> {
    await this.kv.set({ key, value: JSON.stringify(value) });
  }

  async delete(key: string): Promise<void> {
    await this.kv.delete(key);
  }

  /**
   * Read the current value, apply `fn` and write the result back. Calls for the same key run
   * one after another, so concurrent commands cannot overwrite each other's changes.
   */
  async transact<T, R>(
    key: string,
    parse: Parser<T>,
    fn: (current: T) => Transaction<T, R> | Promise<Transaction<T, R>>
  ): Promise<R> {
    const previous = this.locks.get(key) ?? Promise.resolve();
    const run = previous.then(async () => {
      const current = await this.read(key, parse);
      const { value, result } = await fn(current);
      if (value !== undefined) await this.write(key, value);
      return result;
    });
    // The queue only tracks completion; the caller still receives the rejection through `run`.
    const settled = run.then(
      () => undefined,
      () => undefined
    );
    this.locks.set(key, settled);
    try {
      return await run;
    } finally {
      if (this.locks.get(key) === settled) this.locks.delete(key);
    }
  }

  update<T>(key: string, parse: Parser<T>, fn: (current: T) => T): Promise<T> {
    return this.transact(key, parse, (current) => {
      const next = fn(current);
      return { value: next, result: next };
    });
  }
}

export function isRecord(raw: unknown): raw is Record<string, unknown> {
  return typeof raw === "object" && raw !== null && !Array.isArray(raw);
}

export function parseString(raw: unknown): string | undefined {
  if (typeof raw === "string" && raw.length > 0) return raw;
  return undefined;
}

export function parseNumber(raw: unknown, fallback: number): number {
  return typeof raw === "number" && Number.isFinite(raw) ? raw : fallback;
}

export function parseBoolean(raw: unknown, fallback: boolean): boolean {
  return typeof raw === "boolean" ? raw : fallback;
}

export function parseStringArray(raw: unknown): string[] {
  if (!Array.isArray(raw)) return [];
  return raw.filter((x): x is string => typeof x === "string");
}

/** Parse a JSON object, dropping entries whose value `parseValue` rejects with null. */
export function parseRecord<V>(
  raw: unknown,
  parseValue: (value: unknown, key: string) => V | null
): Record<string, V> {
  const out: Record<string, V> = {};
  if (!isRecord(raw)) return out;
  for (const [key, value] of Object.entries(raw)) {
    const parsed = parseValue(value, key);
    if (parsed !== null) out[key] = parsed;
  }
  return out;
}
