import test from "node:test";
import assert from "node:assert/strict";
import {
  JsonStore,
  MemoryKeyValueStore,
  SqliteKeyValueStore,
  parseNumber,
  parseRecord,
  parseStringArray,
} from "./dataStore.js";

const parseCount = (raw: unknown) => parseNumber(raw, 0);

test("SqliteKeyValueStore persists, overwrites and deletes values", async () => {
  const store = new SqliteKeyValueStore(":memory:");
  try {
    await store.set({ key: "a", value: "1" });
    await store.set([
      { key: "a", value: "2" },
      { key: "b", value: "3" },
    ]);
    assert.equal(await store.get("a"), "2");
    assert.equal(await store.get("b"), "3");

    await store.delete("a");
    assert.equal(await store.get("a"), undefined);
  } finally {
    store.close();
  }
});

test("JsonStore.read hands undefined to the parser for missing or malformed values", async () => {
  const kv = new MemoryKeyValueStore();
  const json = new JsonStore(kv);
  await kv.set({ key: "broken", value: "{not json" });

  assert.equal(await json.read("missing", parseCount), 0);
  assert.equal(await json.read("broken", parseCount), 0);

  await json.write("count", 7);
  assert.equal(await kv.get("count"), "7");
  assert.equal(await json.read("count", parseCount), 7);
});

test("JsonStore.transact serializes concurrent updates of the same key", async () => {
  const json = new JsonStore(new MemoryKeyValueStore());
  await Promise.all(
    Array.from({ length: 25 }, () => json.update("count", parseCount, (n) => n + 1))
  );
  assert.equal(await json.read("count", parseCount), 25);
});

test("JsonStore.transact skips the write when no value is returned", async () => {
  const kv = new MemoryKeyValueStore();
  const json = new JsonStore(kv);
  const result = await json.transact("count", parseCount, (current) => ({ result: current + 1 }));
  assert.equal(result, 1);
  assert.equal(await kv.get("count"), undefined);
});

test("JsonStore.transact releases the key after a failing transaction", async () => {
  const json = new JsonStore(new MemoryKeyValueStore());
  await assert.rejects(
    json.transact("count", parseCount, () => {
      throw new Error("boom");
    }),
    /boom/
  );
  assert.equal(await json.update("count", parseCount, (n) => n + 1), 1);
});

test("parse helpers drop values of the wrong type", () => {
  assert.deepEqual(parseStringArray(["a", 1, "b", null]), ["a", "b"]);
  assert.deepEqual(parseStringArray("a"), []);
  assert.deepEqual(
    parseRecord({ a: 1, b: "x", c: 3 }, (v) => (typeof v === "number" ? v : null)),
    { a: 1, c: 3 }
  );
  assert.deepEqual(parseRecord([1, 2], () => 1), {});
});
