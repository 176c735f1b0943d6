import {mkdtempSync} from "node:fs";
import {readFile, writeFile, rm, readdir} from "node:fs/promises";
import {join} from "node:path";
import {tmpdir} from "node:os";
import {ResultCache, MemoryStore, FileStore, defaultCacheTtl} from "./cache.ts";
import type {CheckOutcome} from "./types.ts";

const testDir = mkdtempSync(join(tmpdir(), "upwatch-cache-"));

afterAll(async () => {
  await rm(testDir, {recursive: true});
});

const outcome: CheckOutcome = {
  name: "tool",
  fullName: "example/tool",
  status: "success",
  current: "1.2.0",
  latest: "1.3.0",
  outdated: true,
  newerThanUpstream: false,
  messages: [],
};

test("round trip", async () => {
  let now = 1_000_000;
  const cache = new ResultCache(new MemoryStore(), {now: () => now});
  expect(await cache.get("example/tool")).toBe(null);
  await cache.set("example/tool", outcome);
  expect(await cache.get("example/tool")).toEqual(outcome);
  expect(await cache.lookup("example/tool")).toEqual({
    outcome,
    checkedAt: new Date(1_000_000).toISOString(),
    validUntil: new Date(1_000_000 + defaultCacheTtl).toISOString(),
  });
  now += defaultCacheTtl - 1;
  expect(await cache.get("example/tool")).toEqual(outcome);
  await cache.delete("example/tool");
  expect(await cache.get("example/tool")).toBe(null);
});

test("expired entries are deleted", async () => {
  let now = 0;
  const store = new MemoryStore();
  const cache = new ResultCache(store, {now: () => now});
  await cache.set("example/tool", outcome, 1000);
  now = 1000;
  expect(await cache.get("example/tool")).toBe(null);
  expect(store.data.has("example/tool")).toBe(false);
});

test("corrupted entries throw", async () => {
  const store = new MemoryStore();
  const cache = new ResultCache(store);
  await store.set("a", "{not json");
  await store.set("b", JSON.stringify({outcome: {name: "b"}, checkedAt: "x", validUntil: "y"}));
  await expect(cache.get("a")).rejects.toThrow("Corrupted cache entry for a");
  await expect(cache.get("b")).rejects.toThrow("Corrupted cache entry for b");
});

test("file store", async () => {
  const path = join(testDir, "nested", "cache.json");
  const cache = new ResultCache(new FileStore(path), {now: () => 0});
  await Promise.all([
    cache.set("one", {...outcome, fullName: "one"}),
    cache.set("two", {...outcome, fullName: "two"}),
  ]);
  const onDisk = JSON.parse(await readFile(path, "utf8"));
  expect(Object.keys(onDisk)).toEqual(["one", "two"]);
  expect(await readdir(join(testDir, "nested"))).toEqual(["cache.json"]);

  const reopened = new ResultCache(new FileStore(path), {now: () => 0});
  expect((await reopened.get("two"))?.fullName).toBe("two");
  await reopened.delete("one");
  expect(Object.keys(JSON.parse(await readFile(path, "utf8")))).toEqual(["two"]);
});

test("file store errors", async () => {
  const missing = new FileStore(join(testDir, "missing.json"));
  expect(await missing.get("x")).toBe(undefined);
  const path = join(testDir, "broken.json");
  await writeFile(path, "[");
  await expect(new FileStore(path).get("x")).rejects.toThrow(`Unable to parse cache file ${path}`);
});
