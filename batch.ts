import pAll from "p-all";
import {defaultCacheTtl} from "./cache.ts";
import {errorOutcome} from "./check.ts";
import {shuffle} from "./utils/utils.ts";
import type {ResultCache} from "./cache.ts";
import type {CheckOutcome, Package} from "./types.ts";

export type Checker = (pkg: Package, opts: {deadline: number | null}) => Promise<CheckOutcome>;

export type BatchOpts = {
  concurrency?: number,
  /** Epoch milliseconds, packages not started by then are left unchecked */
  deadline?: number | null,
  signal?: AbortSignal,
  cache?: ResultCache | null,
  /** Skip cache lookups, results are still written */
  refresh?: boolean,
  cacheTtl?: number,
  now?: () => number,
  onResult?: (entry: BatchEntry) => void,
};

export type BatchEntry = {
  name: string,
  fullName: string,
  /** null when the package was not checked before the deadline or interrupt */
  outcome: CheckOutcome | null,
  cached: boolean,
  checkedAt?: string,
};

export const defaultConcurrency = 4;

export const cacheKey = (pkg: Package) => pkg.fullName ?? pkg.name;

async function runOne(pkg: Package, check: Checker, opts: BatchOpts): Promise<BatchEntry> {
  const {deadline = null, signal, cache, refresh = false, cacheTtl = defaultCacheTtl, now = Date.now} = opts;
  const {name} = pkg;
  const fullName = cacheKey(pkg);

  if (signal?.aborted || (deadline !== null && now() >= deadline)) {
    return {name, fullName, outcome: null, cached: false};
  }

  let outcome: CheckOutcome;
  try {
    const entry = cache && !refresh ? await cache.lookup(fullName) : null;
    if (entry) return {name, fullName, outcome: entry.outcome, cached: true, checkedAt: entry.checkedAt};
    outcome = await check(pkg, {deadline});
  } catch (err) {
    outcome = errorOutcome(pkg, err);
  }

  if (cache && outcome.status === "success") {
    try {
      await cache.set(fullName, outcome, cacheTtl);
    } catch (err) {
      outcome = {...outcome, messages: [...outcome.messages, `Unable to write cache: ${err instanceof Error ? err.message : String(err)}`]};
    }
  }

  return {name, fullName, outcome, cached: false};
}

async function lastCheckedAt(pkg: Package, cache: ResultCache): Promise<number | null> {
  try {
    const entry = await cache.peek(cacheKey(pkg));
    return entry ? Date.parse(entry.checkedAt) : null;
  } catch {
    return null; // corrupted entries are reported when the package is checked
  }
}

// never checked packages first in random order, then the least recently checked
export async function scheduleByLastCheck(packages: Array<Package>, cache: ResultCache, random: () => number = Math.random): Promise<Array<Package>> {
  const unchecked: Array<Package> = [];
  const checked: Array<{pkg: Package, checkedAt: number}> = [];
  for (const pkg of packages) {
    const checkedAt = await lastCheckedAt(pkg, cache);
    if (checkedAt === null) {
      unchecked.push(pkg);
    } else {
      checked.push({pkg, checkedAt});
    }
  }
  checked.sort((a, b) => a.checkedAt - b.checkedAt);
  return [...shuffle(unchecked, random), ...checked.map(({pkg}) => pkg)];
}

export async function runBatch(packages: Array<Package>, check: Checker, opts: BatchOpts = {}): Promise<Array<BatchEntry>> {
  const concurrency = Math.max(1, opts.concurrency ?? defaultConcurrency);
  return pAll(packages.map(pkg => async () => {
    const entry = await runOne(pkg, check, opts);
    opts.onResult?.(entry);
    return entry;
  }), {concurrency});
}
