#!/usr/bin/env -S node --import tsx
import {argv, exit, stdout, stderr, cwd} from "node:process";
import {join, dirname, resolve} from "node:path";
import {accessSync, realpathSync} from "node:fs";
import {homedir} from "node:os";
import {pathToFileURL} from "node:url";
import {styleText} from "node:util";
import minimist from "minimist";
import {loadConfig} from "./config.ts";
import {loadPackages, dedupePackages} from "./packages.ts";
import {checkPackage} from "./check.ts";
import {runBatch, scheduleByLastCheck, cacheKey, defaultConcurrency} from "./batch.ts";
import {ResultCache, FileStore} from "./cache.ts";
import {createRegistry} from "./strategies/index.ts";
import {defaultFetchTimeout, packageVersion} from "./strategies/shared.ts";
import {formatHuman, formatJson, formatJsonLines, plainColors} from "./report.ts";
import {canInclude, matchersToRegexSet, commaSeparatedToArray, normalizeUrl, parseDuration, shuffle, logVerbose} from "./utils/utils.ts";
import type {Config} from "./config.ts";
import type {Colors} from "./report.ts";
import type {StrategyContext} from "./strategies/index.ts";
import type {Package} from "./types.ts";

export {checkPackage, findLatestVersion, skipOutcome, currentVersion, candidateUrls} from "./check.ts";
export {runBatch} from "./batch.ts";
export {ResultCache, MemoryStore, FileStore} from "./cache.ts";
export {createRegistry, strategiesForUrl, selectStrategy} from "./strategies/index.ts";
export {preprocessUrl} from "./utils/url.ts";
export {Version, VersionComparisonError} from "./utils/version.ts";
export {formatHuman, formatJson, formatJsonLines} from "./report.ts";
export {loadPackages, parsePackages} from "./packages.ts";
export type {Package, LivecheckConfig, CheckOutcome, CheckStatus} from "./types.ts";
export type {Strategy, StrategyContext, ExtractionResult, StrategyRegistry} from "./strategies/index.ts";
export type {KeyValueStore} from "./cache.ts";
export type {BatchEntry} from "./batch.ts";

export type RunOpts = {
  signal?: AbortSignal,
  /** Skips reading rc files when given */
  config?: Config,
};

export type RunResult = {
  output: string,
  exitCode: number,
};

const defaultFile = "upwatch.toml";
const defaultCacheFile = join(homedir(), ".cache", "upwatch", "results.json");

const usage = `usage: upwatch [options] [package...]

  Options:
    -f, --file <path>           Package list, TOML or JSON. Default: ${defaultFile} in the current or a parent directory
    -i, --include <pkg,...>     Include only given packages
    -e, --exclude <pkg,...>     Exclude given packages
    -N, --newer-only            Only report packages with newer upstream versions
    -E, --error-on-outdated     Exit with code 2 when newer upstream versions are found
    -c, --concurrency <num>     Number of packages checked in parallel. Default: ${defaultConcurrency}
    -l, --limit <minutes>       Do not start new checks after this many minutes
    -t, --timeout <ms>          Timeout of each fetch in milliseconds. Default: ${defaultFetchTimeout}
    -r, --registry <url>        Override npm registry URL
    -s, --shuffle               Check packages in random order
        --full-name             Print namespace-qualified package names
        --cache                 Cache results in ${defaultCacheFile}
        --cache-file <path>     Cache results in the given file
        --cache-ttl <duration>  Lifetime of cached results, like 12h or 2d. Default: 1d
        --refresh               Ignore cached results, but still update the cache
    -j, --json                  Output a JSON array
        --ndjson                Output one JSON object per line
        --no-color              Disable color output
    -v, --version               Print the version
    -V, --verbose               Print verbose output to stderr
    -h, --help                  Print this help

  Examples:
    $ upwatch
    $ upwatch -f packages.toml -N
    $ upwatch -e 'lib*' --json
    $ upwatch --cache -l 30 curl wget
`;

export function parseArgs(args: Array<string>) {
  return minimist(args, {
    boolean: [
      "cache",
      "color",
      "E", "error-on-outdated",
      "full-name",
      "h", "help",
      "j", "json",
      "ndjson",
      "N", "newer-only",
      "refresh",
      "s", "shuffle",
      "v", "version",
      "V", "verbose",
    ],
    string: [
      "c", "concurrency",
      "cache-file",
      "cache-ttl",
      "e", "exclude",
      "f", "file",
      "i", "include",
      "l", "limit",
      "r", "registry",
      "t", "timeout",
      "githubapi", // undocumented, only for tests
      "pypiapi", // undocumented, only for tests
    ],
    alias: {
      c: "concurrency",
      E: "error-on-outdated",
      e: "exclude",
      f: "file",
      h: "help",
      i: "include",
      j: "json",
      l: "limit",
      N: "newer-only",
      r: "registry",
      s: "shuffle",
      t: "timeout",
      v: "version",
      V: "verbose",
    },
    default: {
      color: true,
    },
  });
}

type Args = ReturnType<typeof parseArgs>;

function makeColors(enabled: boolean): Colors {
  if (!enabled) return plainColors;
  return {
    blue: text => styleText("blue", text),
    red: text => styleText("red", text),
    green: text => styleText("green", text),
    magenta: text => styleText("magenta", text),
  };
}

function stringArg(args: Args, name: string): string | undefined {
  const raw: unknown = args[name];
  const value: unknown = Array.isArray(raw) ? raw.at(-1) : raw; // repeated flags, last wins
  return typeof value === "string" && value !== "" ? value : undefined;
}

function numberArg(value: string | number | undefined, flag: string, {integer = false} = {}): number | undefined {
  if (value === undefined) return undefined;
  const num = Number(value);
  if (!Number.isFinite(num) || num < 0 || (integer && !Number.isInteger(num))) throw new Error(`Invalid value for --${flag}: ${value}`);
  return num;
}

function findUpSync(filename: string, dir: string): string | null {
  const path = join(dir, filename);
  try {
    accessSync(path);
    return path;
  } catch {
    const parent = dirname(dir);
    return parent === dir ? null : findUpSync(filename, parent);
  }
}

function selectPackages(packages: Array<Package>, args: Args, config: Config): Array<Package> {
  const names = new Set(args._.map(String));
  const include = matchersToRegexSet(commaSeparatedToArray(stringArg(args, "include") ?? ""), config.include ?? []);
  const exclude = matchersToRegexSet(commaSeparatedToArray(stringArg(args, "exclude") ?? ""), config.exclude ?? []);
  const selected = dedupePackages(packages).filter(pkg => {
    if (names.size && !names.has(pkg.name) && !names.has(pkg.fullName ?? pkg.name)) return false;
    return canInclude(pkg.name, include, exclude);
  });
  return args.shuffle ? shuffle(selected) : selected.sort((a, b) => a.name.localeCompare(b.name));
}

export function makeFetch(verbose: boolean, colors: Colors): StrategyContext["doFetch"] {
  return async (url, opts) => {
    if (verbose) logVerbose(`${colors.magenta("fetch")} ${url}`);
    const res = await fetch(url, opts);
    if (verbose) logVerbose(`${res.ok ? colors.green(String(res.status)) : colors.red(String(res.status))} ${url}`);
    return res;
  };
}

export async function run(argList: Array<string>, {signal, config = loadConfig()}: RunOpts = {}): Promise<RunResult> {
  const args = parseArgs(argList);
  const json = Boolean(args.json || args.ndjson);

  if (args.help) return {output: usage.trimEnd(), exitCode: 0};
  if (args.version) return {output: packageVersion, exitCode: 0};

  const colors = makeColors(args.color !== false && !json);
  const verbose = Boolean(args.verbose);

  const fileArg = stringArg(args, "file") ?? config.file;
  const file = fileArg ? resolve(fileArg) : findUpSync(defaultFile, cwd());
  if (!file) throw new Error(`Unable to find ${defaultFile}, pass a package list with --file`);
  const packages = selectPackages(await loadPackages(file), args, config);

  if (!packages.length) {
    const message = "No packages found, nothing to do.";
    return {output: json ? JSON.stringify({message}) : message, exitCode: 0};
  }

  const ctx: StrategyContext = {
    fetchTimeout: numberArg(stringArg(args, "timeout") ?? config.fetchTimeout, "timeout") ?? defaultFetchTimeout,
    forgeApiUrl: normalizeUrl(stringArg(args, "githubapi") ?? config.forgeApiUrl ?? "https://api.github.com"),
    pypiApiUrl: normalizeUrl(stringArg(args, "pypiapi") ?? config.pypiApiUrl ?? "https://pypi.org"),
    npmRegistry: stringArg(args, "registry") ?? config.registry ?? null,
    doFetch: makeFetch(verbose, colors),
    verbose,
    logVerbose,
  };

  const cacheFile = stringArg(args, "cache-file") ?? config.cacheFile ?? (args.cache ? defaultCacheFile : null);
  const cache = cacheFile ? new ResultCache(new FileStore(resolve(cacheFile))) : null;
  const cacheTtl = parseDuration(stringArg(args, "cache-ttl") ?? config.cacheTtl ?? "1d") * 24 * 3600 * 1000;
  const limit = numberArg(stringArg(args, "limit") ?? config.limit, "limit");
  const deadline = limit === undefined ? null : Date.now() + limit * 60 * 1000;
  const registry = createRegistry();

  if (verbose) logVerbose(`Checking ${packages.length} packages from ${file}`);

  const scheduled = cache ? await scheduleByLastCheck(packages, cache) : packages;
  const entries = await runBatch(scheduled, (pkg, {deadline}) => checkPackage(pkg, {ctx, registry, deadline}), {
    concurrency: numberArg(stringArg(args, "concurrency") ?? config.concurrency, "concurrency", {integer: true}) ?? defaultConcurrency,
    deadline,
    signal,
    cache,
    refresh: Boolean(args.refresh),
    cacheTtl,
  });

  // report in list order, not in check order
  const listOrder = new Map(packages.map((pkg, index) => [cacheKey(pkg), index]));
  entries.sort((a, b) => (listOrder.get(a.fullName) ?? 0) - (listOrder.get(b.fullName) ?? 0));

  const reportOpts = {fullName: Boolean(args["full-name"]), verbose, newerOnly: Boolean(args["newer-only"]), colors};
  let output: string;
  if (args.ndjson) {
    output = formatJsonLines(entries, reportOpts);
  } else if (args.json) {
    output = formatJson(entries, reportOpts);
  } else {
    output = formatHuman(entries, reportOpts);
  }

  const outcomes = entries.map(entry => entry.outcome);
  let exitCode = 0;
  if (outcomes.some(outcome => outcome?.status === "error")) exitCode = 1;
  if (args["error-on-outdated"] && outcomes.some(outcome => outcome?.outdated)) exitCode = 2;
  return {output, exitCode};
}

async function doExit(err?: unknown, exitCode = 0): Promise<never> {
  if (err) {
    const error = err instanceof Error ? err.message : String(err);
    const cause = err instanceof Error && err.cause ? String(err.cause) : undefined;
    if (argv.includes("--json") || argv.includes("-j") || argv.includes("--ndjson")) {
      stdout.write(`${JSON.stringify({error, cause})}\n`);
    } else {
      stderr.write(`${styleText("red", error)}\n`);
      if (cause) stderr.write(`${styleText("red", `Caused by: ${cause}`)}\n`);
    }
  }
  exit(err ? 1 : exitCode);
}

async function main(): Promise<never> {
  const controller = new AbortController();
  const onSigint = () => {
    if (controller.signal.aborted) exit(130);
    stderr.write("Waiting for running checks to finish...\n");
    controller.abort();
  };
  process.on("SIGINT", onSigint);
  try {
    const {output, exitCode} = await run(argv.slice(2), {signal: controller.signal});
    if (output) stdout.write(`${output}\n`);
    return doExit(undefined, exitCode);
  } finally {
    process.off("SIGINT", onSigint);
  }
}

if (argv[1] && import.meta.url === pathToFileURL(realpathSync(argv[1])).href) {
  try {
    await main();
  } catch (err) {
    await doExit(err);
  }
}
