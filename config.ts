import rc from "rc";
import {isRecord} from "./strategies/shared.ts";

export type Config = {
  /** Packages to include, globs or /regexes/ */
  include?: Array<string>,
  /** Packages to exclude, globs or /regexes/ */
  exclude?: Array<string>,
  /** Default package list */
  file?: string,
  /** Per-fetch timeout in milliseconds */
  fetchTimeout?: number,
  concurrency?: number,
  cacheFile?: string,
  /** Duration like 1d or 12h */
  cacheTtl?: string,
  /** Minutes after which no new package checks are started */
  limit?: number,
  forgeApiUrl?: string,
  pypiApiUrl?: string,
  registry?: string,
};

function stringList(value: unknown, key: string): Array<string> | undefined {
  if (value === undefined) return undefined;
  if (typeof value === "string") return value.split(",").map(s => s.trim()).filter(Boolean);
  if (Array.isArray(value) && value.every(item => typeof item === "string")) return value.map(String);
  throw new Error(`Invalid config value for ${key}: expected a list of strings`);
}

function numberValue(value: unknown, key: string, {integer = false} = {}): number | undefined {
  if (value === undefined) return undefined;
  const num = typeof value === "string" ? Number(value) : value;
  if (typeof num !== "number" || !Number.isFinite(num) || num < 0 || (integer && !Number.isInteger(num))) throw new Error(`Invalid config value for ${key}: ${String(value)}`);
  return num;
}

function stringValue(value: unknown, key: string): string | undefined {
  if (value === undefined) return undefined;
  if (typeof value === "number") return String(value);
  if (typeof value !== "string") throw new Error(`Invalid config value for ${key}: ${String(value)}`);
  return value;
}

// rc values from env vars and ini files are strings, normalize them
export function parseConfig(raw: Record<string, unknown>): Config {
  return {
    include: stringList(raw.include, "include"),
    exclude: stringList(raw.exclude, "exclude"),
    file: stringValue(raw.file, "file"),
    fetchTimeout: numberValue(raw.fetchTimeout, "fetchTimeout"),
    concurrency: numberValue(raw.concurrency, "concurrency", {integer: true}),
    cacheFile: stringValue(raw.cacheFile, "cacheFile"),
    cacheTtl: stringValue(raw.cacheTtl, "cacheTtl"),
    limit: numberValue(raw.limit, "limit"),
    forgeApiUrl: stringValue(raw.forgeApiUrl, "forgeApiUrl"),
    pypiApiUrl: stringValue(raw.pypiApiUrl, "pypiApiUrl"),
    registry: stringValue(raw.registry, "registry"),
  };
}

// reads .upwatchrc files and upwatch_* environment variables
export function loadConfig(): Config {
  const raw: unknown = rc("upwatch", {}, {});
  return parseConfig(isRecord(raw) ? raw : {});
}
