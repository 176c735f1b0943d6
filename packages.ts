import {readFile} from "node:fs/promises";
import {extname} from "node:path";
import {parse as parseToml} from "smol-toml";
import {isRecord} from "./strategies/shared.ts";
import {isVersionTransform} from "./utils/version.ts";
import type {LivecheckConfig, Package} from "./types.ts";
import type {VersionTransform} from "./utils/version.ts";

type Fields = Record<string, unknown>;

function optionalString(obj: Fields, key: string, where: string): string | undefined {
  const value = obj[key];
  if (value === undefined) return undefined;
  if (typeof value !== "string") throw new Error(`${where}: "${key}" must be a string`);
  return value;
}

function optionalBoolean(obj: Fields, key: string, where: string): boolean | undefined {
  const value = obj[key];
  if (value === undefined) return undefined;
  if (typeof value !== "boolean") throw new Error(`${where}: "${key}" must be a boolean`);
  return value;
}

function optionalStringArray(obj: Fields, key: string, where: string): Array<string> | undefined {
  const value = obj[key];
  if (value === undefined) return undefined;
  const ret: Array<string> = [];
  for (const item of Array.isArray(value) ? value : [null]) {
    if (typeof item !== "string") throw new Error(`${where}: "${key}" must be an array of strings`);
    ret.push(item);
  }
  return ret;
}

function parseLivecheck(obj: Fields, where: string): LivecheckConfig {
  const transform = optionalString(obj, "version_transform", where);
  let versionTransform: VersionTransform | undefined;
  if (transform !== undefined) {
    if (!isVersionTransform(transform)) throw new Error(`${where}: unknown version_transform "${transform}"`);
    versionTransform = transform;
  }
  const livecheck: LivecheckConfig = {
    url: optionalString(obj, "url", where),
    strategy: optionalString(obj, "strategy", where),
    regex: optionalString(obj, "regex", where),
    skip: optionalBoolean(obj, "skip", where),
    skipMessage: optionalString(obj, "skip_message", where),
    version: optionalString(obj, "version", where),
    versionTransform,
    allowUnstable: optionalBoolean(obj, "allow_unstable", where),
  };
  return stripUndefined(livecheck);
}

function stripUndefined<T extends object>(obj: T): T {
  for (const [key, value] of Object.entries(obj)) {
    if (value === undefined) Reflect.deleteProperty(obj, key);
  }
  return obj;
}

export function parsePackage(value: unknown, index: number): Package {
  let where = `Package #${index + 1}`;
  if (!isRecord(value)) throw new Error(`${where} must be a table`);
  const name = optionalString(value, "name", where);
  if (!name) throw new Error(`${where}: "name" is required`);
  where = `Package ${name}`;
  const version = optionalString(value, "version", where);
  if (!version) throw new Error(`${where}: "version" is required`);

  if (value.livecheck !== undefined && !isRecord(value.livecheck)) {
    throw new Error(`${where}: "livecheck" must be a table`);
  }

  return stripUndefined({
    name,
    fullName: optionalString(value, "full_name", where),
    version,
    homepage: optionalString(value, "homepage", where),
    url: optionalString(value, "url", where),
    mirrors: optionalStringArray(value, "mirrors", where),
    head: optionalString(value, "head", where),
    installedHead: optionalString(value, "installed_head", where),
    deprecated: optionalBoolean(value, "deprecated", where),
    versioned: optionalBoolean(value, "versioned", where),
    livecheck: isRecord(value.livecheck) ? parseLivecheck(value.livecheck, where) : undefined,
  });
}

export function parsePackages(content: string, format: "toml" | "json"): Array<Package> {
  const data: unknown = format === "toml" ? parseToml(content) : JSON.parse(content);
  const list = Array.isArray(data) ? data : isRecord(data) ? data.packages : undefined;
  if (!Array.isArray(list)) throw new Error(`Expected a list of packages`);
  return list.map((value, index) => parsePackage(value, index));
}

// drop duplicates by full name, keeping the first
export function dedupePackages(packages: Array<Package>): Array<Package> {
  const seen = new Set<string>();
  return packages.filter(pkg => {
    const key = pkg.fullName ?? pkg.name;
    if (seen.has(key)) return false;
    seen.add(key);
    return true;
  });
}

export async function loadPackages(file: string): Promise<Array<Package>> {
  let content: string;
  try {
    content = await readFile(file, "utf8");
  } catch (err) {
    throw new Error(`Unable to open ${file}: ${err instanceof Error ? err.message : String(err)}`);
  }
  try {
    return parsePackages(content, extname(file) === ".json" ? "json" : "toml");
  } catch (err) {
    throw new Error(`Error parsing ${file}: ${err instanceof Error ? err.message : String(err)}`, {cause: err});
  }
}
