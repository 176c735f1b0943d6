import rc from "rc";
import registryAuthToken from "registry-auth-token";
import {normalizeUrl} from "../utils/utils.ts";
import {extract, fetchJson, getFetchOpts, isRecord, versionsFromList} from "./shared.ts";
import type {Strategy} from "./shared.ts";

export type Npmrc = {
  registry: string,
  [other: string]: string,
};

const defaultRegistry = "https://registry.npmjs.org";
const nameRes = [
  /^https?:\/\/registry\.npmjs\.org\/((?:@[^/]+\/)?[^/@]+)\/-\//i,
  /^https?:\/\/(?:www\.)?npmjs\.com\/package\/((?:@[^/]+\/)?[^/?#]+)/i,
];

let npmrc: Npmrc | null = null;

export function toNpmrc(config: Record<string, unknown>): Npmrc {
  const ret: Npmrc = {registry: defaultRegistry};
  for (const [key, value] of Object.entries(config)) {
    if (typeof value === "string") ret[key] = value;
  }
  return ret;
}

export function getNpmrc(): Npmrc {
  if (!npmrc) npmrc = toNpmrc(rc("npm", {registry: defaultRegistry}, {}));
  return npmrc;
}

export function npmPackageName(url: string): string | null {
  for (const re of nameRes) {
    const name = re.exec(url)?.[1];
    if (name) return decodeURIComponent(name);
  }
  return null;
}

export const npm: Strategy = {
  name: "npm",
  priority: 5,
  appliesTo: url => npmPackageName(url) !== null,
  findVersions: (url, {regex, timeout}, ctx) => extract(url, timeout, async () => {
    const name = npmPackageName(url) ?? "";
    const config = getNpmrc();
    const registry = normalizeUrl(ctx.npmRegistry ?? config.registry);
    const auth = registryAuthToken(registry, {npmrc: config, recursive: true});
    const registryUrl = `${registry}/${name.replace("/", "%2f")}`;
    const data = await fetchJson(registryUrl, timeout, ctx, getFetchOpts(timeout, auth?.type, auth?.token));
    const versions = isRecord(data) && isRecord(data.versions) ? Object.keys(data.versions) : [];
    if (!versions.length) return {matches: new Map(), messages: [`No versions listed in ${registryUrl}`], url: registryUrl};
    return {matches: versionsFromList(versions, regex), url: registryUrl};
  }),
};
