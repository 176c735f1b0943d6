import {env} from "node:process";
import {Version} from "../utils/version.ts";
import pkg from "../package.json" with {type: "json"};

export type StrategyContext = {
  fetchTimeout: number,
  forgeApiUrl: string,
  pypiApiUrl: string,
  npmRegistry: string | null,
  doFetch: (url: string, opts?: RequestInit) => Promise<Response>,
  verbose: boolean,
  logVerbose: (message: string) => void,
};

export type FindVersionsOpts = {
  regex: RegExp | null,
  timeout: number,
};

export type ExtractionResult = {
  matches: Map<string, Version>,
  messages?: Array<string>,
  /** URL that was actually fetched, when it differs from the candidate */
  url?: string,
  /** Regex that was actually applied, when it differs from the configured one */
  regex?: RegExp,
};

export type Strategy = {
  name: string,
  priority: number,
  /** Only applicable when a regex is provided */
  requiresRegex?: boolean,
  /** Candidate URLs are used as-is when this strategy is chosen explicitly */
  rawUrl?: boolean,
  appliesTo: (url: string) => boolean,
  findVersions: (url: string, opts: FindVersionsOpts, ctx: StrategyContext) => Promise<ExtractionResult>,
};

export const packageVersion = pkg.version;
export const defaultFetchTimeout = 5000;

export function getFetchOpts(timeout: number, authType?: string, authToken?: string): RequestInit {
  return {
    signal: AbortSignal.timeout(timeout),
    headers: {
      "user-agent": `upwatch/${packageVersion}`,
      "accept-encoding": "gzip, deflate, br",
      ...(authToken && {Authorization: `${authType} ${authToken}`}),
    },
  };
}

export function isTimeoutError(err: unknown): boolean {
  return typeof err === "object" && err !== null && "name" in err && err.name === "TimeoutError";
}

export function throwFetchError(res: Response, url: string): never {
  throw new Error(`Received ${res.status} ${res.statusText} from ${url}`);
}

export async function fetchText(url: string, timeout: number, ctx: StrategyContext, opts?: RequestInit): Promise<string> {
  const res = await ctx.doFetch(url, {...getFetchOpts(timeout), ...opts});
  if (!res.ok) throwFetchError(res, url);
  return res.text();
}

export async function fetchJson(url: string, timeout: number, ctx: StrategyContext, opts?: RequestInit): Promise<unknown> {
  const res = await ctx.doFetch(url, {...getFetchOpts(timeout), ...opts});
  if (!res.ok) throwFetchError(res, url);
  return res.json();
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function fetchErrorMessage(url: string, err: unknown, timeout: number): string {
  const reason = isTimeoutError(err) ? `timed out after ${timeout}ms` : err instanceof Error ? err.message : String(err);
  return `Unable to fetch ${url}: ${reason}`;
}

// fetch failures are reported through messages, never thrown
export async function extract(url: string, timeout: number, fn: () => Promise<ExtractionResult>): Promise<ExtractionResult> {
  try {
    return await fn();
  } catch (err) {
    return {matches: new Map(), messages: [fetchErrorMessage(url, err, timeout)]};
  }
}

export function globalRegex(regex: RegExp): RegExp {
  return regex.flags.includes("g") ? new RegExp(regex.source, regex.flags) : new RegExp(regex.source, `${regex.flags}g`);
}

// first capture group when present, the whole match otherwise
export function versionsFromText(text: string, regex: RegExp): Map<string, Version> {
  const matches = new Map<string, Version>();
  for (const match of text.matchAll(globalRegex(regex))) {
    const str = (match.length > 1 ? match[1] : match[0])?.trim();
    if (str && !matches.has(str)) matches.set(str, Version.parse(str));
  }
  return matches;
}

export function versionsFromList(list: Iterable<string>, regex: RegExp | null): Map<string, Version> {
  const matches = new Map<string, Version>();
  for (const item of list) {
    let str: string | undefined = item;
    if (regex) {
      const match = new RegExp(regex.source, regex.flags.replace("g", "")).exec(item);
      str = match ? (match.length > 1 ? match[1] : match[0]) : undefined;
    }
    if (str && !matches.has(str)) matches.set(str, Version.parse(str));
  }
  return matches;
}

const forgeTokensByHost = new Map<string, string>();
if (env.UPWATCH_FORGE_TOKENS) {
  for (const entry of env.UPWATCH_FORGE_TOKENS.split(",")) {
    const sep = entry.indexOf(":");
    if (sep > 0) {
      forgeTokensByHost.set(entry.substring(0, sep), entry.substring(sep + 1));
    }
  }
}

export function getForgeToken(url: string): string | undefined {
  if (URL.canParse(url)) {
    const hostToken = forgeTokensByHost.get(new URL(url).hostname);
    if (hostToken) return hostToken;
  }
  return env.UPWATCH_GITHUB_API_TOKEN || env.GITHUB_API_TOKEN || env.GH_TOKEN || env.GITHUB_TOKEN;
}

export function fetchForge(url: string, timeout: number, ctx: StrategyContext): Promise<unknown> {
  const token = getForgeToken(url);
  return fetchJson(url, timeout, ctx, token ? getFetchOpts(timeout, "Bearer", token) : undefined);
}
