import {Version, maxVersion, transformVersion} from "./utils/version.ts";
import {preprocessUrl, isGist} from "./utils/url.ts";
import {parseRegex} from "./utils/utils.ts";
import {getStrategy, selectStrategy} from "./strategies/index.ts";
import {fetchLastCommit} from "./strategies/git.ts";
import {fetchErrorMessage} from "./strategies/shared.ts";
import type {StrategyRegistry, StrategyContext} from "./strategies/index.ts";
import type {Package, CheckOutcome, CheckMeta, CheckStatus} from "./types.ts";

export type CheckOpts = {
  ctx: StrategyContext,
  registry: StrategyRegistry,
  /** Epoch milliseconds after which fetches are cut short */
  deadline?: number | null,
  now?: () => number,
};

type LatestResult =
  | {latest: Version, meta: CheckMeta}
  | {latest: null, messages: Array<string>, meta: CheckMeta};

export const unstableVersionKeywords = [
  "alpha",
  "beta",
  "bpo",
  "dev",
  "experimental",
  "prerelease",
  "preview",
  "rc",
];

export const isHeadOnly = (pkg: Package) => Boolean(pkg.head) && !pkg.url;
export const isLivecheckable = (pkg: Package) => pkg.livecheck !== undefined;

export function isUnstable(version: Version): boolean {
  const str = version.toString().toLowerCase();
  return unstableVersionKeywords.some(keyword => str.includes(keyword));
}

function makeOutcome(pkg: Package, status: CheckStatus, fields: Partial<CheckOutcome> = {}): CheckOutcome {
  return {
    name: pkg.name,
    fullName: pkg.fullName ?? pkg.name,
    status,
    outdated: false,
    newerThanUpstream: false,
    messages: [],
    ...fields,
  };
}

export function errorOutcome(pkg: Package, err: unknown): CheckOutcome {
  return makeOutcome(pkg, "error", {
    messages: [err instanceof Error ? err.message : String(err)],
    meta: {livecheckable: isLivecheckable(pkg)},
  });
}

export function skipOutcome(pkg: Package): CheckOutcome | null {
  const meta: CheckMeta = {livecheckable: isLivecheckable(pkg)};
  if (pkg.livecheck?.skip) {
    return makeOutcome(pkg, "skipped", {messages: pkg.livecheck.skipMessage ? [pkg.livecheck.skipMessage] : [], meta});
  }
  if (pkg.url && isGist(pkg.url)) {
    return makeOutcome(pkg, "skipped", {messages: ["Stable URL is a GitHub Gist"], meta});
  }
  if (pkg.deprecated && !meta.livecheckable) return makeOutcome(pkg, "deprecated", {meta});
  if (pkg.versioned && !meta.livecheckable) return makeOutcome(pkg, "versioned", {meta});
  if (isHeadOnly(pkg) && !pkg.installedHead) {
    return makeOutcome(pkg, "error", {messages: ["HEAD only package must be installed to be checked"], meta: {...meta, headOnly: true}});
  }
  return null;
}

export function currentVersion(pkg: Package): Version {
  const {livecheck} = pkg;
  if (livecheck?.version) return Version.parse(livecheck.version);
  if (isHeadOnly(pkg) && pkg.installedHead) return Version.fromCommit(pkg.installedHead);
  if (livecheck?.versionTransform) return Version.parse(transformVersion(pkg.version, livecheck.versionTransform));
  return Version.parse(pkg.version);
}

export function resolveUrlKeyword(pkg: Package, url: string): string | undefined {
  switch (url) {
    case "homepage": return pkg.homepage;
    case "stable": case "url": return pkg.url;
    case "head": return pkg.head;
    default: return url;
  }
}

export function candidateUrls(pkg: Package): Array<string> {
  const urls: Array<string | undefined> = pkg.livecheck?.url ?
    [resolveUrlKeyword(pkg, pkg.livecheck.url)] :
    [pkg.head, pkg.url, ...(pkg.mirrors ?? []), pkg.homepage];
  const ret = new Set<string>();
  for (const url of urls) {
    if (url && !isGist(url)) ret.add(url);
  }
  return Array.from(ret);
}

export function fetchTimeout({ctx, deadline, now = Date.now}: CheckOpts): number {
  if (deadline === undefined || deadline === null) return ctx.fetchTimeout;
  return Math.max(1, Math.min(ctx.fetchTimeout, deadline - now()));
}

// blank regexes count as absent
export function configuredRegex({livecheck}: Package): RegExp | null {
  const regex = livecheck?.regex;
  if (regex === undefined) return null;
  if (regex instanceof RegExp) return regex;
  return regex.trim() ? parseRegex(regex) : null;
}

export async function findLatestVersion(pkg: Package, opts: CheckOpts): Promise<LatestResult> {
  const {ctx, registry} = opts;
  const {livecheck} = pkg;
  const regex = configuredRegex(pkg);
  const explicit = livecheck?.strategy ? getStrategy(registry, livecheck.strategy) : null;
  const urls = candidateUrls(pkg);
  const urlsTried: Array<string> = [];
  const baseMeta: CheckMeta = {livecheckable: isLivecheckable(pkg), urlsTried, ...(regex && {regex: regex.source})};
  const log = (message: string) => ctx.verbose && ctx.logVerbose(`${pkg.name}: ${message}`);

  for (const [index, original] of urls.entries()) {
    const url = explicit?.rawUrl ? original : preprocessUrl(original);
    const {strategy, applicable, reason} = selectStrategy(registry, url, {explicit, regexProvided: regex !== null});
    urlsTried.push(url);
    log(`URL: ${original}`);
    if (url !== original) log(`URL (processed): ${url}`);
    log(`Strategies: ${applicable.map(s => s.name).join(", ") || "none"}`);
    if (!strategy) {
      if (reason) log(reason);
      continue;
    }
    log(`Strategy: ${strategy.name}`);

    const result = await strategy.findVersions(url, {regex, timeout: fetchTimeout(opts)}, ctx);
    const effectiveRegex = result.regex ?? regex;
    const meta: CheckMeta = {
      ...baseMeta,
      url: {original, processed: url, ...(result.url && {strategy: result.url})},
      strategy: strategy.name,
      strategies: applicable.map(s => s.name),
      ...(effectiveRegex && {regex: effectiveRegex.source}),
    };

    if (!result.matches.size && result.messages?.length) {
      for (const message of result.messages) log(message);
      if (index === urls.length - 1) return {latest: null, messages: result.messages, meta};
      continue;
    }

    const versions = Array.from(result.matches.values()).filter(version => {
      if (!version.toString().trim()) return false;
      return livecheck?.allowUnstable || !isUnstable(version);
    });
    log(`Matched versions: ${versions.join(", ") || "none"}`);

    const latest = maxVersion(versions);
    if (latest) return {latest, meta};
  }

  return {latest: null, messages: ["Unable to get versions"], meta: baseMeta};
}

async function checkHead(pkg: Package, current: Version, opts: CheckOpts): Promise<CheckOutcome> {
  const url = preprocessUrl(pkg.head ?? "");
  const timeout = fetchTimeout(opts);
  const meta: CheckMeta = {livecheckable: isLivecheckable(pkg), headOnly: true, url: {original: pkg.head ?? "", processed: url}, strategy: "git"};
  let commit: string;
  try {
    commit = await fetchLastCommit(url, timeout, opts.ctx);
  } catch (err) {
    return makeOutcome(pkg, "error", {current: current.toString(), messages: [fetchErrorMessage(url, err, timeout)], meta});
  }
  // compare against the same abbreviation as the installed commit
  const latest = Version.fromCommit(commit.substring(0, current.toString().length));
  return makeOutcome(pkg, "success", {
    current: current.toString(),
    latest: latest.toString(),
    outdated: !current.equals(latest),
    meta,
  });
}

export async function checkPackage(pkg: Package, opts: CheckOpts): Promise<CheckOutcome> {
  const skipped = skipOutcome(pkg);
  if (skipped) return skipped;

  const current = currentVersion(pkg);
  if (current.isHead) return checkHead(pkg, current, opts);

  const result = await findLatestVersion(pkg, opts);
  if (result.latest === null) {
    return makeOutcome(pkg, "error", {current: current.toString(), messages: result.messages, meta: result.meta});
  }

  let latest = result.latest;
  const release = /^(.+)-release$/i.exec(latest.toString());
  if (release && !/-release$/i.test(current.toString())) {
    latest = Version.parse(release[1]);
  }

  return makeOutcome(pkg, "success", {
    current: current.toString(),
    latest: latest.toString(),
    outdated: current.lt(latest),
    newerThanUpstream: current.gt(latest),
    meta: result.meta,
  });
}
