import type {VersionTransform} from "./utils/version.ts";

export type LivecheckConfig = {
  /** URL to check, or one of "homepage", "stable", "url", "head" */
  url?: string,
  /** Name of the strategy to use */
  strategy?: string,
  regex?: string | RegExp,
  skip?: boolean,
  skipMessage?: string,
  /** Current version to compare against instead of the declared one */
  version?: string,
  versionTransform?: VersionTransform,
  allowUnstable?: boolean,
};

export type Package = {
  name: string,
  /** Namespace-qualified name, used as the cache key */
  fullName?: string,
  version: string,
  homepage?: string,
  /** Stable download URL */
  url?: string,
  mirrors?: Array<string>,
  /** HEAD repository URL */
  head?: string,
  /** Commit of an installed HEAD build */
  installedHead?: string,
  deprecated?: boolean,
  versioned?: boolean,
  livecheck?: LivecheckConfig,
};

export type CheckStatus = "success" | "error" | "skipped" | "deprecated" | "versioned";

export type CheckMeta = {
  livecheckable: boolean,
  headOnly?: boolean,
  url?: {
    original: string,
    processed?: string,
    strategy?: string,
  },
  strategy?: string,
  strategies?: Array<string>,
  regex?: string,
  urlsTried?: Array<string>,
};

export type CheckOutcome = {
  name: string,
  fullName: string,
  status: CheckStatus,
  current?: string,
  latest?: string,
  outdated: boolean,
  newerThanUpstream: boolean,
  messages: Array<string>,
  meta?: CheckMeta,
};
