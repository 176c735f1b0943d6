type Token = {
  numeric: boolean,
  value: string,
};

export type VersionTransform =
  | "major"
  | "minor"
  | "patch"
  | "major_minor"
  | "major_minor_patch"
  | "before_comma"
  | "after_comma"
  | "before_colon"
  | "after_colon"
  | "no_dots"
  | "dots_to_underscores"
  | "dots_to_hyphens";

export const versionTransforms: ReadonlyArray<VersionTransform> = [
  "major",
  "minor",
  "patch",
  "major_minor",
  "major_minor_patch",
  "before_comma",
  "after_comma",
  "before_colon",
  "after_colon",
  "no_dots",
  "dots_to_underscores",
  "dots_to_hyphens",
];

const tokenRe = /\d+|[a-z]+/gi;

export class VersionComparisonError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "VersionComparisonError";
  }
}

function tokenize(raw: string): Array<Token> {
  const tokens: Array<Token> = [];
  for (const [match] of raw.trim().replace(/^v(?=\d)/i, "").matchAll(tokenRe)) {
    if (/^\d/.test(match)) {
      tokens.push({numeric: true, value: match.replace(/^0+(?=\d)/, "")});
    } else {
      tokens.push({numeric: false, value: match.toLowerCase()});
    }
  }

  // 1.0 and 1.0.0 are the same version
  while (tokens.length > 1 && tokens.at(-1)?.numeric && tokens.at(-1)?.value === "0") {
    tokens.pop();
  }

  if (!tokens.length) tokens.push({numeric: false, value: raw});
  return tokens;
}

// padding < text < numeric
function compareTokens(a: Token | undefined, b: Token | undefined): -1 | 0 | 1 {
  if (!a && !b) return 0;
  if (!a) return -1;
  if (!b) return 1;
  if (a.numeric !== b.numeric) return a.numeric ? 1 : -1;
  if (a.numeric && a.value.length !== b.value.length) {
    return a.value.length < b.value.length ? -1 : 1;
  }
  if (a.value === b.value) return 0;
  return a.value < b.value ? -1 : 1;
}

export class Version {
  readonly raw: string;
  readonly commit: string | null;
  readonly tokens: ReadonlyArray<Token>;

  private constructor(raw: string, commit: string | null) {
    this.raw = raw;
    this.commit = commit;
    this.tokens = commit === null ? tokenize(raw) : [];
  }

  static parse(raw: string): Version {
    return new Version(raw, null);
  }

  /** A version that identifies a HEAD build by its commit id */
  static fromCommit(commit: string): Version {
    return new Version(commit, commit);
  }

  get isHead(): boolean {
    return this.commit !== null;
  }

  compare(other: Version): -1 | 0 | 1 {
    if (this.isHead || other.isHead) {
      throw new VersionComparisonError(`Cannot order HEAD version ${this.isHead ? this : other} against ${this.isHead ? other : this}`);
    }
    const length = Math.max(this.tokens.length, other.tokens.length);
    for (let i = 0; i < length; i++) {
      const result = compareTokens(this.tokens[i], other.tokens[i]);
      if (result !== 0) return result;
    }
    return 0;
  }

  equals(other: Version): boolean {
    if (this.isHead || other.isHead) return this.commit === other.commit;
    return this.compare(other) === 0;
  }

  lt(other: Version): boolean {
    return this.compare(other) < 0;
  }

  gt(other: Version): boolean {
    return this.compare(other) > 0;
  }

  toString(): string {
    return this.raw;
  }

  toJSON(): string {
    return this.raw;
  }
}

export function maxVersion(versions: Iterable<Version>): Version | null {
  let max: Version | null = null;
  for (const version of versions) {
    if (!max || version.gt(max)) max = version;
  }
  return max;
}

export function isVersionTransform(str: string): str is VersionTransform {
  return versionTransforms.some(transform => transform === str);
}

export function transformVersion(raw: string, transform: VersionTransform): string {
  const parts = raw.split(/[._-]/);
  switch (transform) {
    case "major": return parts[0];
    case "minor": return parts[1] ?? "";
    case "patch": return parts[2] ?? "";
    case "major_minor": return parts.slice(0, 2).join(".");
    case "major_minor_patch": return parts.slice(0, 3).join(".");
    case "before_comma": return raw.split(",")[0];
    case "after_comma": return raw.split(",").slice(1).join(",");
    case "before_colon": return raw.split(":")[0];
    case "after_colon": return raw.split(":").slice(1).join(":");
    case "no_dots": return raw.replaceAll(".", "");
    case "dots_to_underscores": return raw.replaceAll(".", "_");
    case "dots_to_hyphens": return raw.replaceAll(".", "-");
  }
}
