export const esc = (str: string) => str.replace(/[|\\{}()[\]^$+*?.-]/g, "\\$&");
export const normalizeUrl = (url: string) => url.endsWith("/") ? url.substring(0, url.length - 1) : url;

export function matchesAny(str: string, set: Set<RegExp>): boolean {
  for (const re of set) {
    if (re.test(str)) return true;
  }
  return false;
}

export function commaSeparatedToArray(str: string): Array<string> {
  return str.split(",").map(s => s.trim()).filter(Boolean);
}

export function globToRegex(glob: string, insensitive: boolean): RegExp {
  return new RegExp(`^${esc(glob).replaceAll("\\*", ".*")}$`, insensitive ? "i" : "");
}

// convert arg from cli or config to regex, /slashed/ args are regexes, others are globs
export function argToRegex(arg: string | RegExp, insensitive: boolean): RegExp {
  if (arg instanceof RegExp) return arg;
  return /^\/.+\/$/.test(arg) ? new RegExp(arg.slice(1, -1)) : globToRegex(arg, insensitive);
}

export function matchersToRegexSet(cliArgs: Array<string>, configArgs: Array<string | RegExp>): Set<RegExp> {
  const ret = new Set<RegExp>();
  for (const arg of [...cliArgs, ...configArgs]) {
    ret.add(argToRegex(arg, true));
  }
  return ret;
}

export function canInclude(name: string, include: Set<RegExp>, exclude: Set<RegExp>): boolean {
  if (matchesAny(name, exclude)) return false;
  return include.size ? matchesAny(name, include) : true;
}

// parse a regex from a package list, "/re/flags" or a bare pattern which matches case-insensitively
export function parseRegex(str: string): RegExp {
  const match = /^\/(.+)\/([dgimsuy]*)$/s.exec(str);
  try {
    return match ? new RegExp(match[1], match[2]) : new RegExp(str, "i");
  } catch (err) {
    throw new Error(`Invalid regex ${str}`, {cause: err});
  }
}

export function timestamp(): string {
  const date = new Date();
  return [
    date.getFullYear(),
    "-",
    String(date.getMonth() + 1).padStart(2, "0"),
    "-",
    String(date.getDate()).padStart(2, "0"),
    " ",
    String(date.getHours()).padStart(2, "0"),
    ":",
    String(date.getMinutes()).padStart(2, "0"),
    ":",
    String(date.getSeconds()).padStart(2, "0"),
  ].join("");
}

export function logVerbose(message: string): void {
  console.error(`${timestamp()} ${message}`);
}

const durationUnits: Record<string, number> = {y: 365, m: 30, w: 7, d: 1, h: 1 / 24, s: 1 / 86400};

// returns days
export function parseDuration(str: string): number {
  const match = /^(\d+(?:\.\d+)?)\s*([a-z])$/i.exec(str);
  if (match) {
    const [, num, unit] = match;
    const multiplier = durationUnits[unit.toLowerCase()];
    if (multiplier) return Number(num) * multiplier;
  }
  const num = Number(str);
  if (!str || !Number.isFinite(num)) throw new Error(`Invalid duration: ${str}`);
  return num;
}

export function shuffle<T>(items: Array<T>, random: () => number = Math.random): Array<T> {
  const ret = [...items];
  for (let i = ret.length - 1; i > 0; i--) {
    const j = Math.floor(random() * (i + 1));
    [ret[i], ret[j]] = [ret[j], ret[i]];
  }
  return ret;
}
