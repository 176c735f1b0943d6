import {timerel} from "timerel";
import type {BatchEntry} from "./batch.ts";
import type {CheckMeta, CheckStatus} from "./types.ts";

type Colorize = (text: string) => string;

export type Colors = {
  blue: Colorize,
  red: Colorize,
  green: Colorize,
  magenta: Colorize,
};

export type ReportOpts = {
  fullName?: boolean,
  verbose?: boolean,
  newerOnly?: boolean,
  colors?: Colors,
};

export type ReportRecord = {
  name: string,
  status: CheckStatus | "unchecked",
  current?: string,
  latest?: string,
  outdated?: boolean,
  newer_than_upstream?: boolean,
  messages?: Array<string>,
  cached?: boolean,
  meta?: CheckMeta,
};

export const plainColors: Colors = {blue: String, red: String, green: String, magenta: String};

export const noNewerVersionsMessage = "No newer upstream versions.";

export function filterEntries(entries: Array<BatchEntry>, {newerOnly = false}: ReportOpts = {}): Array<BatchEntry> {
  if (!newerOnly) return entries;
  return entries.filter(({outcome}) => outcome?.status !== "success" || outcome.outdated);
}

const displayName = (entry: BatchEntry, fullName: boolean) => fullName ? entry.fullName : entry.name;

export function toRecord(entry: BatchEntry, {fullName = false, verbose = false}: ReportOpts = {}): ReportRecord {
  const name = displayName(entry, fullName);
  const {outcome} = entry;
  if (!outcome) return {name, status: "unchecked"};

  const record: ReportRecord = {name, status: outcome.status};
  if (outcome.current !== undefined) record.current = outcome.current;
  if (outcome.status === "success") {
    record.latest = outcome.latest;
    record.outdated = outcome.outdated;
    record.newer_than_upstream = outcome.newerThanUpstream;
  }
  if (outcome.messages.length) record.messages = outcome.messages;
  if (entry.cached) record.cached = true;
  if (verbose && outcome.meta) record.meta = outcome.meta;
  return record;
}

export function formatLine(entry: BatchEntry, {fullName = false, verbose = false, colors = plainColors}: ReportOpts = {}): string {
  const {outcome} = entry;
  const name = displayName(entry, fullName);
  if (!outcome) return `${name} : not checked`;

  const messages = outcome.messages.length ? ` - ${outcome.messages.join(", ")}` : "";
  switch (outcome.status) {
    case "skipped": return `${colors.red(name)} : skipped${messages}`;
    case "deprecated": return `${colors.red(name)} : deprecated`;
    case "versioned": return `${colors.red(name)} : versioned`;
    case "error": return `${colors.red(name)} : error${messages}`;
    case "success": {
      const guessed = verbose && !outcome.meta?.livecheckable ? " (guessed)" : "";
      const current = outcome.newerThanUpstream ? colors.red(outcome.current ?? "") : outcome.current ?? "";
      const latest = outcome.outdated ? colors.green(outcome.latest ?? "") : outcome.latest ?? "";
      let cached = "";
      if (entry.cached) {
        cached = verbose && entry.checkedAt ? ` (from cache, checked ${timerel(entry.checkedAt)})` : " (from cache)";
      }
      return `${colors.blue(name)}${guessed} : ${current} ==> ${latest}${cached}`;
    }
  }
}

export function formatHuman(entries: Array<BatchEntry>, opts: ReportOpts = {}): string {
  const filtered = filterEntries(entries, opts);
  if (opts.newerOnly && !filtered.some(({outcome}) => outcome?.status === "success")) {
    return [...filtered.map(entry => formatLine(entry, opts)), noNewerVersionsMessage].join("\n");
  }
  return filtered.map(entry => formatLine(entry, opts)).join("\n");
}

export function formatJson(entries: Array<BatchEntry>, opts: ReportOpts = {}): string {
  return JSON.stringify(filterEntries(entries, opts).map(entry => toRecord(entry, opts)), null, 2);
}

export function formatJsonLines(entries: Array<BatchEntry>, opts: ReportOpts = {}): string {
  return filterEntries(entries, opts).map(entry => JSON.stringify(toRecord(entry, opts))).join("\n");
}
