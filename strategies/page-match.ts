import {extract, fetchText, versionsFromText} from "./shared.ts";
import type {Strategy} from "./shared.ts";

export const pageMatch: Strategy = {
  name: "page_match",
  priority: 1,
  requiresRegex: true,
  rawUrl: true,
  appliesTo: url => /^https?:\/\//i.test(url),
  findVersions: (url, {regex, timeout}, ctx) => extract(url, timeout, async () => {
    if (!regex) return {matches: new Map(), messages: [`A regex is required to match versions on ${url}`]};
    return {matches: versionsFromText(await fetchText(url, timeout, ctx), regex)};
  }),
};
