import {getFetchOpts, throwFetchError, extract, versionsFromList} from "./shared.ts";
import type {Strategy, StrategyContext} from "./shared.ts";

export type GitRef = {
  sha: string,
  ref: string,
};

// git smart http ref advertisement, https://git-scm.com/docs/http-protocol
export function parseRefAdvertisement(data: string): Array<GitRef> {
  const refs: Array<GitRef> = [];
  let pos = 0;
  while (pos + 4 <= data.length) {
    const len = parseInt(data.slice(pos, pos + 4), 16);
    if (Number.isNaN(len)) throw new Error(`Malformed pkt-line at offset ${pos}`);
    if (len < 4) { // flush, delimiter and response-end packets
      pos += 4;
      continue;
    }
    const line = data.slice(pos + 4, pos + len).replace(/\n$/, "");
    pos += len;
    if (line.startsWith("#")) continue;
    const match = /^([0-9a-f]{40,64}) ([^\0]+)/.exec(line);
    if (match) refs.push({sha: match[1], ref: match[2]});
  }
  return refs;
}

export function tagsFromRefs(refs: Array<GitRef>): Array<string> {
  const tags = new Set<string>();
  for (const {ref} of refs) {
    if (!ref.startsWith("refs/tags/")) continue;
    tags.add(ref.substring("refs/tags/".length).replace(/\^\{\}$/, ""));
  }
  return Array.from(tags);
}

export async function fetchRefs(url: string, timeout: number, ctx: StrategyContext): Promise<Array<GitRef>> {
  const refsUrl = `${url.replace(/\/$/, "")}/info/refs?service=git-upload-pack`;
  const res = await ctx.doFetch(refsUrl, getFetchOpts(timeout));
  if (!res.ok) throwFetchError(res, refsUrl);
  return parseRefAdvertisement(Buffer.from(await res.arrayBuffer()).toString("latin1"));
}

export async function fetchLastCommit(url: string, timeout: number, ctx: StrategyContext): Promise<string> {
  const head = (await fetchRefs(url, timeout, ctx)).find(({ref}) => ref === "HEAD");
  if (!head) throw new Error(`No HEAD ref advertised by ${url}`);
  return head.sha;
}

export const git: Strategy = {
  name: "git",
  priority: 8,
  appliesTo: url => /^https?:\/\/[^?#]+\.git\/?$/i.test(url),
  findVersions: (url, {regex, timeout}, ctx) => extract(url, timeout, async () => {
    const tags = tagsFromRefs(await fetchRefs(url, timeout, ctx));
    if (regex) return {matches: versionsFromList(tags, regex)};
    // without a regex, strip anything before the first digit
    const stripped = tags.map(tag => tag.replace(/^\D*/, "")).filter(tag => /^\d/.test(tag));
    return {matches: versionsFromList(stripped, null)};
  }),
};
