import {extract, fetchForge, isRecord, versionsFromList} from "./shared.ts";
import type {Strategy} from "./shared.ts";

const repoRe = /^(?:[a-z]+:\/\/)?github\.com\/([^/#?]+)\/([^/#?]+?)(?:\.git)?(?:[/#?].*)?$/i;
const defaultRegex = /v?(\d+(?:\.\d+)+)/i;

export function parseGithubRepo(url: string): {owner: string, repo: string} | null {
  const match = repoRe.exec(url);
  return match ? {owner: match[1], repo: match[2]} : null;
}

export const githubLatest: Strategy = {
  name: "github_latest",
  priority: 0,
  appliesTo: url => parseGithubRepo(url) !== null,
  findVersions: (url, {regex, timeout}, ctx) => extract(url, timeout, async () => {
    const parsed = parseGithubRepo(url);
    if (!parsed) return {matches: new Map(), messages: [`Not a GitHub repository URL: ${url}`]};
    const apiUrl = `${ctx.forgeApiUrl}/repos/${parsed.owner}/${parsed.repo}/releases/latest`;
    const data = await fetchForge(apiUrl, timeout, ctx);
    const tag = isRecord(data) && typeof data.tag_name === "string" ? data.tag_name : null;
    if (!tag) return {matches: new Map(), messages: [`No release tag in ${apiUrl}`], url: apiUrl};
    return {matches: versionsFromList([tag], regex ?? defaultRegex), url: apiUrl, regex: regex ?? defaultRegex};
  }),
};
