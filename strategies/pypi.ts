import {extract, fetchJson, isRecord, versionsFromList} from "./shared.ts";
import type {Strategy} from "./shared.ts";

const nameRes = [
  /^https?:\/\/files\.pythonhosted\.org\/packages\/(?:[^/]+\/)*([^/]+?)-\d[^/]*\.(?:tar\.gz|tar\.bz2|zip|whl)$/i,
  /^https?:\/\/pypi\.(?:org|python\.org)\/(?:project|packages\/source\/[^/]+)\/([^/?#]+)/i,
];

// https://peps.python.org/pep-0503/#normalized-names
export function pypiPackageName(url: string): string | null {
  for (const re of nameRes) {
    const name = re.exec(url)?.[1];
    if (name) return name.toLowerCase().replace(/[-_.]+/g, "-");
  }
  return null;
}

export const pypi: Strategy = {
  name: "pypi",
  priority: 5,
  appliesTo: url => pypiPackageName(url) !== null,
  findVersions: (url, {regex, timeout}, ctx) => extract(url, timeout, async () => {
    const jsonUrl = `${ctx.pypiApiUrl}/pypi/${pypiPackageName(url) ?? ""}/json`;
    const data = await fetchJson(jsonUrl, timeout, ctx);
    const releases = isRecord(data) && isRecord(data.releases) ? data.releases : {};
    // releases without files were yanked or never uploaded
    const versions = Object.entries(releases)
      .filter(([_, files]) => !Array.isArray(files) || files.length > 0)
      .map(([version]) => version);
    return {matches: versionsFromList(versions, regex), url: jsonUrl};
  }),
};
