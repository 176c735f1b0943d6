import {esc} from "../utils/utils.ts";
import {extract, fetchText, versionsFromText} from "./shared.ts";
import type {Strategy} from "./shared.ts";

const projectRes = [
  /^https?:\/\/(?:ftp|ftpmirror)\.gnu\.org\/(?:gnu\/)?([^/]+)/i,
  /^https?:\/\/(?:www\.)?gnu\.org\/software\/([^/]+)/i,
];

export function gnuProject(url: string): string | null {
  for (const re of projectRes) {
    const project = re.exec(url)?.[1];
    if (project && project !== "gnu") return project;
  }
  return null;
}

export const gnu: Strategy = {
  name: "gnu",
  priority: 5,
  appliesTo: url => gnuProject(url) !== null,
  findVersions: (url, {regex, timeout}, ctx) => extract(url, timeout, async () => {
    const project = gnuProject(url) ?? "";
    const pageUrl = `https://ftp.gnu.org/gnu/${project}/`;
    const effectiveRegex = regex ?? new RegExp(`href=.*?${esc(project)}[._-]v?(\\d+(?:\\.\\d+)*)(?:\\.[a-z]+|/)`, "i");
    const text = await fetchText(pageUrl, timeout, ctx);
    return {matches: versionsFromText(text, effectiveRegex), url: pageUrl, regex: effectiveRegex};
  }),
};
