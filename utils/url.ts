import {dirname} from "node:path/posix";

// github urls that do not follow the usual repository layout
export const githubSpecialCases = [
  "api.github.com",
  "/latest",
  "mednafen",
  "camlp5",
  "kotlin",
  "osrm-backend",
  "prometheus",
  "pyenv-virtualenv",
  "sysdig",
  "shairport-sync",
  "yuicompressor",
];

const githubRepoRe = /^(?:[a-z]+:\/\/)?github\.com\/[^/#?]+\/[^/#?]+/i;

type RewriteRule = {
  test: RegExp,
  rewrite: (url: string) => string,
};

const githubRules: Array<RewriteRule> = [
  {test: /\/archive\//, rewrite: url => url.replace(/\/archive\/.*/, ".git")},
  {test: /\/releases\.atom$/, rewrite: url => url.replace(/\/releases\.atom$/, ".git")},
  {test: /\/releases\//, rewrite: url => url.replace(/\/releases\/.*/, ".git")},
  {test: /\/downloads\//, rewrite: url => `${dirname(url.replace(/\/downloads(\/.*)/, "$1"))}.git`},
];

export function isGist(url: string): boolean {
  return /gist\.github\.com/i.test(url);
}

export function isGithubUrl(url: string): boolean {
  return /^(?:[a-z]+:\/\/)?github\.com\//i.test(url);
}

// rewrite forge download urls to their repository so that the git strategy applies
export function preprocessUrl(url: string): string {
  url = url.replaceAll("github.s3.amazonaws.com", "github.com");

  if (isGithubUrl(url) && !githubSpecialCases.some(str => url.includes(str))) {
    if (url.endsWith(".git")) return url;
    for (const {test, rewrite} of githubRules) {
      if (test.test(url)) return rewrite(url);
    }
    const repoUrl = githubRepoRe.exec(url)?.[0];
    if (!repoUrl) return url;
    return repoUrl.endsWith(".git") ? repoUrl : `${repoUrl}.git`;
  }

  if (/\/-\/archive\//.test(url)) {
    return url.replace(/\/-\/archive\/.*/, ".git");
  }

  return url;
}
