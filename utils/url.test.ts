import {preprocessUrl, isGist, isGithubUrl} from "./url.ts";

const cases: Array<[string, string]> = [
  ["https://github.com/example/tool/archive/v1.2.3.tar.gz", "https://github.com/example/tool.git"],
  ["https://github.com/example/tool/archive/refs/tags/v1.2.3.tar.gz", "https://github.com/example/tool.git"],
  ["https://github.com/example/tool/releases/download/v1.2.3/tool-1.2.3.tar.gz", "https://github.com/example/tool.git"],
  ["https://github.com/example/tool/releases.atom", "https://github.com/example/tool.git"],
  ["https://github.com/downloads/example/tool/tool-1.0.tar.gz", "https://github.com/example/tool.git"],
  ["https://github.s3.amazonaws.com/downloads/example/tool/tool-1.0.tar.gz", "https://github.com/example/tool.git"],
  ["https://github.com/example/tool", "https://github.com/example/tool.git"],
  ["https://github.com/example/tool/", "https://github.com/example/tool.git"],
  ["https://github.com/example/tool/tree/main/docs", "https://github.com/example/tool.git"],
  ["https://github.com/example/tool#readme", "https://github.com/example/tool.git"],
  ["https://github.com/example/tool.git", "https://github.com/example/tool.git"],
  ["https://gitlab.com/group/project/-/archive/v2.0/project-v2.0.tar.gz", "https://gitlab.com/group/project.git"],
];

const unchanged = [
  "https://github.com/example/tool/releases/latest",
  "https://api.github.com/repos/example/tool/releases",
  "https://github.com/prometheus/prometheus/archive/v2.0.0.tar.gz",
  "https://github.com/example",
  "https://example.com/downloads/tool-1.0.tar.gz",
  "https://ftp.gnu.org/gnu/hello/hello-2.12.tar.gz",
];

const mirrored = [
  "https://example.com/?a=github.s3.amazonaws.com&b=github.s3.amazonaws.com",
  "https://github.s3.amazonaws.com/x?u=github.s3.amazonaws.com",
];

test("preprocessUrl", () => {
  for (const [url, expected] of cases) {
    expect(preprocessUrl(url)).toBe(expected);
  }
  for (const url of unchanged) {
    expect(preprocessUrl(url)).toBe(url);
  }
});

test("preprocessUrl is idempotent", () => {
  for (const url of [...cases.map(([url]) => url), ...unchanged, ...mirrored]) {
    const once = preprocessUrl(url);
    expect(preprocessUrl(once)).toBe(once);
  }
});

test("preprocessUrl rewrites every s3 host", () => {
  expect(preprocessUrl(mirrored[0])).toBe("https://example.com/?a=github.com&b=github.com");
  expect(preprocessUrl(mirrored[1])).toBe("https://github.com/x?u=github.com");
});

test("isGist", () => {
  expect(isGist("https://gist.github.com/example/0123abcd/raw/tool.sh")).toBe(true);
  expect(isGist("https://github.com/example/tool")).toBe(false);
});

test("isGithubUrl", () => {
  expect(isGithubUrl("https://github.com/example/tool")).toBe(true);
  expect(isGithubUrl("https://gitlab.com/example/tool")).toBe(false);
});
