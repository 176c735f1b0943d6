import restana from "restana";
import {join} from "node:path";
import {mkdtempSync} from "node:fs";
import {writeFile, rm} from "node:fs/promises";
import {tmpdir} from "node:os";
import {run, parseArgs} from "./index.ts";
import {packageVersion} from "./strategies/shared.ts";
import type {Server} from "node:http";

const testDir = mkdtempSync(join(tmpdir(), "upwatch-"));
const packagesFile = join(testDir, "packages.toml");
const headSha = "1234567890abcdef1234567890abcdef12345678";
const tagSha = "fedcba0987654321fedcba0987654321fedcba09";

function pkt(line: string) {
  return `${(line.length + 4).toString(16).padStart(4, "0")}${line}`;
}

const advertisement = [
  pkt("# service=git-upload-pack\n"),
  "0000",
  pkt(`${headSha} HEAD\0multi_ack symref=HEAD:refs/heads/main\n`),
  pkt(`${headSha} refs/heads/main\n`),
  pkt(`${tagSha} refs/tags/v1.0.0\n`),
  pkt(`${tagSha} refs/tags/v1.2.0\n`),
  pkt(`${tagSha} refs/tags/v1.10.0\n`),
  pkt(`${tagSha} refs/tags/v2.0.0-rc1\n`),
  "0000",
].join("");

const page = `<a href="widget-3.4.tar.gz">widget-3.4.tar.gz</a>\n<a href="widget-3.5.tar.gz">widget-3.5.tar.gz</a>\n`;

let server: Server;
let baseUrl: string;
let refsRequests = 0;
let requests: Array<string> = [];

beforeAll(async () => {
  const service = restana({defaultRoute: (_req, res) => res.send(404)});
  service.get("/example/tool.git/info/refs", (_req, res) => {
    refsRequests++;
    requests.push("refs");
    res.send(advertisement);
  });
  service.get("/downloads", (_req, res) => {
    requests.push("downloads");
    res.send(page);
  });
  server = await service.start(0);

  const address = server.address();
  if (!address || typeof address === "string") throw new Error("Server has no port");
  baseUrl = `http://127.0.0.1:${address.port}`;

  await writeFile(packagesFile, String.raw`
[[packages]]
name = "tool"
version = "1.2.0"
url = "${baseUrl}/example/tool.git"

[[packages]]
name = "widget"
version = "3.5"
url = "${baseUrl}/files/widget-3.5.tar.gz"

[packages.livecheck]
url = "${baseUrl}/downloads"
regex = 'widget-(\d+(?:\.\d+)+)\.tar'

[[packages]]
name = "edge"
version = "HEAD"
head = "${baseUrl}/example/tool.git"
installed_head = "abcdef0"

[[packages]]
name = "legacy"
version = "0.9"
url = "${baseUrl}/files/legacy-0.9.tar.gz"

[packages.livecheck]
skip = true
skip_message = "No longer developed"

[[packages]]
name = "broken"
version = "1.0"
url = "${baseUrl}/missing.git"
`);
});

afterAll(async () => {
  await new Promise(resolve => server?.close(resolve));
  await rm(testDir, {recursive: true, force: true});
});

beforeEach(() => {
  refsRequests = 0;
  requests = [];
});

test("human output", async () => {
  const {output, exitCode} = await run(["-f", packagesFile, "--no-color"], {config: {}});
  expect(output.split("\n")).toEqual([
    `broken : error - Unable to fetch ${baseUrl}/missing.git: Received 404 Not Found from ${baseUrl}/missing.git/info/refs?service=git-upload-pack`,
    "edge : abcdef0 ==> 1234567",
    "legacy : skipped - No longer developed",
    "tool : 1.2.0 ==> 1.10.0",
    "widget : 3.5 ==> 3.5",
  ]);
  expect(exitCode).toBe(1);
});

test("json output", async () => {
  const {output, exitCode} = await run(["-f", packagesFile, "-j", "tool", "widget"], {config: {}});
  expect(JSON.parse(output)).toEqual([
    {name: "tool", status: "success", current: "1.2.0", latest: "1.10.0", outdated: true, newer_than_upstream: false},
    {name: "widget", status: "success", current: "3.5", latest: "3.5", outdated: false, newer_than_upstream: false},
  ]);
  expect(exitCode).toBe(0);
});

test("ndjson output", async () => {
  const {output} = await run(["-f", packagesFile, "--ndjson", "legacy"], {config: {}});
  expect(output).toBe(`{"name":"legacy","status":"skipped","messages":["No longer developed"]}`);
});

test("newer only and error on outdated", async () => {
  const {output, exitCode} = await run(["-f", packagesFile, "--no-color", "-N", "-E", "-e", "broken,edge"], {config: {}});
  expect(output.split("\n")).toEqual([
    "legacy : skipped - No longer developed",
    "tool : 1.2.0 ==> 1.10.0",
  ]);
  expect(exitCode).toBe(2);
});

test("include and exclude from config", async () => {
  const {output} = await run(["-f", packagesFile, "--no-color"], {config: {include: ["t*", "w*"], exclude: ["widget"]}});
  expect(output).toBe("tool : 1.2.0 ==> 1.10.0");
});

test("cache", async () => {
  const cacheFile = join(testDir, "cache", "results.json");
  const args = ["-f", packagesFile, "--no-color", "--cache-file", cacheFile, "tool"];

  expect((await run(args, {config: {}})).output).toBe("tool : 1.2.0 ==> 1.10.0");
  expect(refsRequests).toBe(1);

  expect((await run(args, {config: {}})).output).toBe("tool : 1.2.0 ==> 1.10.0 (from cache)");
  expect(refsRequests).toBe(1);

  expect((await run([...args, "--refresh"], {config: {}})).output).toBe("tool : 1.2.0 ==> 1.10.0");
  expect(refsRequests).toBe(2);
});

test("cached runs check never checked packages first", async () => {
  const cacheFile = join(testDir, "schedule", "results.json");
  const args = ["-f", packagesFile, "--no-color", "--cache-file", cacheFile, "-c", "1"];
  await run([...args, "tool"], {config: {}});
  expect(requests).toEqual(["refs"]);

  requests = [];
  const {output} = await run([...args, "--refresh", "tool", "widget"], {config: {}});
  expect(requests).toEqual(["downloads", "refs"]);
  expect(output.split("\n")).toEqual([
    "tool : 1.2.0 ==> 1.10.0",
    "widget : 3.5 ==> 3.5",
  ]);
});

test("aborted run leaves packages unchecked", async () => {
  const controller = new AbortController();
  controller.abort();
  const {output} = await run(["-f", packagesFile, "--no-color", "tool"], {config: {}, signal: controller.signal});
  expect(output).toBe("tool : not checked");
  expect(refsRequests).toBe(0);
});

test("no matching packages", async () => {
  expect((await run(["-f", packagesFile, "nothing"], {config: {}})).output).toBe("No packages found, nothing to do.");
  expect((await run(["-f", packagesFile, "-j", "nothing"], {config: {}})).output).toBe(`{"message":"No packages found, nothing to do."}`);
});

test("errors", async () => {
  await expect(run(["-f", join(testDir, "missing.toml")], {config: {}})).rejects.toThrow(`Unable to open ${join(testDir, "missing.toml")}`);
  await expect(run(["-f", packagesFile, "-c", "many"], {config: {}})).rejects.toThrow("Invalid value for --concurrency: many");
  await expect(run(["-f", packagesFile, "-c", "2.5"], {config: {}})).rejects.toThrow("Invalid value for --concurrency: 2.5");
});

test("help and version", async () => {
  expect((await run(["-h"], {config: {}})).output).toMatch(/^usage: upwatch \[options\] \[package\.\.\.\]/);
  expect(await run(["-v"], {config: {}})).toEqual({output: packageVersion, exitCode: 0});
});

test("parseArgs", () => {
  const args = parseArgs(["--no-color", "-f", "a.toml", "-f", "b.toml", "-V", "pkg"]);
  expect(args.color).toBe(false);
  expect(args.file).toEqual(["a.toml", "b.toml"]);
  expect(args.verbose).toBe(true);
  expect(args._).toEqual(["pkg"]);
});
