import {Version, VersionComparisonError, maxVersion, transformVersion, isVersionTransform} from "./version.ts";

const v = (str: string) => Version.parse(str);

test("parse", () => {
  expect(v("1.2.3").toString()).toBe("1.2.3");
  expect(v("v1.2.3").tokens).toEqual(v("1.2.3").tokens);
  expect(v("1.02").tokens).toEqual([{numeric: true, value: "1"}, {numeric: true, value: "2"}]);
  expect(v("2.0-RC1").tokens).toEqual([
    {numeric: true, value: "2"},
    {numeric: true, value: "0"},
    {numeric: false, value: "rc"},
    {numeric: true, value: "1"},
  ]);
  expect(v("---").tokens).toEqual([{numeric: false, value: "---"}]);
  expect(v("").tokens).toEqual([{numeric: false, value: ""}]);
  expect(v("0").tokens).toEqual([{numeric: true, value: "0"}]);
  expect(v("version").isHead).toBe(false);
});

test("compare", () => {
  expect(v("1.2.0").lt(v("1.3.0"))).toBe(true);
  expect(v("1.10").gt(v("1.9"))).toBe(true);
  expect(v("2.0.0-beta").gt(v("1.9.0"))).toBe(true);
  expect(v("1.0").equals(v("1.0.0"))).toBe(true);
  expect(v("v2.1").equals(v("2.1"))).toBe(true);
  expect(v("1.0").lt(v("1.0.1"))).toBe(true);
  expect(v("1.a").lt(v("1.1"))).toBe(true);
  expect(v("1.0a").lt(v("1.0b"))).toBe(true);
  expect(v("3.4").compare(v("3.4"))).toBe(0);
  expect(v("123456789012345678901234567890").gt(v("123456789012345678901234567889"))).toBe(true);
});

test("compare is antisymmetric and transitive", () => {
  const versions = ["1.0", "1.0.1", "1.0-beta", "1.a", "2", "10", "2.0.0-rc1", "0.9", "abc", "v1.1"].map(v);
  for (const a of versions) {
    expect(a.compare(a)).toBe(0);
    for (const b of versions) {
      expect(a.compare(b)).toBe(-b.compare(a) || 0);
      for (const c of versions) {
        if (a.compare(b) < 0 && b.compare(c) < 0) expect(a.compare(c)).toBe(-1);
      }
    }
  }
});

test("head versions", () => {
  const head = Version.fromCommit("abc1234");
  expect(head.isHead).toBe(true);
  expect(head.toString()).toBe("abc1234");
  expect(head.equals(Version.fromCommit("abc1234"))).toBe(true);
  expect(head.equals(Version.fromCommit("def5678"))).toBe(false);
  expect(head.equals(v("1.0"))).toBe(false);
  expect(() => head.compare(v("1.0"))).toThrow(VersionComparisonError);
  expect(() => v("1.0").lt(head)).toThrow("Cannot order HEAD version abc1234 against 1.0");
});

test("maxVersion", () => {
  expect(maxVersion([v("1.2"), v("1.10"), v("1.9")])?.toString()).toBe("1.10");
  expect(maxVersion([])).toBe(null);
});

test("transformVersion", () => {
  expect(transformVersion("1.2.3", "major")).toBe("1");
  expect(transformVersion("1.2.3", "minor")).toBe("2");
  expect(transformVersion("1.2.3", "patch")).toBe("3");
  expect(transformVersion("1.2.3.4", "major_minor")).toBe("1.2");
  expect(transformVersion("1.2.3-4", "major_minor_patch")).toBe("1.2.3");
  expect(transformVersion("1.2,4567", "before_comma")).toBe("1.2");
  expect(transformVersion("1.2,4567", "after_comma")).toBe("4567");
  expect(transformVersion("2.0:beta", "before_colon")).toBe("2.0");
  expect(transformVersion("2.0:beta", "after_colon")).toBe("beta");
  expect(transformVersion("1.2.3", "no_dots")).toBe("123");
  expect(transformVersion("1.2.3", "dots_to_underscores")).toBe("1_2_3");
  expect(transformVersion("1.2.3", "dots_to_hyphens")).toBe("1-2-3");
  expect(isVersionTransform("major")).toBe(true);
  expect(isVersionTransform("nope")).toBe(false);
});
