import { readFile } from "node:fs/promises";
import { describe, expect, it } from "vitest";
import { aggregate, resolvePublicUrl } from "@monthly-digest/core";
import { formatHeading, formatItem, renderMonthlyDigest } from "../src/index.js";

async function readGoldenFile(name: string): Promise<string> {
  const url = new URL(`./fixtures/${name}`, import.meta.url);
  const raw = await readFile(url, "utf-8");
  return raw.replace(/\r\n/g, "\n");
}

describe("renderMonthlyDigest", () => {
  it("renders projects sorted with underlined headings", async () => {
    const aggregation = aggregate([
      { project: "foo", url: "https://api.github.com/repos/djc/foo/issues/1", title: "Add foo option" },
      { project: "bar/baz", url: "https://api.github.com/repos/bar/baz/pull/2", title: "Fix baz parser" },
      { project: "foo", url: "https://github.com/djc/foo/releases/tag/v0.2.0", title: "foo 0.2.0" }
    ]);

    const rendered = renderMonthlyDigest(aggregation, { resolveUrl: resolvePublicUrl });
    expect(rendered).toBe(await readGoldenFile("two-projects.rst"));
  });

  it("prints urls as stored without a resolver", () => {
    const aggregation = aggregate([
      { project: "foo", url: "https://github.com/djc/foo/pull/9", title: "Speed up foo" }
    ]);
    expect(renderMonthlyDigest(aggregation)).toBe(
      "foo\n===\n\n* `Speed up foo <https://github.com/djc/foo/pull/9>`_\n\n"
    );
  });

  it("skips items the resolver rejects", () => {
    const skipped: string[] = [];
    const aggregation = aggregate([
      { project: "foo", url: "https://gitlab.com/djc/foo/-/issues/1", title: "Elsewhere" },
      { project: "foo", url: "https://api.github.com/repos/djc/foo/issues/2", title: "Here" }
    ]);

    const rendered = renderMonthlyDigest(aggregation, {
      resolveUrl: resolvePublicUrl,
      onSkip: (reason) => skipped.push(reason)
    });

    expect(rendered).toBe("foo\n===\n\n* `Here <https://github.com/djc/foo/issues/2>`_\n\n");
    expect(skipped).toEqual(["no public url for https://gitlab.com/djc/foo/-/issues/1"]);
  });

  it("keeps insertion order when sorting is off", () => {
    const aggregation = aggregate([
      { project: "zeta", url: "https://github.com/z/zeta/issues/1", title: "Z" },
      { project: "alpha", url: "https://github.com/a/alpha/issues/1", title: "A" }
    ]);
    const rendered = renderMonthlyDigest(aggregation, { sortProjects: false });
    expect(rendered.split("\n")[0]).toBe("zeta");
  });

  it("renders nothing for an empty aggregation", () => {
    expect(renderMonthlyDigest(aggregate([]))).toBe("");
  });
});

describe("formatHeading", () => {
  it("underlines with one = per character", () => {
    expect(formatHeading("bar/baz")).toEqual(["bar/baz", "======="]);
    expect(formatHeading("café")).toEqual(["café", "===="]);
  });
});

describe("formatItem", () => {
  it("builds an anonymous link bullet", () => {
    expect(formatItem("Title", "https://github.com/a/b/pull/1")).toBe("* `Title <https://github.com/a/b/pull/1>`_");
  });
});
