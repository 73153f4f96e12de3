import { readFile } from "node:fs/promises";
import { describe, expect, it } from "vitest";
import { isDigestError } from "../src/errors.js";
import { normalizeArchiveRows, normalizeFeedEvents } from "../src/normalize.js";
import { runPipeline } from "../src/pipeline.js";
import { parseRawEvent } from "../src/rules/event-classifier.js";
import { createProjectRouter } from "../src/rules/project-router.js";
import type { RawEvent } from "../src/types.js";

async function loadEvents(): Promise<RawEvent[]> {
  const url = new URL("./fixtures/feed-events.json", import.meta.url);
  const raw: unknown = JSON.parse(await readFile(url, "utf-8"));
  return Array.isArray(raw) ? raw.map((value: unknown) => parseRawEvent(value)) : [];
}

describe("normalizeFeedEvents", () => {
  it("folds the newest title for a pull request seen under both paths", async () => {
    const events = await loadEvents();
    const items = normalizeFeedEvents(events, createProjectRouter({ owners: ["djc"] }));

    expect(items).toEqual([
      { project: "gears", url: "https://api.github.com/repos/djc/gears/issues/12", title: "Gear ratio overflows" },
      { project: "gears", url: "https://github.com/djc/gears/releases/tag/v0.3.0", title: "v0.3.0" },
      { project: "acme/widgets", url: "https://api.github.com/repos/acme/widgets/pull/7", title: "Add sprocket support" },
      { project: "acme/widgets", url: "https://api.github.com/repos/acme/widgets/pull/7", title: "Add sprocket support (v2)" }
    ]);
  });
});

describe("normalizeArchiveRows", () => {
  it("routes by owner and reports ambiguous rows", () => {
    const skipped: string[] = [];
    const rows = [
      JSON.stringify({ issue: { html_url: "https://github.com/djc/foo/issues/1", title: "One" } }),
      JSON.stringify({ commits: [] }),
      JSON.stringify({
        issue: { html_url: "https://github.com/bar/baz/issues/2", title: "Two" },
        pull_request: { html_url: "https://github.com/bar/baz/pull/2", title: "Two" }
      }),
      JSON.stringify({ pull_request: { html_url: "https://github.com/bar/baz/pull/3", title: "Three" } })
    ];

    const items = normalizeArchiveRows(rows, createProjectRouter({ owners: ["djc"], granularity: "owner" }), {
      onSkip: (reason) => skipped.push(reason)
    });

    expect(items).toEqual([
      { project: "foo", url: "https://github.com/djc/foo/issues/1", title: "One" },
      { project: "bar", url: "https://github.com/bar/baz/pull/3", title: "Three" }
    ]);
    expect(skipped).toEqual(["row 2: carries both an issue and a pull request"]);
  });

  it("fails the run when a kept row has no project", () => {
    const rows = [JSON.stringify({ issue: { html_url: "https://example.com/x/y/issues/1", title: "Lost" } })];
    let caught: unknown;
    try {
      normalizeArchiveRows(rows, createProjectRouter());
    } catch (error: unknown) {
      caught = error;
    }
    expect(isDigestError(caught, "project_resolution")).toBe(true);
  });
});

describe("runPipeline", () => {
  it("collects, folds and renders in order", async () => {
    const events = await loadEvents();
    const router = createProjectRouter({ owners: ["djc"] });

    const result = await runPipeline(
      {
        collect: () => events,
        normalize: (sources) => normalizeFeedEvents(sources, router),
        render: (aggregation) =>
          Array.from(aggregation.entries()).map(([project, entries]) => `${project}:${entries.size}`)
      },
      { month: "202405" }
    );

    expect(result.sourceCount).toBe(5);
    expect(result.output).toEqual(["gears:2", "acme/widgets:1"]);
    expect(result.aggregation.get("acme/widgets")?.get("https://api.github.com/repos/acme/widgets/pull/7")).toBe(
      "Add sprocket support (v2)"
    );
  });

  it("does not render when collection fails", async () => {
    let rendered = false;
    await expect(
      runPipeline(
        {
          collect: () => {
            throw new Error("boom");
          },
          normalize: () => [],
          render: () => {
            rendered = true;
          }
        },
        { month: "202405" }
      )
    ).rejects.toThrowError("boom");
    expect(rendered).toBe(false);
  });
});
