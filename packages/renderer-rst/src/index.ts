import type { Aggregation } from "@monthly-digest/core";

export interface RstRendererOptions {
  /** Maps each stored url to the one printed; `null` drops the item. */
  resolveUrl?: (url: string) => string | null;
  onSkip?: ((reason: string) => void) | undefined;
  /** Defaults to sorting project headings alphabetically. */
  sortProjects?: boolean;
}

export function formatHeading(project: string): string[] {
  return [project, "=".repeat(Array.from(project).length)];
}

export function formatItem(title: string, url: string): string {
  return `* \`${title} <${url}>\`_`;
}

function formatProject(
  project: string,
  entries: Map<string, string>,
  options: RstRendererOptions
): string[] {
  const lines = [...formatHeading(project), ""];

  for (const [url, title] of entries) {
    const resolved = options.resolveUrl ? options.resolveUrl(url) : url;
    if (resolved === null) {
      options.onSkip?.(`no public url for ${url}`);
      continue;
    }
    lines.push(formatItem(title, resolved));
  }

  lines.push("");
  return lines;
}

export function renderMonthlyDigest(
  aggregation: Aggregation,
  options: RstRendererOptions = {}
): string {
  const projects = Array.from(aggregation.keys());
  if (options.sortProjects ?? true) {
    projects.sort((a, b) => a.localeCompare(b));
  }

  const lines: string[] = [];
  for (const project of projects) {
    const entries = aggregation.get(project);
    if (!entries) {
      continue;
    }
    lines.push(...formatProject(project, entries, options));
  }

  return lines.map((line) => `${line}\n`).join("");
}
