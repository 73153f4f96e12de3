import { canonicalizeUrl } from "./rules/url-canonicalizer.js";
import { classifyArchiveRow, classifyEvent } from "./rules/event-classifier.js";
import type { ProjectRouter } from "./rules/project-router.js";
import type { ClassifiedEvent, RawEvent, RoutedItem } from "./types.js";

export interface NormalizeOptions {
  onSkip?: ((reason: string) => void) | undefined;
}

function byCreatedAt(a: ClassifiedEvent, b: ClassifiedEvent): number {
  return new Date(a.createdAt).getTime() - new Date(b.createdAt).getTime();
}

/**
 * Feed events arrive newest first; they are re-ordered oldest first so the
 * most recent title for a url is the last one folded.
 */
export function normalizeFeedEvents(events: RawEvent[], router: ProjectRouter): RoutedItem[] {
  const classified: ClassifiedEvent[] = [];
  for (const event of events) {
    const result = classifyEvent(event);
    if (result) {
      classified.push(result);
    }
  }

  return classified.sort(byCreatedAt).map(({ repo, item }) => ({
    project: router.routeRepository(repo),
    url: canonicalizeUrl(item.url, item.node_id),
    title: item.title
  }));
}

/** Archive rows are already ordered by creation time, oldest first. */
export function normalizeArchiveRows(
  rows: string[],
  router: ProjectRouter,
  options: NormalizeOptions = {}
): RoutedItem[] {
  const items: RoutedItem[] = [];

  rows.forEach((row, index) => {
    const result = classifyArchiveRow(row);
    if (result.status === "skipped") {
      if (result.reason === "ambiguous") {
        options.onSkip?.(`row ${index}: carries both an issue and a pull request`);
      }
      return;
    }

    const { item } = result;
    items.push({
      project: router.routeHtmlUrl(item.url),
      url: canonicalizeUrl(item.url, item.node_id),
      title: item.title
    });
  });

  return items;
}
