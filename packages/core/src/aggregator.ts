import type { Aggregation, RoutedItem } from "./types.js";

export function createAggregation(): Aggregation {
  return new Map();
}

/** Later inserts for the same url replace the earlier title in place. */
export function addItem(aggregation: Aggregation, item: RoutedItem): Aggregation {
  let entries = aggregation.get(item.project);
  if (!entries) {
    entries = new Map();
    aggregation.set(item.project, entries);
  }
  entries.set(item.url, item.title);
  return aggregation;
}

export function aggregate(items: Iterable<RoutedItem>): Aggregation {
  const aggregation = createAggregation();
  for (const item of items) {
    addItem(aggregation, item);
  }
  return aggregation;
}

export function countItems(aggregation: Aggregation): number {
  let total = 0;
  for (const entries of aggregation.values()) {
    total += entries.size;
  }
  return total;
}
