export type ProjectKey = string;

export interface ItemRecord {
  node_id: string;
  url: string;
  title: string;
}

export interface IssueLikePayload {
  node_id: string;
  url: string;
  title: string;
}

export interface ReleasePayload {
  node_id: string;
  html_url: string;
  name?: string | null | undefined;
  tag_name?: string | undefined;
}

export type TrackedPayload =
  | { kind: "issue"; issue: IssueLikePayload }
  | { kind: "pull_request"; pullRequest: IssueLikePayload }
  | { kind: "release"; release: ReleasePayload };

export type TrackedKind = TrackedPayload["kind"];

export interface RawEvent {
  id?: string | undefined;
  type: string;
  repo: { name: string };
  created_at: string;
  payload?: unknown;
}

export interface ClassifiedEvent {
  repo: string;
  createdAt: string;
  item: ItemRecord;
}

export interface RoutedItem {
  project: ProjectKey;
  url: string;
  title: string;
}

/** Project key to (url to title). Map iteration follows first insertion. */
export type Aggregation = Map<ProjectKey, Map<string, string>>;

export interface MonthWindow {
  start: Date;
  end: Date;
}

export interface PipelineContext {
  month: string;
  onSkip?: ((reason: string) => void) | undefined;
}
