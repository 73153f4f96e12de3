import { z } from "zod";
import { DigestError } from "../errors.js";
import type {
  ClassifiedEvent,
  ItemRecord,
  RawEvent,
  TrackedKind,
  TrackedPayload
} from "../types.js";

export const TRACKED_EVENT_KINDS: ReadonlyMap<string, TrackedKind> = new Map<string, TrackedKind>([
  ["IssuesEvent", "issue"],
  ["IssueCommentEvent", "issue"],
  ["PullRequestEvent", "pull_request"],
  ["PullRequestReviewEvent", "pull_request"],
  ["PullRequestReviewCommentEvent", "pull_request"],
  ["ReleaseEvent", "release"]
]);

const rawEventSchema = z.object({
  id: z.string().optional(),
  type: z.string(),
  repo: z.object({ name: z.string() }),
  created_at: z.string(),
  payload: z.unknown()
});

const issueLikeSchema = z.object({
  node_id: z.string(),
  url: z.string(),
  title: z.string()
});

const releaseSchema = z.object({
  node_id: z.string(),
  html_url: z.string(),
  name: z.string().nullish(),
  tag_name: z.string().optional()
});

const issuePayloadSchema = z.object({ issue: issueLikeSchema });
const pullRequestPayloadSchema = z.object({ pull_request: issueLikeSchema });
const releasePayloadSchema = z.object({ release: releaseSchema });

const envelopeItemSchema = z.object({
  html_url: z.string(),
  title: z.string(),
  node_id: z.string().optional()
});

const archiveEnvelopeSchema = z.object({
  issue: envelopeItemSchema.nullish(),
  pull_request: envelopeItemSchema.nullish()
});

export type ArchiveEnvelope = z.infer<typeof archiveEnvelopeSchema>;

export type ArchiveRowResult =
  | { status: "kept"; item: ItemRecord }
  | { status: "skipped"; reason: "empty" | "ambiguous" };

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join(".") : "(root)"}: ${issue.message}`)
    .join("; ");
}

function parseWith<S extends z.ZodTypeAny>(schema: S, value: unknown, what: string): z.infer<S> {
  const result = schema.safeParse(value);
  if (!result.success) {
    throw new DigestError("response_shape", `Unexpected ${what}: ${formatIssues(result.error)}`);
  }
  return result.data;
}

export function parseRawEvent(value: unknown): RawEvent {
  return parseWith(rawEventSchema, value, "event shape");
}

export function toTrackedPayload(event: RawEvent): TrackedPayload | null {
  const kind = TRACKED_EVENT_KINDS.get(event.type);
  const what = `${event.type} payload in ${event.repo.name}`;

  switch (kind) {
    case "issue":
      return { kind, issue: parseWith(issuePayloadSchema, event.payload, what).issue };
    case "pull_request":
      return {
        kind,
        pullRequest: parseWith(pullRequestPayloadSchema, event.payload, what).pull_request
      };
    case "release":
      return { kind, release: parseWith(releasePayloadSchema, event.payload, what).release };
    default:
      return null;
  }
}

export function extractItem(payload: TrackedPayload): ItemRecord {
  switch (payload.kind) {
    case "issue":
      return { node_id: payload.issue.node_id, url: payload.issue.url, title: payload.issue.title };
    case "pull_request":
      return {
        node_id: payload.pullRequest.node_id,
        url: payload.pullRequest.url,
        title: payload.pullRequest.title
      };
    case "release": {
      const { release } = payload;
      const title =
        release.name && release.name.trim() ? release.name : (release.tag_name ?? release.html_url);
      return { node_id: release.node_id, url: release.html_url, title };
    }
  }
}

/** Returns `null` for event kinds that contribute nothing to the digest. */
export function classifyEvent(event: RawEvent): ClassifiedEvent | null {
  const payload = toTrackedPayload(event);
  if (!payload) {
    return null;
  }

  return {
    repo: event.repo.name,
    createdAt: event.created_at,
    item: extractItem(payload)
  };
}

export function parseArchiveRow(row: string): ArchiveEnvelope {
  let value: unknown;
  try {
    value = JSON.parse(row);
  } catch (error: unknown) {
    throw new DigestError("response_shape", "Archive row is not valid JSON", { cause: error });
  }
  return parseWith(archiveEnvelopeSchema, value, "archive row");
}

export function classifyArchiveRow(row: string): ArchiveRowResult {
  const { issue, pull_request: pullRequest } = parseArchiveRow(row);

  if (issue && pullRequest) {
    return { status: "skipped", reason: "ambiguous" };
  }

  const found = issue ?? pullRequest;
  if (!found) {
    return { status: "skipped", reason: "empty" };
  }

  return {
    status: "kept",
    item: { node_id: found.node_id ?? "", url: found.html_url, title: found.title }
  };
}
