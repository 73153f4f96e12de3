import { Octokit } from "@octokit/rest";
import {
  DigestError,
  describeError,
  inWindow,
  parseRawEvent,
  type MonthWindow,
  type RawEvent
} from "@monthly-digest/core";

export const GITHUB_API_URL = "https://api.github.com";

export interface GithubFeedPage {
  events: unknown[];
  link?: string | undefined;
}

export interface GithubFeedApi {
  fetchPage(url: string): Promise<GithubFeedPage>;
}

export interface GithubFeedClientOptions {
  token?: string | undefined;
  userAgent?: string;
  api?: GithubFeedApi;
}

export interface FeedPageInfo {
  url: string;
  page: number;
  received: number;
  kept: number;
}

export interface FeedFetchOptions {
  user: string;
  window: MonthWindow;
  onPage?: (info: FeedPageInfo) => void;
  /** Called with the url of the page refused by the rate limit; the walk ends there. */
  onRateLimited?: (url: string) => void;
}

export function feedUrl(user: string): string {
  return `${GITHUB_API_URL}/users/${encodeURIComponent(user)}/events?per_page=100`;
}

/** Reads the `rel="next"` target out of a `Link` header. */
export function parseNextLink(header: string | undefined): string | undefined {
  if (!header) {
    return undefined;
  }

  for (const segment of header.split(", ")) {
    const match = segment.trim().match(/^<([^>]*)>;\s*rel="([^"]*)"$/);
    if (match?.[2] === "next") {
      return match[1];
    }
  }

  return undefined;
}

function errorStatus(error: unknown): number | undefined {
  if (error && typeof error === "object" && "status" in error && typeof error.status === "number") {
    return error.status;
  }
  return undefined;
}

export function isRateLimitError(error: unknown): boolean {
  return errorStatus(error) === 403 && describeError(error).toLowerCase().includes("rate limit");
}

function formatProviderError(error: unknown, url: string): DigestError {
  if (error instanceof DigestError) {
    return error;
  }

  if (error && typeof error === "object") {
    const status = errorStatus(error);
    const message = describeError(error);

    if (status === 401) {
      return new DigestError("credential", `GitHub authentication failed for ${url}. Check the token value.`, {
        cause: error,
        status
      });
    }

    if (isRateLimitError(error)) {
      return new DigestError(
        "transport",
        `GitHub rate limit reached for ${url}. Retry later or provide a token.`,
        { cause: error, status: 403 }
      );
    }

    return new DigestError("transport", `GitHub feed error for ${url}: ${message}`, {
      cause: error,
      ...(status !== undefined ? { status } : {})
    });
  }

  return new DigestError("transport", `GitHub feed error for ${url}: ${String(error)}`, { cause: error });
}

class OctokitFeedApi implements GithubFeedApi {
  constructor(private readonly octokit: Octokit) {}

  async fetchPage(url: string): Promise<GithubFeedPage> {
    const response = await this.octokit.request(url);
    const data: unknown = response.data;
    if (!Array.isArray(data)) {
      throw new DigestError("response_shape", `Expected an event array from ${url}`);
    }

    return { events: data, link: response.headers.link };
  }
}

export function createGithubFeedApi(token?: string, userAgent = "monthly-digest/0.1.0"): GithubFeedApi {
  const octokit = new Octokit({ userAgent, ...(token ? { auth: token } : {}) });
  return new OctokitFeedApi(octokit);
}

export class GithubFeedClient {
  private readonly api: GithubFeedApi;

  constructor(options: GithubFeedClientOptions = {}) {
    this.api = options.api ?? createGithubFeedApi(options.token, options.userAgent);
  }

  /**
   * Walks the feed newest first. Events newer than the window are skipped;
   * the walk ends after the first page reaching back before the window start,
   * or when there is no next page. A rate-limit refusal after the first page
   * also ends the walk, keeping what was gathered so far.
   */
  async fetchMonth(options: FeedFetchOptions): Promise<RawEvent[]> {
    const start = options.window.start.getTime();
    const kept: RawEvent[] = [];

    let url: string | undefined = feedUrl(options.user);
    let page = 0;

    while (url) {
      let result: GithubFeedPage;
      try {
        result = await this.api.fetchPage(url);
      } catch (error: unknown) {
        if (page > 0 && isRateLimitError(error)) {
          options.onRateLimited?.(url);
          break;
        }
        throw formatProviderError(error, url);
      }
      page += 1;

      let oldest = Number.POSITIVE_INFINITY;
      let keptOnPage = 0;
      for (const value of result.events) {
        const event = parseRawEvent(value);
        const ts = new Date(event.created_at).getTime();
        if (!Number.isFinite(ts)) {
          throw new DigestError("response_shape", `Invalid created_at on event: ${event.created_at}`);
        }

        oldest = Math.min(oldest, ts);
        if (!inWindow(event.created_at, options.window)) {
          continue;
        }
        kept.push(event);
        keptOnPage += 1;
      }

      options.onPage?.({ url, page, received: result.events.length, kept: keptOnPage });

      if (oldest < start) {
        break;
      }
      url = parseNextLink(result.link);
    }

    return kept;
  }
}
