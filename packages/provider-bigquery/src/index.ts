import { GoogleAuth } from "google-auth-library";
import { z } from "zod";
import { DigestError, describeError } from "@monthly-digest/core";

export const BIGQUERY_API_URL = "https://bigquery.googleapis.com/bigquery/v2";
export const BIGQUERY_SCOPE = "https://www.googleapis.com/auth/bigquery";

const loginPattern = /^[A-Za-z0-9](?:[A-Za-z0-9-]*[A-Za-z0-9])?$/;
const monthPattern = /^\d{6}$/;

const queryResponseSchema = z.object({
  jobComplete: z.boolean().optional(),
  totalRows: z.string().optional(),
  pageToken: z.string().optional(),
  rows: z
    .array(
      z.object({
        f: z.array(z.object({ v: z.string() }))
      })
    )
    .optional()
});

const errorBodySchema = z.object({
  error: z.object({ message: z.string() })
});

export interface TokenProvider {
  getToken(scopes: string[]): Promise<string>;
}

export type FetchLike = (input: string, init: RequestInit) => Promise<Response>;

export interface BigQueryArchiveClientOptions {
  projectId: string;
  tokenProvider?: TokenProvider;
  fetch?: FetchLike;
  baseUrl?: string;
  userAgent?: string;
  onQuery?: (query: string) => void;
}

export class GoogleTokenProvider implements TokenProvider {
  async getToken(scopes: string[]): Promise<string> {
    const auth = new GoogleAuth({ scopes });
    const token = await auth.getAccessToken();
    if (!token) {
      throw new Error("No access token returned by application default credentials.");
    }
    return token;
  }
}

export function buildArchiveQuery(month: string, user: string): string {
  if (!monthPattern.test(month)) {
    throw new Error(`Invalid archive month: ${month}. Expected YYYYMM.`);
  }
  if (!loginPattern.test(user)) {
    throw new Error(`Invalid GitHub login: ${user}`);
  }

  return `SELECT payload FROM githubarchive.month.${month} WHERE actor.login = '${user}' ORDER BY created_at`;
}

/** Unwraps the single `payload` column of every row. A result split over several pages is rejected. */
export function parseQueryRows(body: unknown): string[] {
  const result = queryResponseSchema.safeParse(body);
  if (!result.success) {
    throw new DigestError("response_shape", "Unexpected BigQuery response shape", { cause: result.error });
  }

  if (result.data.jobComplete === false) {
    throw new DigestError("response_shape", "BigQuery job did not complete within the request timeout");
  }

  const rows = result.data.rows ?? [];
  const totalRows = result.data.totalRows === undefined ? rows.length : Number(result.data.totalRows);
  if (result.data.pageToken !== undefined || totalRows > rows.length) {
    throw new DigestError(
      "response_shape",
      `BigQuery returned ${rows.length} of ${result.data.totalRows ?? "more"} rows in one page`
    );
  }

  return rows.map((row, index) => {
    const [field, ...rest] = row.f;
    if (!field || rest.length > 0) {
      throw new DigestError(
        "response_shape",
        `BigQuery row ${index} has ${row.f.length} columns, expected 1`
      );
    }
    return field.v;
  });
}

async function readErrorMessage(response: Response): Promise<string> {
  const text = await response.text();
  try {
    const parsed = errorBodySchema.safeParse(JSON.parse(text));
    if (parsed.success) {
      return parsed.data.error.message;
    }
  } catch {
    // not JSON; fall back to the raw body
  }
  return text.slice(0, 200);
}

export class BigQueryArchiveClient {
  private readonly projectId: string;
  private readonly tokenProvider: TokenProvider;
  private readonly fetch: FetchLike;
  private readonly baseUrl: string;
  private readonly userAgent: string;
  private readonly onQuery: ((query: string) => void) | undefined;

  constructor(options: BigQueryArchiveClientOptions) {
    this.projectId = options.projectId;
    this.tokenProvider = options.tokenProvider ?? new GoogleTokenProvider();
    this.fetch = options.fetch ?? ((input, init) => fetch(input, init));
    this.baseUrl = options.baseUrl ?? BIGQUERY_API_URL;
    this.userAgent = options.userAgent ?? "monthly-digest/0.1.0";
    this.onQuery = options.onQuery;
  }

  async queryMonth(month: string, user: string): Promise<string[]> {
    const query = buildArchiveQuery(month, user);

    let token: string;
    try {
      token = await this.tokenProvider.getToken([BIGQUERY_SCOPE]);
    } catch (error: unknown) {
      throw new DigestError("credential", `Cannot obtain a BigQuery token: ${describeError(error)}`, {
        cause: error
      });
    }

    this.onQuery?.(query);
    const url = `${this.baseUrl}/projects/${encodeURIComponent(this.projectId)}/queries`;

    let response: Response;
    try {
      response = await this.fetch(url, {
        method: "POST",
        headers: {
          Authorization: `Bearer ${token}`,
          "Content-Type": "application/json",
          "User-Agent": this.userAgent
        },
        body: JSON.stringify({ query })
      });
    } catch (error: unknown) {
      throw new DigestError("transport", `BigQuery request failed: ${describeError(error)}`, { cause: error });
    }

    if (!response.ok) {
      const message = await readErrorMessage(response);
      throw new DigestError(
        response.status === 401 || response.status === 403 ? "credential" : "transport",
        `BigQuery request failed: HTTP ${response.status} ${message}`.trim(),
        { status: response.status }
      );
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch (error: unknown) {
      throw new DigestError("response_shape", "BigQuery response is not valid JSON", { cause: error });
    }

    return parseQueryRows(body);
  }
}
