import { DigestError } from "../errors.js";
import type { ProjectKey } from "../types.js";
import { PUBLIC_PREFIX } from "./url-canonicalizer.js";

export const DEFAULT_REPO_OWNERS: readonly string[] = Object.freeze([
  "djc",
  "nicoburns",
  "seanmonstar",
  "rust-lang",
  "hyperium"
]);

export type ProjectGranularity = "repository" | "owner";

export interface ProjectRouterOptions {
  /** Owners whose repositories are grouped by repository name alone. */
  owners?: Iterable<string>;
  granularity?: ProjectGranularity;
}

export interface ProjectRouter {
  readonly owners: ReadonlySet<string>;
  routeRepository(fullName: string): ProjectKey;
  routeHtmlUrl(htmlUrl: string): ProjectKey;
}

function splitFullName(fullName: string): { owner: string; repo: string } {
  const parts = fullName.split("/");
  if (parts.length !== 2 || !parts[0] || !parts[1]) {
    throw new DigestError(
      "project_resolution",
      `Invalid repository name: ${fullName}. Expected owner/repo.`
    );
  }

  return { owner: parts[0], repo: parts[1] };
}

export function createProjectRouter(options: ProjectRouterOptions = {}): ProjectRouter {
  const owners: ReadonlySet<string> = new Set(options.owners ?? DEFAULT_REPO_OWNERS);
  const granularity = options.granularity ?? "repository";

  const route = (owner: string, repo: string): ProjectKey => {
    if (owners.has(owner)) {
      return repo;
    }
    return granularity === "owner" ? owner : `${owner}/${repo}`;
  };

  return {
    owners,
    routeRepository(fullName) {
      const { owner, repo } = splitFullName(fullName);
      return route(owner, repo);
    },
    routeHtmlUrl(htmlUrl) {
      if (!htmlUrl.startsWith(PUBLIC_PREFIX)) {
        throw new DigestError("project_resolution", `No project for ${htmlUrl}`);
      }

      const [owner, repo] = htmlUrl.slice(PUBLIC_PREFIX.length).split("/", 2);
      if (!owner || !repo) {
        throw new DigestError("project_resolution", `No project for ${htmlUrl}`);
      }
      return route(owner, repo);
    }
  };
}
