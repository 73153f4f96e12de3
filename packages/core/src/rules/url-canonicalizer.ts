const ISSUE_SEGMENT = /\/issues\/(\d+)(?=$|[/?#])/;
const PULLS_SEGMENT = /\/pulls\/(\d+)(?=$|[/?#])/;

export const API_REPOS_PREFIX = "https://api.github.com/repos/";
export const PUBLIC_PREFIX = "https://github.com/";

/** Node ids of pull requests (and of issue objects that are pull requests). */
export function isPullRequestNodeId(nodeId: string): boolean {
  return nodeId.startsWith("PR_");
}

/**
 * Rewrites the issue/pull request path aliases the events API hands out into
 * the `/pull/{n}` form. Applies at most one rewrite.
 */
export function canonicalizeUrl(url: string, nodeId: string): string {
  if (ISSUE_SEGMENT.test(url) && isPullRequestNodeId(nodeId)) {
    return url.replace(ISSUE_SEGMENT, "/pull/$1");
  }

  if (PULLS_SEGMENT.test(url)) {
    return url.replace(PULLS_SEGMENT, "/pull/$1");
  }

  return url;
}

/** Maps an API repository URL onto the public web host; `null` when the host is neither. */
export function resolvePublicUrl(url: string): string | null {
  if (url.startsWith(API_REPOS_PREFIX)) {
    return `${PUBLIC_PREFIX}${url.slice(API_REPOS_PREFIX.length)}`;
  }

  if (url.startsWith(PUBLIC_PREFIX)) {
    return url;
  }

  return null;
}
