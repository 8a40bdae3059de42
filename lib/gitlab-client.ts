/**
 * GitLab Client
 *
 * Fetches repository commits for the commit-history collaborator.
 * Pagination follows X-Next-Page, then a Link rel="next" header, and ends
 * on a short page when neither header is sent.
 */

import { NetworkError, errorMessage } from "./errors.js";
import { isRecord, stringField } from "./json-fields.js";
import type { Commit } from "./ticket-keys.js";

export interface GitLabClientOptions {
  baseUrl: string;
  token: string;
  fetchImpl?: typeof fetch;
}

export interface FetchCommitsOptions {
  perPage?: number;
  maxPages?: number;
}

const LINK_NEXT = /<[^>]*[?&]page=(\d+)[^>]*>;\s*rel="next"/;

/**
 * Next page number from the response headers, or null when none is given.
 */
export function nextPageFromHeaders(headers: Headers): number | null {
  const header = headers.get("x-next-page")?.trim() ?? "";
  if (header.length > 0) {
    const page = Number.parseInt(header, 10);
    return Number.isNaN(page) ? null : page;
  }
  const link = headers.get("link") ?? "";
  const match = LINK_NEXT.exec(link);
  return match ? Number(match[1]) : null;
}

function optionalString(record: Record<string, unknown>, key: string): string | null {
  const value = stringField(record, key).trim();
  return value.length > 0 ? value : null;
}

/**
 * Map one API entry to a Commit. Returns null for entries without a usable
 * timestamp.
 */
export function parseCommit(projectId: string, entry: unknown): Commit | null {
  if (!isRecord(entry)) return null;
  const raw =
    optionalString(entry, "committed_date") ??
    optionalString(entry, "created_at") ??
    optionalString(entry, "authored_date");
  if (raw === null) return null;

  const timestamp = new Date(raw);
  if (Number.isNaN(timestamp.getTime())) return null;

  return {
    id: stringField(entry, "id"),
    projectId,
    timestamp,
    message: stringField(entry, "message"),
    authorEmail: optionalString(entry, "author_email"),
    committerEmail: optionalString(entry, "committer_email"),
  };
}

export class GitLabClient {
  private readonly base: string;
  private readonly fetchImpl: typeof fetch;

  constructor(private readonly options: GitLabClientOptions) {
    this.base = options.baseUrl.replace(/\/+$/, "");
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  get isConfigured(): boolean {
    return this.base.length > 0 && this.options.token.trim().length > 0;
  }

  private async get(path: string): Promise<Response> {
    try {
      return await this.fetchImpl(`${this.base}${path}`, {
        headers: { "PRIVATE-TOKEN": this.options.token, Accept: "application/json" },
      });
    } catch (error) {
      throw new NetworkError(`Request to ${path} failed: ${errorMessage(error)}`, null, { cause: error });
    }
  }

  /**
   * Commits of one project in [since, until), oldest page first.
   */
  async fetchCommits(
    projectId: string,
    since: Date,
    until: Date,
    options: FetchCommitsOptions = {}
  ): Promise<Commit[]> {
    const perPage = options.perPage ?? 100;
    const maxPages = options.maxPages ?? 50;
    const commits: Commit[] = [];
    let page = 1;

    for (let fetched = 0; fetched < maxPages; fetched++) {
      const params = new URLSearchParams({
        since: since.toISOString(),
        until: until.toISOString(),
        per_page: String(perPage),
        page: String(page),
        all: "true",
      });
      const path = `/api/v4/projects/${encodeURIComponent(projectId)}/repository/commits?${params.toString()}`;
      const response = await this.get(path);
      if (!response.ok) {
        throw new NetworkError(`Commits for project ${projectId} returned HTTP ${response.status}`, response.status);
      }

      const body: unknown = await response.json();
      const entries = Array.isArray(body) ? body : [];
      if (entries.length === 0) break;

      for (const entry of entries) {
        const commit = parseCommit(projectId, entry);
        if (commit) commits.push(commit);
      }

      const next = nextPageFromHeaders(response.headers);
      if (next === null) {
        if (entries.length < perPage) break;
        page += 1;
      } else {
        page = next;
      }
    }

    return commits;
  }

  async checkAuth(): Promise<boolean> {
    if (!this.isConfigured) return false;

    const ping = async (path: string): Promise<number> => {
      try {
        return (await this.get(path)).status;
      } catch {
        return -1;
      }
    };

    const user = await ping("/api/v4/user");
    if (user === 200) return true;
    if (user === 401 || user === 403) return false;
    return (await ping("/api/v4/projects?per_page=1&membership=true")) === 200;
  }
}
