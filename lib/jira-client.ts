/**
 * Jira Client
 *
 * REST client for the ticketing collaborator: issue lookup and search,
 * summaries, and worklog read/create/update/delete. Calls go through an
 * injectable fetch so tests can stand in for the server.
 */

import { NetworkError, ParseError, errorMessage } from "./errors.js";
import {
  isRecord,
  listField,
  numberField,
  recordField,
  stringField,
  type JsonRecord,
} from "./json-fields.js";
import type { RemoteWorklogRecord } from "./remote-worklogs.js";

// ============================================================================
// Types
// ============================================================================

export interface JiraClientOptions {
  baseUrl: string;
  email: string;
  apiToken: string;
  fetchImpl?: typeof fetch;
}

export interface IssueSummary {
  key: string;
  summary: string;
}

export interface WriteResult {
  ok: boolean;
  body: string | null;
}

const KEY_LIKE = /^[A-Za-z][A-Za-z0-9]+-\d+$/;
const SUMMARY_BATCH_SIZE = 50;
const WORKLOG_PAGE_SIZE = 1000;

// ============================================================================
// Wire Timestamps
// ============================================================================

function pad(value: number, width = 2): string {
  return String(Math.abs(value)).padStart(width, "0");
}

/**
 * Local time as yyyy-MM-ddTHH:mm:ss.SSS+hhmm, the offset without a colon.
 */
export function formatJiraStarted(date: Date): string {
  const offsetMinutes = -date.getTimezoneOffset();
  const sign = offsetMinutes < 0 ? "-" : "+";
  const offset = `${sign}${pad(Math.floor(Math.abs(offsetMinutes) / 60))}${pad(Math.abs(offsetMinutes) % 60)}`;
  return (
    `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}` +
    `T${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}.${pad(date.getMilliseconds(), 3)}` +
    offset
  );
}

/**
 * Parse a started value with either a +hhmm or a +hh:mm offset.
 */
export function parseJiraStarted(value: string): Date {
  const trimmed = value.trim();
  const normalized = /[+-]\d{4}$/.test(trimmed)
    ? `${trimmed.slice(0, -5)}${trimmed.slice(-5, -2)}:${trimmed.slice(-2)}`
    : trimmed;
  const date = new Date(normalized);
  if (Number.isNaN(date.getTime())) throw new ParseError(`Invalid worklog start "${value}"`);
  return date;
}

/**
 * Minimal document body for a worklog comment.
 */
export function commentDocument(text: string): JsonRecord {
  const trimmed = text.trim();
  return {
    type: "doc",
    version: 1,
    content: [
      {
        type: "paragraph",
        content: trimmed.length === 0 ? [] : [{ type: "text", text: trimmed }],
      },
    ],
  };
}

// ============================================================================
// Client
// ============================================================================

export class JiraClient {
  private readonly base: string;
  private readonly auth: string;
  private readonly fetchImpl: typeof fetch;

  constructor(private readonly options: JiraClientOptions) {
    this.base = options.baseUrl.replace(/\/+$/, "");
    this.auth = `Basic ${Buffer.from(`${options.email}:${options.apiToken}`).toString("base64")}`;
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  get isConfigured(): boolean {
    return this.base.length > 0 && this.options.email.length > 0 && this.options.apiToken.length > 0;
  }

  private async request(path: string, init: RequestInit = {}): Promise<Response> {
    try {
      return await this.fetchImpl(`${this.base}${path}`, {
        ...init,
        headers: {
          Authorization: this.auth,
          Accept: "application/json",
          ...(init.body !== undefined ? { "Content-Type": "application/json; charset=utf-8" } : {}),
        },
      });
    } catch (error) {
      throw new NetworkError(`Request to ${path} failed: ${errorMessage(error)}`, null, { cause: error });
    }
  }

  private async getJson(path: string): Promise<JsonRecord> {
    const response = await this.request(path);
    if (!response.ok) {
      throw new NetworkError(`GET ${path} returned HTTP ${response.status}`, response.status);
    }
    const body: unknown = await response.json();
    if (!isRecord(body)) throw new NetworkError(`GET ${path} returned an unexpected body`, response.status);
    return body;
  }

  private async write(path: string, method: "POST" | "PUT", payload: JsonRecord): Promise<WriteResult> {
    try {
      const response = await this.request(path, { method, body: JSON.stringify(payload) });
      const text = await response.text();
      return { ok: response.ok, body: text.length > 0 ? text : null };
    } catch (error) {
      return { ok: false, body: errorMessage(error) };
    }
  }

  private issuePath(issue: string): string {
    return `/rest/api/3/issue/${encodeURIComponent(issue)}`;
  }

  // ==========================================================================
  // Issues
  // ==========================================================================

  /**
   * Numeric id for an issue key, or null when the issue does not exist.
   */
  async resolveId(keyOrId: string): Promise<string | null> {
    const response = await this.request(this.issuePath(keyOrId));
    if (response.status === 404) return null;
    if (!response.ok) {
      throw new NetworkError(`Resolving ${keyOrId} returned HTTP ${response.status}`, response.status);
    }
    const body: unknown = await response.json();
    const id = isRecord(body) ? stringField(body, "id") : "";
    return id.length > 0 ? id : null;
  }

  private async searchJql(jql: string, fields: string, maxResults: number): Promise<JsonRecord[]> {
    const query = `jql=${encodeURIComponent(jql)}&fields=${fields}&maxResults=${maxResults}`;
    const body = await this.getJson(`/rest/api/3/search/jql?${query}`);
    return listField(body, "issues").filter(isRecord);
  }

  /**
   * Issues whose summary or key matches free text. Key-like queries also
   * match the key exactly.
   */
  async search(text: string, maxResults = 25): Promise<IssueSummary[]> {
    const q = text.trim().replace(/"/g, '\\"');
    if (q.length === 0) return [];
    const fuzzy = `(summary ~ "${q}" OR key ~ "${q}")`;
    const jql = KEY_LIKE.test(q) ? `(key = ${q}) OR ${fuzzy}` : fuzzy;

    const issues = await this.searchJql(jql, "summary", maxResults);
    return issues
      .map(issue => ({ key: stringField(issue, "key"), summary: stringField(recordField(issue, "fields"), "summary") }))
      .filter(issue => issue.key.length > 0);
  }

  async searchKeys(jql: string, maxResults = 100): Promise<string[]> {
    const issues = await this.searchJql(jql, "key", maxResults);
    return issues.map(issue => stringField(issue, "key")).filter(key => key.length > 0);
  }

  async fetchSummaryBatch(keys: readonly string[]): Promise<Record<string, string>> {
    const result: Record<string, string> = {};
    if (keys.length === 0) return result;
    const issues = await this.searchJql(`key in (${keys.map(k => k.trim()).join(",")})`, "summary", keys.length);
    for (const issue of issues) {
      const key = stringField(issue, "key");
      const summary = stringField(recordField(issue, "fields"), "summary");
      if (key.length > 0 && summary.length > 0) result[key] = summary;
    }
    return result;
  }

  /**
   * Summaries for many keys, fetched in batches of 50. A failed batch is
   * reported through `onBatchError` and left out.
   */
  async fetchSummaries(
    keys: Iterable<string>,
    onBatchError?: (batch: string[], error: unknown) => void
  ): Promise<Record<string, string>> {
    const list = [...new Set(keys)];
    const result: Record<string, string> = {};
    for (let i = 0; i < list.length; i += SUMMARY_BATCH_SIZE) {
      const batch = list.slice(i, i + SUMMARY_BATCH_SIZE);
      try {
        Object.assign(result, await this.fetchSummaryBatch(batch));
      } catch (error) {
        if (!onBatchError) throw error;
        onBatchError(batch, error);
      }
    }
    return result;
  }

  // ==========================================================================
  // Worklogs
  // ==========================================================================

  /**
   * All worklogs on an issue, following startAt/total pagination. Entries
   * without an id, a start or a positive duration are skipped.
   */
  async fetchWorklogs(issue: string): Promise<RemoteWorklogRecord[]> {
    const records: RemoteWorklogRecord[] = [];
    let startAt = 0;

    for (;;) {
      const body = await this.getJson(`${this.issuePath(issue)}/worklog?startAt=${startAt}&maxResults=${WORKLOG_PAGE_SIZE}`);
      const page = listField(body, "worklogs");
      const total = numberField(body, "total") ?? page.length;

      for (const entry of page) {
        if (!isRecord(entry)) continue;
        const id = stringField(entry, "id");
        const startedRaw = stringField(entry, "started");
        const seconds = numberField(entry, "timeSpentSeconds") ?? 0;
        if (id.length === 0 || startedRaw.length === 0 || seconds <= 0) continue;

        let start: Date;
        try {
          start = parseJiraStarted(startedRaw);
        } catch {
          continue;
        }
        records.push({
          id,
          ticket: issue,
          authorId: stringField(recordField(entry, "author"), "accountId"),
          start,
          end: new Date(start.getTime() + seconds * 1000),
        });
      }

      if (page.length === 0 || startAt + page.length >= total) break;
      startAt += page.length;
    }

    return records;
  }

  async createWorklog(issue: string, started: Date, timeSpentSeconds: number, comment = ""): Promise<WriteResult> {
    return this.write(`${this.issuePath(issue)}/worklog`, "POST", {
      started: formatJiraStarted(started),
      timeSpentSeconds,
      comment: commentDocument(comment),
    });
  }

  async updateWorklog(issue: string, worklogId: string, started: Date, timeSpentSeconds: number): Promise<WriteResult> {
    return this.write(`${this.issuePath(issue)}/worklog/${encodeURIComponent(worklogId)}`, "PUT", {
      started: formatJiraStarted(started),
      timeSpentSeconds,
    });
  }

  async deleteWorklog(issue: string, worklogId: string): Promise<boolean> {
    try {
      const response = await this.request(`${this.issuePath(issue)}/worklog/${encodeURIComponent(worklogId)}`, {
        method: "DELETE",
      });
      return response.ok;
    } catch {
      return false;
    }
  }

  // ==========================================================================
  // Account
  // ==========================================================================

  /**
   * Whether the credentials are accepted. Falls back to the v2 endpoint for
   * self-hosted servers.
   */
  async checkAuth(): Promise<boolean> {
    if (!this.isConfigured) return false;

    const ping = async (path: string): Promise<number> => {
      try {
        return (await this.request(path)).status;
      } catch {
        return -1;
      }
    };

    const v3 = await ping("/rest/api/3/myself");
    if (v3 === 200) return true;
    if (v3 === 401 || v3 === 403) return false;
    return (await ping("/rest/api/2/myself")) === 200;
  }

  async fetchMyAccountId(): Promise<string | null> {
    const body = await this.getJson("/rest/api/3/myself");
    const id = stringField(body, "accountId");
    return id.length > 0 ? id : null;
  }
}
