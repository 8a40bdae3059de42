/**
 * Reconciler Configuration
 *
 * Settings live in config/reconcile.json and are merged over defaults.
 * Tokens never live in the file: they come from the environment.
 *
 * Environment:
 * - JIRA_API_TOKEN, GITLAB_TOKEN: credentials
 * - JIRA_BASE_URL, JIRA_EMAIL, GITLAB_BASE_URL: override the file
 */

import * as fs from "fs";
import * as path from "path";
import { DEFAULT_ATTENDANCE_HINTS } from "./attendance.js";
import { isRecord, listField, numberField, recordField, stringField, stringList } from "./json-fields.js";
import { normalizeHints } from "./meeting-filter.js";
import type { MeetingRule, TitleRule } from "./segmenter.js";

// ============================================================================
// Types
// ============================================================================

export interface JiraSettings {
  baseUrl: string;
  email: string;
  apiToken: string;
}

export interface GitLabSettings {
  baseUrl: string;
  token: string;
  projectIds: string[];
  /** Commit author/committer addresses; empty means the Jira e-mail */
  authorEmails: string[];
}

export interface ReconcileConfig {
  /** Address whose participation status is kept when parsing calendars */
  identity: string;
  meetingTicket: string;
  meetingRules: MeetingRule[];
  titleRules: TitleRule[];
  nonMeetingHints: string[];
  absenceHints: string[];
  commitLookbackDays: number;
  jira: JiraSettings;
  gitlab: GitLabSettings;
}

export interface ValidationResult {
  ok: boolean;
  problems: string[];
}

type Env = Record<string, string | undefined>;

// ============================================================================
// Constants
// ============================================================================

const CONFIG_DIR = path.join(process.cwd(), "config");
const DEFAULT_CONFIG_PATH = path.join(CONFIG_DIR, "reconcile.json");
const DEFAULT_HINTS_PATH = path.join(CONFIG_DIR, "non-meeting-hints.json");
const DEFAULT_LOOKBACK_DAYS = 30;

// ============================================================================
// Defaults
// ============================================================================

/**
 * Bundled non-meeting hints. An unreadable file yields an empty list.
 */
export function loadDefaultNonMeetingHints(hintsPath: string = DEFAULT_HINTS_PATH): string[] {
  try {
    if (!fs.existsSync(hintsPath)) return [];
    const parsed: unknown = JSON.parse(fs.readFileSync(hintsPath, "utf-8"));
    return Array.isArray(parsed) ? normalizeHints(parsed.filter((h): h is string => typeof h === "string")) : [];
  } catch {
    return [];
  }
}

export function getDefaultReconcileConfig(): ReconcileConfig {
  return {
    identity: "",
    meetingTicket: "",
    meetingRules: [],
    titleRules: [],
    nonMeetingHints: loadDefaultNonMeetingHints(),
    absenceHints: [...DEFAULT_ATTENDANCE_HINTS.absence],
    commitLookbackDays: DEFAULT_LOOKBACK_DAYS,
    jira: { baseUrl: "", email: "", apiToken: "" },
    gitlab: { baseUrl: "", token: "", projectIds: [], authorEmails: [] },
  };
}

// ============================================================================
// Loading
// ============================================================================

function parseMeetingRules(value: unknown): MeetingRule[] {
  if (!Array.isArray(value)) return [];
  return value
    .filter(isRecord)
    .map(rule => ({ pattern: stringField(rule, "pattern").trim(), ticket: stringField(rule, "ticket").trim() }))
    .filter(rule => rule.pattern.length > 0 && rule.ticket.length > 0);
}

function parseTitleRules(value: unknown): TitleRule[] {
  if (!Array.isArray(value)) return [];
  return value
    .filter(isRecord)
    .map(rule => ({
      trigger: stringField(rule, "trigger").trim(),
      replacements: stringList(rule["replacements"]).map(r => r.trim()).filter(r => r.length > 0),
    }))
    .filter(rule => rule.trigger.length > 0 && rule.replacements.length > 0);
}

function nonEmpty(value: string | undefined): string | undefined {
  return value && value.trim().length > 0 ? value.trim() : undefined;
}

/**
 * Merge a parsed config object over the defaults and apply environment
 * overrides.
 */
export function resolveReconcileConfig(parsed: unknown, env: Env = process.env): ReconcileConfig {
  const defaults = getDefaultReconcileConfig();
  const raw = isRecord(parsed) ? parsed : {};
  const jira = recordField(raw, "jira");
  const gitlab = recordField(raw, "gitlab");

  const hints = listField(raw, "nonMeetingHints");
  const absence = listField(raw, "absenceHints");
  const lookback = numberField(raw, "commitLookbackDays");

  return {
    identity: stringField(raw, "identity").trim() || defaults.identity,
    meetingTicket: stringField(raw, "meetingTicket").trim() || defaults.meetingTicket,
    meetingRules: parseMeetingRules(raw["meetingRules"]),
    titleRules: parseTitleRules(raw["titleRules"]),
    nonMeetingHints: hints.length > 0 ? normalizeHints(stringList(hints)) : defaults.nonMeetingHints,
    absenceHints: absence.length > 0 ? normalizeHints(stringList(absence)) : defaults.absenceHints,
    commitLookbackDays: lookback !== null && lookback >= 0 ? Math.floor(lookback) : defaults.commitLookbackDays,
    jira: {
      baseUrl: nonEmpty(env.JIRA_BASE_URL) ?? stringField(jira, "baseUrl").trim(),
      email: nonEmpty(env.JIRA_EMAIL) ?? stringField(jira, "email").trim(),
      apiToken: nonEmpty(env.JIRA_API_TOKEN) ?? "",
    },
    gitlab: {
      baseUrl: nonEmpty(env.GITLAB_BASE_URL) ?? stringField(gitlab, "baseUrl").trim(),
      token: nonEmpty(env.GITLAB_TOKEN) ?? "",
      projectIds: listField(gitlab, "projectIds")
        .map(id => (typeof id === "number" ? String(id) : typeof id === "string" ? id.trim() : ""))
        .filter(id => id.length > 0),
      authorEmails: stringList(gitlab["authorEmails"]).map(e => e.trim().toLowerCase()).filter(e => e.includes("@")),
    },
  };
}

export function loadReconcileConfig(
  configPath: string = DEFAULT_CONFIG_PATH,
  env: Env = process.env
): ReconcileConfig {
  try {
    if (!fs.existsSync(configPath)) {
      return resolveReconcileConfig({}, env);
    }
    const parsed: unknown = JSON.parse(fs.readFileSync(configPath, "utf-8"));
    return resolveReconcileConfig(parsed, env);
  } catch {
    return resolveReconcileConfig({}, env);
  }
}

/**
 * Write the config back. Tokens are left out of the file.
 */
export function saveReconcileConfig(config: ReconcileConfig, configPath: string = DEFAULT_CONFIG_PATH): void {
  const dir = path.dirname(configPath);
  if (!fs.existsSync(dir)) {
    fs.mkdirSync(dir, { recursive: true });
  }
  const { apiToken: _jiraToken, ...jira } = config.jira;
  const { token: _gitlabToken, ...gitlab } = config.gitlab;
  fs.writeFileSync(configPath, JSON.stringify({ ...config, jira, gitlab }, null, 2));
}

// ============================================================================
// Validation
// ============================================================================

export function validateConfiguration(config: ReconcileConfig): ValidationResult {
  const problems: string[] = [];
  if (!config.identity.includes("@")) problems.push("identity must be an e-mail address");
  if (config.meetingTicket.length === 0) problems.push("meetingTicket is not set");
  if (config.jira.baseUrl.length === 0) problems.push("jira.baseUrl is not set (or JIRA_BASE_URL)");
  if (config.jira.email.length === 0) problems.push("jira.email is not set (or JIRA_EMAIL)");
  if (config.jira.apiToken.length === 0) problems.push("JIRA_API_TOKEN is not set");
  return { ok: problems.length === 0, problems };
}

/**
 * Addresses used to pick the user's own commits.
 */
export function commitAuthorEmails(config: ReconcileConfig): string[] {
  if (config.gitlab.authorEmails.length > 0) return config.gitlab.authorEmails;
  return config.jira.email.length > 0 ? [config.jira.email.toLowerCase()] : [];
}
