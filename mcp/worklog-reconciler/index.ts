#!/usr/bin/env node
import { Server } from "@modelcontextprotocol/sdk/server/index.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import {
  CallToolRequestSchema,
  ListToolsRequestSchema,
  ListResourcesRequestSchema,
  ReadResourceRequestSchema,
} from "@modelcontextprotocol/sdk/types.js";
import * as fs from "fs";
import { loadAttendanceRows, type AttendanceRow } from "../../lib/attendance.js";
import { CalendarNormalizer } from "../../lib/calendar-normalizer.js";
import { loadReconcileConfig, validateConfiguration, type ReconcileConfig } from "../../lib/config.js";
import { ConfigurationError, errorMessage, type UnitOutcome } from "../../lib/errors.js";
import { GitLabClient } from "../../lib/gitlab-client.js";
import { JiraClient } from "../../lib/jira-client.js";
import { isRecord, stringField, type JsonRecord } from "../../lib/json-fields.js";
import {
  attendanceRange,
  compareRange,
  deleteWorklogsForDays,
  planAdjustments,
  previewDeletion,
  runReconciliation,
} from "../../lib/reconcile-pass.js";
import { getRecentRuns, initDatabase, recordRun, type RunKind } from "../../lib/reconcile-db.js";
import {
  formatComparisonMarkdown,
  formatDeletionMarkdown,
  formatDraftsMarkdown,
  formatOutcomesMarkdown,
  formatPlansMarkdown,
} from "../../lib/report.js";
import { eachDay, parseDateKey } from "../../lib/time-format.js";

const RANGE_PROPERTIES = {
  attendancePath: {
    type: "string",
    description: "Path to the attendance export (JSON list of rows)",
  },
  from: {
    type: "string",
    description: "Start date (YYYY-MM-DD). Defaults to the first attendance day.",
  },
  to: {
    type: "string",
    description: "End date (YYYY-MM-DD). Defaults to the last attendance day.",
  },
  format: {
    type: "string",
    enum: ["markdown", "json"],
    description: "Output format (default: markdown)",
    default: "markdown",
  },
};

type ToolText = {
  content: Array<{ type: "text"; text: string }>;
  isError?: boolean;
};

function text(value: string, isError = false): ToolText {
  return { content: [{ type: "text", text: value }], ...(isError ? { isError } : {}) };
}

interface RangeArgs {
  config: ReconcileConfig;
  rows: AttendanceRow[];
  warnings: string[];
  from: Date;
  to: Date;
  json: boolean;
}

function optionalDate(args: JsonRecord, key: string): Date | null {
  const raw = stringField(args, key);
  if (raw.length === 0) return null;
  const date = parseDateKey(raw);
  if (!date) throw new Error(`${key} must be YYYY-MM-DD, got "${raw}"`);
  return date;
}

function readRangeArgs(args: JsonRecord): RangeArgs {
  const attendancePath = stringField(args, "attendancePath");
  if (attendancePath.length === 0) throw new Error("attendancePath is required");

  const { rows, errors } = loadAttendanceRows(attendancePath);
  const range = attendanceRange(rows);
  const from = optionalDate(args, "from") ?? range?.from;
  const to = optionalDate(args, "to") ?? range?.to;
  if (!from || !to) throw new Error("No date range: give from/to or an attendance file with rows");

  return {
    config: loadReconcileConfig(),
    rows,
    warnings: errors.map(e => e.message),
    from,
    to,
    json: stringField(args, "format") === "json",
  };
}

function readDeletionDays(args: JsonRecord): Date[] {
  const listed = args["days"];
  if (Array.isArray(listed) && listed.length > 0) {
    return listed.map(value => {
      const date = typeof value === "string" ? parseDateKey(value) : null;
      if (!date) throw new Error(`days must hold YYYY-MM-DD dates, got ${JSON.stringify(value)}`);
      return date;
    });
  }
  const from = optionalDate(args, "from");
  const to = optionalDate(args, "to");
  if (!from || !to) throw new Error("Give days, or both from and to");
  return [...eachDay(from, to)];
}

function jiraFor(config: ReconcileConfig): JiraClient {
  return new JiraClient({ baseUrl: config.jira.baseUrl, email: config.jira.email, apiToken: config.jira.apiToken });
}

function joined(...parts: string[]): ToolText {
  return text(parts.filter(p => p.length > 0).join("\n\n"));
}

function render(range: RangeArgs, markdown: string, value: unknown, outcomes: readonly UnitOutcome[]): ToolText {
  if (range.json) return text(JSON.stringify({ result: value, outcomes, warnings: range.warnings }, null, 2));
  return joined(markdown, formatOutcomesMarkdown(outcomes), ...range.warnings.map(w => `Warning: ${w}`));
}

async function journal(kind: RunKind, range: RangeArgs, startedAt: Date, outcomes: readonly UnitOutcome[]): Promise<void> {
  await initDatabase();
  await recordRun({ kind, from: range.from, to: range.to, startedAt, finishedAt: new Date(), outcomes });
}

const server = new Server(
  {
    name: "worklog-reconciler",
    version: "1.0.0",
  },
  {
    capabilities: {
      tools: {},
      resources: {},
    },
  }
);

// List available tools
server.setRequestHandler(ListToolsRequestSchema, async () => {
  return {
    tools: [
      {
        name: "build_drafts",
        description:
          "Build worklog drafts for a date range from attendance, an optional calendar export and commit history. Drafts are classified as new, duplicate or overlap against existing worklogs. Nothing is booked.",
        inputSchema: {
          type: "object",
          properties: {
            ...RANGE_PROPERTIES,
            calendarPath: {
              type: "string",
              description: "Path to a calendar export (.ics)",
            },
          },
          required: ["attendancePath"],
        },
      },
      {
        name: "plan_adjustments",
        description:
          "Plan changes to existing worklogs so they fit attendance: move day start/end, cut around pauses, close unjustified gaps. Read-only.",
        inputSchema: {
          type: "object",
          properties: RANGE_PROPERTIES,
          required: ["attendancePath"],
        },
      },
      {
        name: "compare_times",
        description:
          "Compare attendance with existing worklogs per day (start, end, pause, net duration), or list worklogs outside working time with mode=outliers.",
        inputSchema: {
          type: "object",
          properties: {
            ...RANGE_PROPERTIES,
            mode: {
              type: "string",
              enum: ["full", "outliers"],
              description: "full (default) or outliers",
              default: "full",
            },
          },
          required: ["attendancePath"],
        },
      },
      {
        name: "delete_worklogs",
        description:
          "Delete your own worklogs on the selected days. Without confirm=true only lists what would be deleted. Deletion cannot be undone.",
        inputSchema: {
          type: "object",
          properties: {
            days: {
              type: "array",
              items: { type: "string" },
              description: "Days to clear (YYYY-MM-DD). Overrides from/to.",
            },
            from: { type: "string", description: "First day (YYYY-MM-DD) when days is not given" },
            to: { type: "string", description: "Last day (YYYY-MM-DD) when days is not given" },
            confirm: {
              type: "boolean",
              description: "Actually delete (default: false, preview only)",
              default: false,
            },
            format: RANGE_PROPERTIES.format,
          },
          required: [],
        },
      },
      {
        name: "validate_config",
        description: "Check config/reconcile.json and the environment for missing identity or credentials",
        inputSchema: {
          type: "object",
          properties: {},
          required: [],
        },
      },
    ],
  };
});

server.setRequestHandler(CallToolRequestSchema, async (request) => {
  const { name } = request.params;
  const args: JsonRecord = isRecord(request.params.arguments) ? request.params.arguments : {};
  const startedAt = new Date();

  try {
    switch (name) {
      case "build_drafts": {
        const range = readRangeArgs(args);
        const { config } = range;

        let calendar: CalendarNormalizer | null = null;
        const calendarPath = stringField(args, "calendarPath");
        if (calendarPath.length > 0) {
          const parsed = CalendarNormalizer.fromText(fs.readFileSync(calendarPath, "utf-8"), {
            identity: config.identity,
            nonMeetingHints: config.nonMeetingHints,
          });
          range.warnings.push(...parsed.errors.map(e => e.message));
          calendar = parsed.normalizer;
        }

        const commits =
          config.gitlab.baseUrl && config.gitlab.token
            ? new GitLabClient({ baseUrl: config.gitlab.baseUrl, token: config.gitlab.token })
            : null;

        const result = await runReconciliation({
          config,
          from: range.from,
          to: range.to,
          attendance: range.rows,
          calendar,
          commits,
          tickets: jiraFor(config),
        });
        await journal("drafts", range, startedAt, result.outcomes);
        return render(range, formatDraftsMarkdown(result.drafts), result.drafts, result.outcomes);
      }

      case "plan_adjustments": {
        const range = readRangeArgs(args);
        const result = await planAdjustments({
          config: range.config,
          from: range.from,
          to: range.to,
          attendance: range.rows,
          tickets: jiraFor(range.config),
        });
        await journal("plan", range, startedAt, result.outcomes);
        return render(range, formatPlansMarkdown(result.plans), result.plans, result.outcomes);
      }

      case "compare_times": {
        const range = readRangeArgs(args);
        const outliers = stringField(args, "mode") === "outliers";
        const result = await compareRange({
          config: range.config,
          from: range.from,
          to: range.to,
          attendance: range.rows,
          tickets: jiraFor(range.config),
          mode: outliers ? "outliers" : "full",
        });
        await journal("compare", range, startedAt, result.outcomes);
        return render(range, formatComparisonMarkdown(result.days, outliers), result.days, result.outcomes);
      }

      case "delete_worklogs": {
        const days = readDeletionDays(args);
        const config = loadReconcileConfig();
        const json = stringField(args, "format") === "json";
        const input = { config, days, tickets: jiraFor(config) };

        if (args["confirm"] !== true) {
          const preview = await previewDeletion(input);
          return json
            ? text(JSON.stringify({ result: preview.records, outcomes: preview.outcomes }, null, 2))
            : joined(formatDeletionMarkdown(preview.records, null), formatOutcomesMarkdown(preview.outcomes));
        }

        const result = await deleteWorklogsForDays(input, jiraFor(config));
        const ordered = [...days].sort((a, b) => a.getTime() - b.getTime());
        await initDatabase();
        await recordRun({
          kind: "delete",
          from: ordered[0],
          to: ordered[ordered.length - 1],
          startedAt,
          finishedAt: new Date(),
          outcomes: result.outcomes,
        });
        return json
          ? text(JSON.stringify({ result, outcomes: result.outcomes }, null, 2))
          : joined(formatDeletionMarkdown(result.records, result), formatOutcomesMarkdown(result.outcomes));
      }

      case "validate_config": {
        const config = loadReconcileConfig();
        const validation = validateConfiguration(config);
        const jiraReachable = validation.ok ? await jiraFor(config).checkAuth() : false;
        return text(JSON.stringify({ ...validation, jiraReachable }, null, 2));
      }

      default:
        return text(`Unknown tool: ${name}`, true);
    }
  } catch (error) {
    if (error instanceof ConfigurationError) {
      return text(`Configuration problems:\n${error.problems.map(p => `- ${p}`).join("\n")}`, true);
    }
    return text(`Error: ${errorMessage(error)}`, true);
  }
});

// List resources
server.setRequestHandler(ListResourcesRequestSchema, async () => {
  return {
    resources: [
      {
        uri: "reconcile://runs",
        name: "Recent Runs",
        description: "The last 20 reconciliation runs with ok/failed unit counts",
        mimeType: "application/json",
      },
    ],
  };
});

// Read resources
server.setRequestHandler(ReadResourceRequestSchema, async (request) => {
  const { uri } = request.params;

  if (uri !== "reconcile://runs") {
    throw new Error(`Unknown resource: ${uri}`);
  }
  await initDatabase();
  const runs = await getRecentRuns(20);
  return {
    contents: [
      {
        uri,
        mimeType: "application/json",
        text: JSON.stringify(runs, null, 2),
      },
    ],
  };
});

// Start the server
async function main() {
  const transport = new StdioServerTransport();
  await server.connect(transport);
  console.error("Worklog reconciler MCP server running on stdio");
}

main().catch((error) => {
  console.error("Failed to start server:", error);
  process.exit(1);
});
