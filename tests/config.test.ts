import { describe, it, expect, beforeEach, afterEach } from "vitest";
import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import {
  commitAuthorEmails,
  getDefaultReconcileConfig,
  loadDefaultNonMeetingHints,
  loadReconcileConfig,
  resolveReconcileConfig,
  saveReconcileConfig,
  validateConfiguration,
  type ReconcileConfig,
} from "../lib/config.js";

function validConfig(): ReconcileConfig {
  return resolveReconcileConfig(
    {
      identity: "dev@example.com",
      meetingTicket: "OPS-1",
      jira: { baseUrl: "https://tickets.example.com", email: "dev@example.com" },
    },
    { JIRA_API_TOKEN: "test-secret" }
  );
}

describe("config", () => {
  describe("getDefaultReconcileConfig", () => {
    it("loads the bundled non-meeting hints", () => {
      const config = getDefaultReconcileConfig();
      expect(config.nonMeetingHints).toContain("homeoffice");
      expect(config.commitLookbackDays).toBe(30);
      expect(config.meetingRules).toEqual([]);
    });
  });

  describe("loadDefaultNonMeetingHints", () => {
    let dir: string;

    beforeEach(() => {
      dir = fs.mkdtempSync(path.join(os.tmpdir(), "reconcile-config-"));
    });

    afterEach(() => {
      fs.rmSync(dir, { recursive: true, force: true });
    });

    it("lower-cases hints and drops non-strings", () => {
      const file = path.join(dir, "hints.json");
      fs.writeFileSync(file, JSON.stringify([" Focus ", 3, "", "Travel"]));
      expect(loadDefaultNonMeetingHints(file)).toEqual(["focus", "travel"]);
    });

    it("returns an empty list for a missing or broken file", () => {
      const broken = path.join(dir, "broken.json");
      fs.writeFileSync(broken, "{");
      expect(loadDefaultNonMeetingHints(path.join(dir, "missing.json"))).toEqual([]);
      expect(loadDefaultNonMeetingHints(broken)).toEqual([]);
    });
  });

  describe("resolveReconcileConfig", () => {
    it("merges the file over the defaults", () => {
      const config = resolveReconcileConfig(
        {
          identity: " dev@example.com ",
          meetingTicket: "OPS-1",
          meetingRules: [
            { pattern: "standup", ticket: "OPS-2" },
            { pattern: "", ticket: "OPS-3" },
            "not a rule",
          ],
          absenceHints: ["Urlaub"],
          commitLookbackDays: 14.7,
        },
        {}
      );

      expect(config.identity).toBe("dev@example.com");
      expect(config.meetingRules).toEqual([{ pattern: "standup", ticket: "OPS-2" }]);
      expect(config.absenceHints).toEqual(["urlaub"]);
      expect(config.commitLookbackDays).toBe(14);
    });

    it("keeps only complete title rules", () => {
      const config = resolveReconcileConfig(
        {
          titleRules: [
            { trigger: " Sync ", replacements: [" Technical sync ", "", 4] },
            { trigger: "", replacements: ["Something"] },
            { trigger: "Call", replacements: [] },
          ],
        },
        {}
      );
      expect(config.titleRules).toEqual([{ trigger: "Sync", replacements: ["Technical sync"] }]);
    });

    it("keeps default lookback for a negative value", () => {
      expect(resolveReconcileConfig({ commitLookbackDays: -1 }, {}).commitLookbackDays).toBe(30);
    });

    it("lets the environment override connection settings", () => {
      const config = resolveReconcileConfig(
        { jira: { baseUrl: "https://file.example.com", email: "file@example.com" } },
        {
          JIRA_BASE_URL: "https://env.example.com",
          JIRA_EMAIL: "  ",
          JIRA_API_TOKEN: "test-secret",
          GITLAB_TOKEN: "test-gitlab-secret",
        }
      );

      expect(config.jira).toEqual({
        baseUrl: "https://env.example.com",
        email: "file@example.com",
        apiToken: "test-secret",
      });
      expect(config.gitlab.token).toBe("test-gitlab-secret");
    });

    it("normalizes gitlab projects and author addresses", () => {
      const config = resolveReconcileConfig(
        { gitlab: { projectIds: [42, " 7 ", "", null], authorEmails: ["Dev@Example.com", "nobody"] } },
        {}
      );
      expect(config.gitlab.projectIds).toEqual(["42", "7"]);
      expect(config.gitlab.authorEmails).toEqual(["dev@example.com"]);
    });

    it("treats a non-object as empty", () => {
      const config = resolveReconcileConfig("nonsense", {});
      expect(config.identity).toBe("");
      expect(config.jira.apiToken).toBe("");
    });
  });

  describe("load and save", () => {
    let dir: string;

    beforeEach(() => {
      dir = fs.mkdtempSync(path.join(os.tmpdir(), "reconcile-config-"));
    });

    afterEach(() => {
      fs.rmSync(dir, { recursive: true, force: true });
    });

    it("round-trips the file without tokens", () => {
      const file = path.join(dir, "nested", "reconcile.json");
      const config = validConfig();
      config.gitlab.token = "test-gitlab-secret";

      saveReconcileConfig(config, file);

      const written = fs.readFileSync(file, "utf-8");
      expect(written).not.toContain("test-secret");
      expect(written).not.toContain("test-gitlab-secret");

      const loaded = loadReconcileConfig(file, { JIRA_API_TOKEN: "test-secret" });
      expect(loaded).toEqual(validConfig());
    });

    it("falls back to defaults for a missing or malformed file", () => {
      const broken = path.join(dir, "broken.json");
      fs.writeFileSync(broken, "not json");

      expect(loadReconcileConfig(path.join(dir, "missing.json"), {}).identity).toBe("");
      expect(loadReconcileConfig(broken, {}).meetingTicket).toBe("");
    });
  });

  describe("validateConfiguration", () => {
    it("accepts a complete configuration", () => {
      expect(validateConfiguration(validConfig())).toEqual({ ok: true, problems: [] });
    });

    it("lists every missing setting", () => {
      expect(validateConfiguration(resolveReconcileConfig({ identity: "dev" }, {}))).toEqual({
        ok: false,
        problems: [
          "identity must be an e-mail address",
          "meetingTicket is not set",
          "jira.baseUrl is not set (or JIRA_BASE_URL)",
          "jira.email is not set (or JIRA_EMAIL)",
          "JIRA_API_TOKEN is not set",
        ],
      });
    });
  });

  describe("commitAuthorEmails", () => {
    it("falls back to the lower-cased jira e-mail", () => {
      const config = resolveReconcileConfig({ jira: { email: "Dev@Example.com" } }, {});
      expect(commitAuthorEmails(config)).toEqual(["dev@example.com"]);
    });

    it("prefers configured author addresses", () => {
      const config = resolveReconcileConfig(
        { jira: { email: "dev@example.com" }, gitlab: { authorEmails: ["alt@example.com"] } },
        {}
      );
      expect(commitAuthorEmails(config)).toEqual(["alt@example.com"]);
    });

    it("is empty without any address", () => {
      expect(commitAuthorEmails(resolveReconcileConfig({}, {}))).toEqual([]);
    });
  });
});
