import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtempSync, rmSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";
import Database from "better-sqlite3";
import { SESSION_STORE_SCHEMA_SQL, SqliteSessionSource } from "../src/session/sqlite-source.js";
import { ValidationError } from "../src/errors.js";

let tempDir: string;
let dbPath: string;

function seed(statements: (db: Database.Database) => void): void {
  const db = new Database(dbPath);
  db.exec(SESSION_STORE_SCHEMA_SQL);
  statements(db);
  db.close();
}

beforeEach(() => {
  tempDir = mkdtempSync(join(tmpdir(), "sealgate-sessions-"));
  dbPath = join(tempDir, "sessions.sqlite");
});

afterEach(() => {
  rmSync(tempDir, { recursive: true, force: true });
});

describe("SqliteSessionSource", () => {
  it("refuses to create a missing store", () => {
    expect(() => new SqliteSessionSource(join(tempDir, "missing.sqlite"))).toThrow();
  });

  it("opens the store read-only", () => {
    seed(() => {});
    const source = new SqliteSessionSource(dbPath);
    try {
      expect(source.readonly).toBe(true);
    } finally {
      source.close();
    }
  });

  it("lists events for the agent version in timestamp order", async () => {
    seed((db) => {
      const insert = db.prepare(
        "INSERT INTO session_events (session_id, ts, risk_level, kind, detail, agent_version) VALUES (?, ?, ?, ?, ?, ?)",
      );
      insert.run("s2", "2025-02-01T10:05:00.000Z", "HIGH", "refusal", "declined", "2.4.0");
      insert.run("s1", "2025-02-01T10:00:00Z", "CRITICAL", "error", "", "2.4.0");
      insert.run("s9", "2025-02-01T10:01:00.000Z", "HIGH", "error", "", "1.0.0");
      insert.run("s3", "2025-02-01T10:02:00.000Z", "LOW", "intervention", "", null);
    });

    const source = new SqliteSessionSource(dbPath);
    try {
      const events = await source.listEvents({ agentVersion: "2.4.0" });
      expect(events).toEqual([
        {
          sessionId: "s1",
          timestamp: "2025-02-01T10:00:00.000Z",
          riskLevel: "CRITICAL",
          kind: "error",
          detail: "",
        },
        {
          sessionId: "s3",
          timestamp: "2025-02-01T10:02:00.000Z",
          riskLevel: "LOW",
          kind: "intervention",
          detail: "",
        },
        {
          sessionId: "s2",
          timestamp: "2025-02-01T10:05:00.000Z",
          riskLevel: "HIGH",
          kind: "refusal",
          detail: "declined",
        },
      ]);
    } finally {
      source.close();
    }
  });

  it("fetches turns, annotations and config changes", async () => {
    seed((db) => {
      const turn = db.prepare(
        "INSERT INTO session_turns (session_id, sequence_no, phase, payload, metadata_json, recorded_at) VALUES (?, ?, ?, ?, ?, ?)",
      );
      turn.run("s1", 2, "outcome", "done", "{}", null);
      turn.run("s1", 1, "action", "search", '{"tool":"web"}', "2025-02-01T10:00:01.000Z");
      turn.run("s2", 0, "input", "other", "{}", null);
      db.prepare(
        "INSERT INTO turn_annotations (session_id, sequence_no, label, annotator, ts) VALUES (?, ?, ?, ?, ?)",
      ).run("s1", 1, "unsafe", "reviewer-1", "2025-02-02T09:00:00.000Z");
      db.prepare(
        "INSERT INTO config_changes (change_id, ts, user_id, field_changed, old_value, new_value, reason, status) VALUES (?, ?, ?, ?, ?, ?, ?, ?)",
      ).run("c1", "2025-01-05T00:00:00.000Z", "ops-1", "temperature", "0.7", "0.2", "tighten", "APPROVED");
    });

    const source = new SqliteSessionSource(dbPath);
    try {
      expect(await source.fetchSession("s1")).toEqual([
        { sessionId: "s1", sequenceNo: 2, phase: "outcome", payload: "done", metadata: {} },
        {
          sessionId: "s1",
          sequenceNo: 1,
          phase: "action",
          payload: "search",
          metadata: { tool: "web" },
          recordedAt: "2025-02-01T10:00:01.000Z",
        },
      ]);
      expect(await source.fetchSession("nope")).toEqual([]);
      expect(await source.listAnnotations("s1")).toEqual([
        {
          turnRef: { sessionId: "s1", sequenceNo: 1 },
          label: "unsafe",
          annotator: "reviewer-1",
          timestamp: "2025-02-02T09:00:00.000Z",
        },
      ]);
      expect(await source.listConfigChanges()).toEqual([
        {
          changeId: "c1",
          timestamp: "2025-01-05T00:00:00.000Z",
          userId: "ops-1",
          fieldChanged: "temperature",
          oldValue: "0.7",
          newValue: "0.2",
          reason: "tighten",
          status: "APPROVED",
        },
      ]);
    } finally {
      source.close();
    }
  });

  it("rejects rows that violate the contract", async () => {
    seed((db) => {
      db.prepare(
        "INSERT INTO session_events (session_id, ts, risk_level, kind, detail, agent_version) VALUES (?, ?, ?, ?, ?, ?)",
      ).run("s1", "2025-02-01T10:00:00.000Z", "SEVERE", "error", "", "2.4.0");
    });
    const source = new SqliteSessionSource(dbPath);
    try {
      await expect(source.listEvents({})).rejects.toBeInstanceOf(ValidationError);
    } finally {
      source.close();
    }
  });

  it("keeps non-string metadata values", async () => {
    seed((db) => {
      db.prepare(
        "INSERT INTO session_turns (session_id, sequence_no, phase, payload, metadata_json, recorded_at) VALUES (?, ?, ?, ?, ?, ?)",
      ).run("s1", 0, "thought", "plan", '{"score":0.9,"flags":["a",1],"retry":false,"note":null}', null);
    });
    const source = new SqliteSessionSource(dbPath);
    try {
      const [turn] = await source.fetchSession("s1");
      expect(turn?.metadata).toEqual({ score: 0.9, flags: ["a", 1], retry: false, note: null });
    } finally {
      source.close();
    }
  });

  it("reports corrupt metadata as invalid data", async () => {
    seed((db) => {
      db.prepare(
        "INSERT INTO session_turns (session_id, sequence_no, phase, payload, metadata_json, recorded_at) VALUES (?, ?, ?, ?, ?, ?)",
      ).run("s1", 3, "action", "x", "{not json", null);
    });
    const source = new SqliteSessionSource(dbPath);
    try {
      const pending = source.fetchSession("s1");
      await expect(pending).rejects.toBeInstanceOf(ValidationError);
      await expect(pending).rejects.toThrow(
        "Invalid session turn row s1#3: metadata_json is not valid JSON",
      );
    } finally {
      source.close();
    }
  });

  it("normalises offset timestamps to UTC milliseconds", async () => {
    seed((db) => {
      db.prepare(
        "INSERT INTO session_events (session_id, ts, risk_level, kind, detail, agent_version) VALUES (?, ?, ?, ?, ?, ?)",
      ).run("s1", "2025-02-01T12:00:00.123456+02:00", "LOW", "refusal", "", "2.4.0");
    });
    const source = new SqliteSessionSource(dbPath);
    try {
      const events = await source.listEvents({ agentVersion: "2.4.0" });
      expect(events.map((e) => e.timestamp)).toEqual(["2025-02-01T10:00:00.123Z"]);
    } finally {
      source.close();
    }
  });
});
