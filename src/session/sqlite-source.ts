/**
 * SQLite-backed session source.
 *
 * Reads the operational event store written by the agent runtime:
 *   - `session_events`   (session_id, ts, risk_level, kind, detail, agent_version)
 *   - `session_turns`    (session_id, sequence_no, phase, payload, metadata_json, recorded_at)
 *   - `turn_annotations` (session_id, sequence_no, label, annotator, ts)
 *   - `config_changes`   (change_id, ts, user_id, field_changed, old_value,
 *                         new_value, reason, status)
 *
 * Access invariants:
 *   1. The connection is opened `readonly` and `fileMustExist`; the store is
 *      never created from here.
 *   2. `query_only` is switched on, so even a stray statement cannot write.
 *   3. Only SELECT statements are prepared. There is no write path.
 *   4. Every row is validated against the contract schemas before use.
 */

import Database from "better-sqlite3";
import {
  AnnotationSchema,
  ConfigChangeSchema,
  DeviationEventSchema,
  SessionTurnSchema,
  type Annotation,
  type ConfigChange,
  type DeviationEvent,
  type SessionTurn,
} from "../contracts/schemas.js";
import { parseWith } from "../contracts/validation.js";
import { ValidationError } from "../errors.js";
import type { EventQuery, SessionSource } from "./source.js";

// ---------------------------------------------------------------------------
// Minimal statement interface (avoids wrestling with conditional generics
// in @types/better-sqlite3: keeps our call-sites type-safe).
// ---------------------------------------------------------------------------

interface Stmt {
  all(...params: unknown[]): unknown[];
}

// ---------------------------------------------------------------------------
// Internal row shapes (match SQLite column names)
// ---------------------------------------------------------------------------

interface EventRow {
  session_id: string;
  ts: string;
  risk_level: string;
  kind: string;
  detail: string;
}

interface TurnRow {
  session_id: string;
  sequence_no: number;
  phase: string;
  payload: string;
  metadata_json: string;
  recorded_at: string | null;
}

interface AnnotationRow {
  session_id: string;
  sequence_no: number;
  label: string;
  annotator: string;
  ts: string;
}

interface ConfigChangeRow {
  change_id: string;
  ts: string;
  user_id: string;
  field_changed: string;
  old_value: string;
  new_value: string;
  reason: string;
  status: string;
}

// ---------------------------------------------------------------------------
// Row ↔ domain conversion
// ---------------------------------------------------------------------------

function rowToEvent(row: EventRow): DeviationEvent {
  return parseWith(
    DeviationEventSchema,
    {
      sessionId: row.session_id,
      timestamp: row.ts,
      riskLevel: row.risk_level,
      kind: row.kind,
      detail: row.detail,
    },
    "session event row",
  );
}

/** A corrupt row is bad data, not a source outage, and is never retried. */
function parseMetadata(row: TurnRow): unknown {
  try {
    const value: unknown = JSON.parse(row.metadata_json);
    return value;
  } catch (err: unknown) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new ValidationError(
      `Invalid session turn row ${row.session_id}#${row.sequence_no}: metadata_json is not valid JSON`,
      [`metadata_json: ${reason}`],
      { sessionId: row.session_id, sequenceNo: row.sequence_no },
    );
  }
}

function rowToTurn(row: TurnRow): SessionTurn {
  return parseWith(
    SessionTurnSchema,
    {
      sessionId: row.session_id,
      sequenceNo: row.sequence_no,
      phase: row.phase,
      payload: row.payload,
      metadata: parseMetadata(row),
      recordedAt: row.recorded_at ?? undefined,
    },
    "session turn row",
  );
}

function rowToAnnotation(row: AnnotationRow): Annotation {
  return parseWith(
    AnnotationSchema,
    {
      turnRef: { sessionId: row.session_id, sequenceNo: row.sequence_no },
      label: row.label,
      annotator: row.annotator,
      timestamp: row.ts,
    },
    "annotation row",
  );
}

function rowToConfigChange(row: ConfigChangeRow): ConfigChange {
  return parseWith(
    ConfigChangeSchema,
    {
      changeId: row.change_id,
      timestamp: row.ts,
      userId: row.user_id,
      fieldChanged: row.field_changed,
      oldValue: row.old_value,
      newValue: row.new_value,
      reason: row.reason,
      status: row.status,
    },
    "config change row",
  );
}

// ---------------------------------------------------------------------------
// DDL (owned by the writer; exported for provisioning and fixtures)
// ---------------------------------------------------------------------------

export const SESSION_STORE_SCHEMA_SQL = `
CREATE TABLE IF NOT EXISTS session_events (
  session_id     TEXT NOT NULL,
  ts             TEXT NOT NULL,
  risk_level     TEXT NOT NULL,
  kind           TEXT NOT NULL,
  detail         TEXT NOT NULL DEFAULT '',
  agent_version  TEXT
);

CREATE TABLE IF NOT EXISTS session_turns (
  session_id     TEXT    NOT NULL,
  sequence_no    INTEGER NOT NULL,
  phase          TEXT    NOT NULL,
  payload        TEXT    NOT NULL,
  metadata_json  TEXT    NOT NULL DEFAULT '{}',
  recorded_at    TEXT
);

CREATE TABLE IF NOT EXISTS turn_annotations (
  session_id   TEXT    NOT NULL,
  sequence_no  INTEGER NOT NULL,
  label        TEXT    NOT NULL,
  annotator    TEXT    NOT NULL,
  ts           TEXT    NOT NULL
);

CREATE TABLE IF NOT EXISTS config_changes (
  change_id      TEXT PRIMARY KEY,
  ts             TEXT NOT NULL,
  user_id        TEXT NOT NULL,
  field_changed  TEXT NOT NULL,
  old_value      TEXT NOT NULL,
  new_value      TEXT NOT NULL,
  reason         TEXT NOT NULL DEFAULT '',
  status         TEXT NOT NULL
);

CREATE INDEX IF NOT EXISTS idx_session_events_ts ON session_events(ts);
CREATE INDEX IF NOT EXISTS idx_session_turns_session ON session_turns(session_id);
CREATE INDEX IF NOT EXISTS idx_turn_annotations_session ON turn_annotations(session_id);
`;

// ---------------------------------------------------------------------------
// Source
// ---------------------------------------------------------------------------

export class SqliteSessionSource implements SessionSource {
  private readonly db: InstanceType<typeof Database>;

  private readonly stmtEvents: Stmt;
  private readonly stmtTurns: Stmt;
  private readonly stmtAnnotations: Stmt;
  private readonly stmtConfigChanges: Stmt;

  constructor(dbPath: string) {
    this.db = new Database(dbPath, { readonly: true, fileMustExist: true });
    this.db.pragma("query_only = ON");

    this.stmtEvents = this.db.prepare(
      `SELECT session_id, ts, risk_level, kind, detail
         FROM session_events
        WHERE (@agentVersion IS NULL OR agent_version IS NULL OR agent_version = @agentVersion)
          AND (@since IS NULL OR ts >= @since)
        ORDER BY ts ASC, rowid ASC`,
    ) as Stmt;

    this.stmtTurns = this.db.prepare(
      `SELECT session_id, sequence_no, phase, payload, metadata_json, recorded_at
         FROM session_turns
        WHERE session_id = ?
        ORDER BY rowid ASC`,
    ) as Stmt;

    this.stmtAnnotations = this.db.prepare(
      `SELECT session_id, sequence_no, label, annotator, ts
         FROM turn_annotations
        WHERE session_id = ?
        ORDER BY rowid ASC`,
    ) as Stmt;

    this.stmtConfigChanges = this.db.prepare(
      `SELECT change_id, ts, user_id, field_changed, old_value, new_value, reason, status
         FROM config_changes
        ORDER BY ts DESC, change_id ASC`,
    ) as Stmt;
  }

  /** True when the underlying connection refuses writes. */
  get readonly(): boolean {
    return this.db.readonly;
  }

  async listEvents(query: EventQuery): Promise<DeviationEvent[]> {
    const rows = this.stmtEvents.all({
      agentVersion: query.agentVersion ?? null,
      since: query.since ?? null,
    }) as EventRow[];
    return rows.map(rowToEvent);
  }

  async fetchSession(sessionId: string): Promise<SessionTurn[]> {
    const rows = this.stmtTurns.all(sessionId) as TurnRow[];
    return rows.map(rowToTurn);
  }

  async listAnnotations(sessionId: string): Promise<Annotation[]> {
    const rows = this.stmtAnnotations.all(sessionId) as AnnotationRow[];
    return rows.map(rowToAnnotation);
  }

  async listConfigChanges(): Promise<ConfigChange[]> {
    const rows = this.stmtConfigChanges.all() as ConfigChangeRow[];
    return rows.map(rowToConfigChange);
  }

  close(): void {
    this.db.close();
  }
}
