import { randomUUID } from "node:crypto";
import * as fs from "node:fs";
import { dirname } from "node:path";
import Database from "better-sqlite3";
import { z } from "zod";

import { createMessage, type ConversationMessage, type ConversationRole } from "../contracts/conversation";
import type { TelemetrySpan, TelemetrySpanStatus } from "../contracts/telemetry";
import {
  EvaluatorVerdictSchema,
  type EvaluatorVerdict,
  type TerminationReason,
} from "../contracts/verdict";
import type {
  ControlPlaneStore,
  RetrievalSessionRecord,
  SessionErrorRecord,
  SessionStatus,
  StoredSpan,
} from "./control_plane_store";

type SessionRow = {
  id: string;
  case_id: string | null;
  clinical_metadata: string;
  status: SessionStatus;
  created_at: string;
  completed_at: string | null;
  max_iterations: number;
  iteration_count: number;
  termination_reason: TerminationReason | null;
  verdict_json: string | null;
  error_json: string | null;
};

type MessageRow = {
  ordinal: number;
  role: ConversationRole;
  author_name: string;
  content: string;
};

type SpanRow = {
  id: string;
  session_id: string;
  seq: number;
  service_name: string;
  operation: string;
  start_at: string;
  end_at: string;
  status: TelemetrySpanStatus;
  attributes_json: string | null;
};

const SessionErrorColumn = z.object({
  code: z.string(),
  component: z.string(),
  message: z.string(),
  retryable: z.boolean(),
});

const SpanAttributesColumn = z.record(z.union([z.string(), z.number(), z.boolean()]));

function parseJsonColumn<T>(json: string | null, schema: z.ZodType<T, z.ZodTypeDef, unknown>): T | undefined {
  if (!json) return undefined;
  try {
    const parsed = schema.safeParse(JSON.parse(json));
    return parsed.success ? parsed.data : undefined;
  } catch {
    return undefined;
  }
}

export class SqliteControlPlaneStore implements ControlPlaneStore {
  private db: Database.Database;

  constructor(dbPath: string = "./data/control_plane.db") {
    if (dbPath !== ":memory:") {
      fs.mkdirSync(dirname(dbPath), { recursive: true });
    }
    this.db = new Database(dbPath);
    this.db.pragma("journal_mode = WAL");
    this.db.pragma("foreign_keys = ON");
    this.initSchema();
  }

  private initSchema() {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS retrieval_sessions (
        id TEXT PRIMARY KEY,
        case_id TEXT,
        clinical_metadata TEXT NOT NULL,
        status TEXT NOT NULL,
        created_at TEXT NOT NULL,
        completed_at TEXT,
        max_iterations INTEGER NOT NULL,
        iteration_count INTEGER NOT NULL DEFAULT 0,
        termination_reason TEXT,
        verdict_json TEXT,
        error_json TEXT
      );

      CREATE INDEX IF NOT EXISTS idx_retrieval_sessions_case_id
        ON retrieval_sessions(case_id);

      CREATE TABLE IF NOT EXISTS session_messages (
        session_id TEXT NOT NULL REFERENCES retrieval_sessions(id) ON DELETE CASCADE,
        ordinal INTEGER NOT NULL,
        role TEXT NOT NULL,
        author_name TEXT NOT NULL,
        content TEXT NOT NULL,
        PRIMARY KEY (session_id, ordinal)
      );

      CREATE TABLE IF NOT EXISTS session_spans (
        id TEXT PRIMARY KEY,
        session_id TEXT NOT NULL REFERENCES retrieval_sessions(id) ON DELETE CASCADE,
        seq INTEGER NOT NULL,
        service_name TEXT NOT NULL,
        operation TEXT NOT NULL,
        start_at TEXT NOT NULL,
        end_at TEXT NOT NULL,
        status TEXT NOT NULL,
        attributes_json TEXT
      );

      CREATE INDEX IF NOT EXISTS idx_session_spans_session
        ON session_spans(session_id, seq);
    `);
  }

  close(): void {
    this.db.close();
  }

  async createSession(args: {
    caseId?: string;
    clinicalMetadata: string;
    maxIterations: number;
  }): Promise<RetrievalSessionRecord> {
    const record: RetrievalSessionRecord = {
      id: randomUUID(),
      ...(args.caseId ? { caseId: args.caseId } : {}),
      clinicalMetadata: args.clinicalMetadata,
      status: "running",
      createdAt: new Date().toISOString(),
      maxIterations: args.maxIterations,
      iterationCount: 0,
    };

    this.db.prepare(`
      INSERT INTO retrieval_sessions (
        id, case_id, clinical_metadata, status, created_at, max_iterations, iteration_count
      )
      VALUES (?, ?, ?, ?, ?, ?, ?)
    `).run(
      record.id,
      record.caseId ?? null,
      record.clinicalMetadata,
      record.status,
      record.createdAt,
      record.maxIterations,
      record.iterationCount
    );

    return record;
  }

  async getSession(sessionId: string): Promise<RetrievalSessionRecord | null> {
    const row = this.db.prepare(`
      SELECT * FROM retrieval_sessions WHERE id = ?
    `).get(sessionId) as SessionRow | undefined;

    if (!row) return null;

    const verdict = parseJsonColumn(row.verdict_json, EvaluatorVerdictSchema);
    const error: SessionErrorRecord | undefined = parseJsonColumn(row.error_json, SessionErrorColumn);
    return {
      id: row.id,
      ...(row.case_id ? { caseId: row.case_id } : {}),
      clinicalMetadata: row.clinical_metadata,
      status: row.status,
      createdAt: row.created_at,
      ...(row.completed_at ? { completedAt: row.completed_at } : {}),
      maxIterations: row.max_iterations,
      iterationCount: row.iteration_count,
      ...(row.termination_reason ? { terminationReason: row.termination_reason } : {}),
      ...(verdict ? { verdict } : {}),
      ...(error ? { error } : {}),
    };
  }

  async completeSession(args: {
    sessionId: string;
    iterationCount: number;
    terminationReason: TerminationReason;
    verdict: EvaluatorVerdict;
  }): Promise<void> {
    this.db.prepare(`
      UPDATE retrieval_sessions
      SET status = 'completed',
          completed_at = ?,
          iteration_count = ?,
          termination_reason = ?,
          verdict_json = ?
      WHERE id = ?
    `).run(
      new Date().toISOString(),
      args.iterationCount,
      args.terminationReason,
      JSON.stringify(args.verdict),
      args.sessionId
    );
  }

  async failSession(args: {
    sessionId: string;
    iterationCount: number;
    error: SessionErrorRecord;
  }): Promise<void> {
    this.db.prepare(`
      UPDATE retrieval_sessions
      SET status = 'failed',
          completed_at = ?,
          iteration_count = ?,
          error_json = ?
      WHERE id = ?
    `).run(
      new Date().toISOString(),
      args.iterationCount,
      JSON.stringify(args.error),
      args.sessionId
    );
  }

  async appendMessages(args: {
    sessionId: string;
    messages: readonly ConversationMessage[];
  }): Promise<void> {
    const stmt = this.db.prepare(`
      INSERT INTO session_messages (session_id, ordinal, role, author_name, content)
      VALUES (?, ?, ?, ?, ?)
    `);
    const insertAll = this.db.transaction((messages: readonly ConversationMessage[]) => {
      for (const m of messages) {
        stmt.run(args.sessionId, m.ordinal, m.role, m.authorName, m.content);
      }
    });
    insertAll(args.messages);
  }

  async getMessages(sessionId: string): Promise<ConversationMessage[]> {
    const rows = this.db.prepare(`
      SELECT ordinal, role, author_name, content
      FROM session_messages
      WHERE session_id = ?
      ORDER BY ordinal ASC
    `).all(sessionId) as MessageRow[];

    return rows.map((row) =>
      createMessage({
        role: row.role,
        authorName: row.author_name,
        content: row.content,
        ordinal: row.ordinal,
      })
    );
  }

  async appendSpan(args: { sessionId: string; span: TelemetrySpan }): Promise<StoredSpan> {
    const next = this.db.prepare(`
      SELECT COALESCE(MAX(seq) + 1, 0) AS seq FROM session_spans WHERE session_id = ?
    `).get(args.sessionId) as { seq: number };

    const stored: StoredSpan = {
      ...args.span,
      id: randomUUID(),
      sessionId: args.sessionId,
      seq: next.seq,
    };

    this.db.prepare(`
      INSERT INTO session_spans (
        id, session_id, seq, service_name, operation, start_at, end_at, status, attributes_json
      )
      VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)
    `).run(
      stored.id,
      stored.sessionId,
      stored.seq,
      stored.service_name,
      stored.operation,
      stored.start,
      stored.end,
      stored.status,
      stored.attributes ? JSON.stringify(stored.attributes) : null
    );

    return stored;
  }

  async getSpans(sessionId: string): Promise<StoredSpan[]> {
    const rows = this.db.prepare(`
      SELECT * FROM session_spans WHERE session_id = ? ORDER BY seq ASC
    `).all(sessionId) as SpanRow[];

    return rows.map((row) => {
      const attributes = parseJsonColumn(row.attributes_json, SpanAttributesColumn);
      return {
        id: row.id,
        sessionId: row.session_id,
        seq: row.seq,
        service_name: row.service_name,
        operation: row.operation,
        start: row.start_at,
        end: row.end_at,
        status: row.status,
        ...(attributes ? { attributes } : {}),
      };
    });
  }
}
