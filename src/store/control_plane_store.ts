import { randomUUID } from "node:crypto";

import type { ConversationMessage } from "../contracts/conversation";
import type { TelemetrySpan } from "../contracts/telemetry";
import type { EvaluatorVerdict, TerminationReason } from "../contracts/verdict";

export type SessionStatus = "running" | "completed" | "failed";

export type SessionErrorRecord = {
  code: string;
  component: string;
  message: string;
  retryable: boolean;
};

export type RetrievalSessionRecord = {
  id: string;
  caseId?: string;
  clinicalMetadata: string;
  status: SessionStatus;
  createdAt: string;
  completedAt?: string;
  maxIterations: number;
  iterationCount: number;
  terminationReason?: TerminationReason;
  verdict?: EvaluatorVerdict;
  error?: SessionErrorRecord;
};

export type StoredSpan = TelemetrySpan & {
  id: string;
  sessionId: string;
  seq: number;
};

export interface ControlPlaneStore {
  createSession(args: {
    caseId?: string;
    clinicalMetadata: string;
    maxIterations: number;
  }): Promise<RetrievalSessionRecord>;

  getSession(sessionId: string): Promise<RetrievalSessionRecord | null>;

  completeSession(args: {
    sessionId: string;
    iterationCount: number;
    terminationReason: TerminationReason;
    verdict: EvaluatorVerdict;
  }): Promise<void>;

  failSession(args: {
    sessionId: string;
    iterationCount: number;
    error: SessionErrorRecord;
  }): Promise<void>;

  appendMessages(args: {
    sessionId: string;
    messages: readonly ConversationMessage[];
  }): Promise<void>;

  getMessages(sessionId: string): Promise<ConversationMessage[]>;

  appendSpan(args: { sessionId: string; span: TelemetrySpan }): Promise<StoredSpan>;

  getSpans(sessionId: string): Promise<StoredSpan[]>;
}

export class MemoryControlPlaneStore implements ControlPlaneStore {
  private sessions = new Map<string, RetrievalSessionRecord>();
  private messages = new Map<string, ConversationMessage[]>();
  private spans = new Map<string, StoredSpan[]>();

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
    this.sessions.set(record.id, record);
    return structuredClone(record);
  }

  async getSession(sessionId: string): Promise<RetrievalSessionRecord | null> {
    const record = this.sessions.get(sessionId);
    return record ? structuredClone(record) : null;
  }

  async completeSession(args: {
    sessionId: string;
    iterationCount: number;
    terminationReason: TerminationReason;
    verdict: EvaluatorVerdict;
  }): Promise<void> {
    const existing = this.sessions.get(args.sessionId);
    if (!existing) return;
    this.sessions.set(args.sessionId, {
      ...existing,
      status: "completed",
      completedAt: new Date().toISOString(),
      iterationCount: args.iterationCount,
      terminationReason: args.terminationReason,
      verdict: args.verdict,
    });
  }

  async failSession(args: {
    sessionId: string;
    iterationCount: number;
    error: SessionErrorRecord;
  }): Promise<void> {
    const existing = this.sessions.get(args.sessionId);
    if (!existing) return;
    this.sessions.set(args.sessionId, {
      ...existing,
      status: "failed",
      completedAt: new Date().toISOString(),
      iterationCount: args.iterationCount,
      error: args.error,
    });
  }

  async appendMessages(args: {
    sessionId: string;
    messages: readonly ConversationMessage[];
  }): Promise<void> {
    const list = this.messages.get(args.sessionId) ?? [];
    list.push(...args.messages);
    this.messages.set(args.sessionId, list);
  }

  async getMessages(sessionId: string): Promise<ConversationMessage[]> {
    return [...(this.messages.get(sessionId) ?? [])];
  }

  async appendSpan(args: { sessionId: string; span: TelemetrySpan }): Promise<StoredSpan> {
    const list = this.spans.get(args.sessionId) ?? [];
    const stored: StoredSpan = {
      ...args.span,
      id: randomUUID(),
      sessionId: args.sessionId,
      seq: list.length,
    };
    list.push(stored);
    this.spans.set(args.sessionId, list);
    return stored;
  }

  async getSpans(sessionId: string): Promise<StoredSpan[]> {
    return [...(this.spans.get(sessionId) ?? [])];
  }
}
