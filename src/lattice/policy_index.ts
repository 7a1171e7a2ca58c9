import { randomUUID } from "node:crypto";
import * as fs from "node:fs";
import { dirname } from "node:path";
import Database from "better-sqlite3";

import type {
  PolicyIngestInput,
  PolicySearchCapability,
  SearchHit,
  SearchMethod,
  SearchMode,
} from "../contracts/search";
import { chunkPolicyText, splitSentences } from "./chunking";
import {
  computePolicyEmbedding,
  cosineSimilarity,
  deserializeEmbedding,
  serializeEmbedding,
  tokenize,
} from "./embedding";

const RRF_K = 60;
const HYBRID_WEIGHTS = { keyword: 0.5, semantic: 0.5 } as const;
const SNIPPET_CHARS = 500;
const CAPTION_CHARS = 300;

const ICD10_PATTERN = /\b[A-TV-Z][0-9][0-9AB](?:\.[0-9A-TV-Z]{1,4})?\b/;
const CPT_PATTERN = /\b\d{5}\b/;
const HCPCS_PATTERN = /\b[A-V]\d{4}\b/;
const NDC_PATTERN = /\b\d{4,5}-\d{3,4}-\d{1,2}\b/;

export function hasMedicalCode(query: string): boolean {
  return [ICD10_PATTERN, CPT_PATTERN, HCPCS_PATTERN, NDC_PATTERN].some((p) => p.test(query));
}

/**
 * Short code-like or quoted queries go to keyword search, long prose goes to
 * semantic search, the rest to hybrid.
 */
export function selectQueryMode(query: string): SearchMode {
  const words = tokenize(query).length;
  const exact = hasMedicalCode(query) || /"[^"]+"/.test(query);

  if (exact && words <= 6) return "keyword";
  if (!exact && words >= 10) return "semantic";
  return "hybrid";
}

export function extractCaption(content: string, query: string): string {
  const terms = new Set(tokenize(query));
  const sentences = splitSentences(content);
  let best = sentences[0] ?? content;
  let bestHits = 0;

  for (const sentence of sentences) {
    const hits = tokenize(sentence).filter((t) => terms.has(t)).length;
    if (hits > bestHits) {
      best = sentence;
      bestHits = hits;
    }
  }

  return best.length > CAPTION_CHARS ? `${best.slice(0, CAPTION_CHARS - 1)}…` : best;
}

function toFtsQuery(query: string): string | null {
  const terms = Array.from(new Set(tokenize(query)));
  if (terms.length === 0) return null;
  return terms.map((t) => `"${t}"`).join(" OR ");
}

type ChunkRow = {
  id: string;
  source_path: string;
  content: string;
};

type RankedChunk = ChunkRow & { score: number; method: SearchMethod };

export type PolicyIndexOptions = {
  dbPath?: string;
  defaultLimit?: number;
  chunkChars?: number;
};

export class SqlitePolicyIndex implements PolicySearchCapability {
  private db: Database.Database;
  private readonly defaultLimit: number;
  private readonly chunkChars?: number;

  constructor(opts: PolicyIndexOptions = {}) {
    const dbPath = opts.dbPath ?? ":memory:";
    if (dbPath !== ":memory:") {
      fs.mkdirSync(dirname(dbPath), { recursive: true });
    }
    this.db = new Database(dbPath);
    this.defaultLimit = opts.defaultLimit ?? 5;
    this.chunkChars = opts.chunkChars;
    this.initSchema();
  }

  private initSchema() {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS policy_chunks (
        id TEXT PRIMARY KEY,
        source_path TEXT NOT NULL,
        title TEXT,
        chunk_index INTEGER NOT NULL,
        content TEXT NOT NULL,
        embedding_json TEXT NOT NULL,
        created_at TEXT NOT NULL
      );

      CREATE INDEX IF NOT EXISTS idx_policy_chunks_source
        ON policy_chunks(source_path);

      CREATE VIRTUAL TABLE IF NOT EXISTS policy_chunks_fts USING fts5(
        content,
        title,
        chunk_id UNINDEXED
      );
    `);
  }

  close(): void {
    this.db.close();
  }

  ingest(input: PolicyIngestInput): { sourcePath: string; chunks: number } {
    const chunks = chunkPolicyText(input.content, this.chunkChars);
    const createdAt = new Date().toISOString();

    const insertChunk = this.db.prepare(`
      INSERT INTO policy_chunks (id, source_path, title, chunk_index, content, embedding_json, created_at)
      VALUES (?, ?, ?, ?, ?, ?, ?)
    `);
    const insertFts = this.db.prepare(`
      INSERT INTO policy_chunks_fts (content, title, chunk_id) VALUES (?, ?, ?)
    `);

    const replace = this.db.transaction(() => {
      this.deleteBySourcePath(input.sourcePath);
      chunks.forEach((content, index) => {
        const id = randomUUID();
        const embedText = input.title ? `${input.title}\n${content}` : content;
        insertChunk.run(
          id,
          input.sourcePath,
          input.title ?? null,
          index,
          content,
          serializeEmbedding(computePolicyEmbedding(embedText)),
          createdAt
        );
        insertFts.run(content, input.title ?? "", id);
      });
    });
    replace();

    return { sourcePath: input.sourcePath, chunks: chunks.length };
  }

  remove(sourcePath: string): number {
    const run = this.db.transaction(() => this.deleteBySourcePath(sourcePath));
    return run();
  }

  countChunks(): number {
    const row = this.db.prepare("SELECT COUNT(*) AS n FROM policy_chunks").get() as { n: number };
    return row.n;
  }

  selectMode(query: string): SearchMode {
    return selectQueryMode(query);
  }

  async search(query: string, mode: SearchMode, limit = this.defaultLimit): Promise<SearchHit[]> {
    const candidates = limit * 4;
    let ranked: RankedChunk[];

    if (mode === "keyword") {
      ranked = this.keywordSearch(query, candidates);
    } else if (mode === "semantic") {
      ranked = this.semanticSearch(query, candidates);
    } else {
      ranked = fuseReciprocalRank(
        this.keywordSearch(query, candidates),
        this.semanticSearch(query, candidates)
      );
    }

    const seen = new Set<string>();
    const hits: SearchHit[] = [];
    for (const chunk of ranked) {
      if (seen.has(chunk.source_path)) continue;
      seen.add(chunk.source_path);
      hits.push({
        id: chunk.id,
        sourcePath: chunk.source_path,
        contentSnippet: chunk.content.slice(0, SNIPPET_CHARS),
        caption: extractCaption(chunk.content, query),
        score: chunk.score,
        method: chunk.method,
      });
      if (hits.length >= limit) break;
    }
    return hits;
  }

  private deleteBySourcePath(sourcePath: string): number {
    const ids = this.db.prepare(`
      SELECT id FROM policy_chunks WHERE source_path = ?
    `).all(sourcePath) as Array<{ id: string }>;

    const deleteFts = this.db.prepare("DELETE FROM policy_chunks_fts WHERE chunk_id = ?");
    for (const { id } of ids) {
      deleteFts.run(id);
    }
    this.db.prepare("DELETE FROM policy_chunks WHERE source_path = ?").run(sourcePath);
    return ids.length;
  }

  private keywordSearch(query: string, limit: number): RankedChunk[] {
    const match = toFtsQuery(query);
    if (!match) return [];

    const rows = this.db.prepare(`
      SELECT c.id AS id, c.source_path AS source_path, c.content AS content,
             bm25(policy_chunks_fts) AS bm25_score
      FROM policy_chunks_fts
      JOIN policy_chunks c ON c.id = policy_chunks_fts.chunk_id
      WHERE policy_chunks_fts MATCH ?
      ORDER BY bm25_score ASC, c.source_path ASC, c.chunk_index ASC
      LIMIT ?
    `).all(match, limit) as Array<ChunkRow & { bm25_score: number }>;

    // bm25() is lower-is-better; flip it so every method reports higher-is-better.
    return rows.map((row) => ({
      id: row.id,
      source_path: row.source_path,
      content: row.content,
      score: -row.bm25_score,
      method: "fts5_bm25",
    }));
  }

  private semanticSearch(query: string, limit: number): RankedChunk[] {
    const queryVec = computePolicyEmbedding(query);
    const rows = this.db.prepare(`
      SELECT id, source_path, content, embedding_json
      FROM policy_chunks
      ORDER BY source_path ASC, chunk_index ASC
    `).all() as Array<ChunkRow & { embedding_json: string }>;

    return rows
      .map((row) => ({
        id: row.id,
        source_path: row.source_path,
        content: row.content,
        score: cosineSimilarity(queryVec, deserializeEmbedding(row.embedding_json)),
        method: "vec_cosine" as const,
      }))
      .filter((row) => row.score > 0)
      .sort((a, b) => b.score - a.score)
      .slice(0, limit);
  }
}

/**
 * Reciprocal-rank fusion over the keyword and semantic rankings. Ties keep the
 * order in which a chunk was first seen (keyword list first).
 */
function fuseReciprocalRank(keyword: RankedChunk[], semantic: RankedChunk[]): RankedChunk[] {
  const fused = new Map<string, RankedChunk>();

  const add = (list: RankedChunk[], weight: number) => {
    list.forEach((chunk, index) => {
      const contribution = weight / (RRF_K + index + 1);
      const existing = fused.get(chunk.id);
      if (existing) {
        existing.score += contribution;
      } else {
        fused.set(chunk.id, { ...chunk, score: contribution, method: "hybrid_rrf" });
      }
    });
  };

  add(keyword, HYBRID_WEIGHTS.keyword);
  add(semantic, HYBRID_WEIGHTS.semantic);

  return Array.from(fused.values()).sort((a, b) => b.score - a.score);
}
