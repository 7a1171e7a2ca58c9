import { z } from "zod";

export const SEARCH_MODES = ["semantic", "keyword", "hybrid"] as const;

export const SearchMode = z.enum(SEARCH_MODES);

export type SearchMode = z.infer<typeof SearchMode>;

export type SearchMethod = "fts5_bm25" | "vec_cosine" | "hybrid_rrf";

export type SearchHit = {
  id: string;
  sourcePath: string;
  contentSnippet: string;
  caption: string;
  score: number;
  method: SearchMethod;
};

/**
 * Hybrid retrieval capability invoked by the Retriever agent.
 */
export interface PolicySearchCapability {
  selectMode(query: string): SearchMode;
  search(query: string, mode: SearchMode): Promise<SearchHit[]>;
}

export const SearchHitSchema = z.object({
  id: z.string(),
  sourcePath: z.string(),
  contentSnippet: z.string(),
  caption: z.string(),
  score: z.number(),
  method: z.enum(["fts5_bm25", "vec_cosine", "hybrid_rrf"]),
});

/**
 * Content of a Retriever turn, as the Evaluator sees it.
 */
export const RetrieverTurnPayload = z.object({
  query: z.string(),
  mode: SearchMode,
  results: z.array(SearchHitSchema),
  error: z.literal("retrieval_unavailable").optional(),
});

export type RetrieverTurnPayload = z.infer<typeof RetrieverTurnPayload>;

export const PolicyIngestInput = z.object({
  sourcePath: z.string().min(1).max(1024),
  title: z.string().min(1).max(512).optional(),
  content: z.string().min(1).max(2_000_000),
}).strict();

export type PolicyIngestInput = z.infer<typeof PolicyIngestInput>;

export const PolicySearchQuery = z.object({
  q: z.string().min(1).max(2000),
  mode: SearchMode.optional(),
  limit: z.coerce.number().int().min(1).max(50).optional(),
});
