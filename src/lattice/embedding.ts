export const POLICY_EMBED_DIM = 256;

const hashToken = (token: string): number => {
  let hash = 5381;
  for (let i = 0; i < token.length; i += 1) {
    hash = ((hash << 5) + hash + token.charCodeAt(i)) >>> 0;
  }
  return hash >>> 0;
};

export const tokenize = (text: string): string[] =>
  text.toLowerCase().match(/[a-z0-9]{2,}/g) ?? [];

/**
 * Hashed bag-of-words vector, L2-normalized so a dot product is the cosine.
 */
export const computePolicyEmbedding = (text: string, dim = POLICY_EMBED_DIM): number[] => {
  const vec = new Array<number>(dim).fill(0);

  for (const token of tokenize(text)) {
    vec[hashToken(token) % dim] += 1;
  }

  const norm = Math.sqrt(vec.reduce((sum, value) => sum + value * value, 0));
  if (norm > 0) {
    for (let i = 0; i < vec.length; i += 1) {
      vec[i] = vec[i] / norm;
    }
  }

  return vec;
};

export const cosineSimilarity = (a: readonly number[], b: readonly number[]): number => {
  const n = Math.min(a.length, b.length);
  let dot = 0;
  for (let i = 0; i < n; i += 1) {
    dot += a[i] * b[i];
  }
  return dot;
};

export const serializeEmbedding = (embedding: number[]): string => JSON.stringify(embedding);

export const deserializeEmbedding = (raw: string): number[] => {
  const parsed: unknown = JSON.parse(raw);
  if (!Array.isArray(parsed)) return [];
  return parsed.filter((value): value is number => typeof value === "number");
};
