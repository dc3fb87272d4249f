import neo4j, { type Integer, type Session } from "neo4j-driver";
import type { NearestNeighborSearch, RankedProduct } from "@supply-rag/shared";

export type RetrievalStrategy = "brute-force" | "vector-index";

export type SessionRunner = <T>(fn: (session: Session) => Promise<T>) => Promise<T>;

export interface EmbeddedCandidate {
  id: string;
  embedding: number[] | null | undefined;
}

export function dotProduct(a: number[], b: number[]): number {
  let sum = 0;
  for (let i = 0; i < a.length; i += 1) {
    sum += (a[i] ?? 0) * (b[i] ?? 0);
  }
  return sum;
}

/**
 * Exact ranking by unnormalized dot product. Candidates without an embedding,
 * or with one of a different length than the query, are left out. Ties keep
 * their input order.
 */
export function rankByDotProduct(
  candidates: EmbeddedCandidate[],
  vector: number[],
  k: number
): RankedProduct[] {
  if (k <= 0) {
    return [];
  }

  return candidates
    .flatMap((candidate) =>
      candidate.embedding && candidate.embedding.length === vector.length
        ? [{ id: candidate.id, score: dotProduct(candidate.embedding, vector) }]
        : []
    )
    .sort((a, b) => b.score - a.score)
    .slice(0, k);
}

/**
 * Linear scan over every Product, scoring inside Cypher. Matches the ranking
 * of {@link rankByDotProduct}.
 */
export class CypherBruteForceSearch implements NearestNeighborSearch {
  constructor(private readonly run: SessionRunner) {}

  async findTopK(vector: number[], k: number): Promise<RankedProduct[]> {
    if (vector.length === 0 || k <= 0) {
      return [];
    }

    return this.run(async (session) => {
      const result = await session.run(
        `
        MATCH (p:Product)
        WHERE p.description_embedding IS NOT NULL
          AND size(p.description_embedding) = size($embedding)
        WITH p,
             reduce(s = 0.0, i IN range(0, size($embedding) - 1) |
                    s + p.description_embedding[i] * $embedding[i]) AS score
        RETURN p.id AS id, score
        ORDER BY score DESC
        LIMIT $k
        `,
        { embedding: vector, k: neo4j.int(Math.trunc(k)) }
      );

      return result.records.map((record) => toRankedProduct(record.get("id"), record.get("score")));
    });
  }
}

/**
 * Approximate search through the store's vector index. Scores are the index's
 * normalized cosine similarity, not raw dot products.
 */
export class VectorIndexSearch implements NearestNeighborSearch {
  constructor(
    private readonly run: SessionRunner,
    private readonly indexName: string
  ) {}

  async findTopK(vector: number[], k: number): Promise<RankedProduct[]> {
    if (vector.length === 0 || k <= 0) {
      return [];
    }

    return this.run(async (session) => {
      const result = await session.run(
        `
        CALL db.index.vector.queryNodes($indexName, $k, $embedding)
        YIELD node, score
        RETURN node.id AS id, score
        ORDER BY score DESC
        `,
        { indexName: this.indexName, embedding: vector, k: neo4j.int(Math.trunc(k)) }
      );

      return result.records.map((record) => toRankedProduct(record.get("id"), record.get("score")));
    });
  }
}

function toRankedProduct(id: unknown, score: unknown): RankedProduct {
  let numericScore = 0;
  if (typeof score === "number") {
    numericScore = score;
  } else if (neo4j.isInt(score)) {
    numericScore = (score as Integer).toNumber();
  }
  return {
    id: typeof id === "string" ? id : String(id),
    score: numericScore
  };
}
