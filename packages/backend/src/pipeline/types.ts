import type { GraphStats, RelationType } from "@supply-rag/shared";

export type IngestionPhase =
  | "index"
  | "products"
  | "suppliers"
  | "warehouses"
  | "routes"
  | "relationships"
  | "completed"
  | "error";

export interface IngestionStatusEvent {
  phase: IngestionPhase;
  processed: number;
  total: number;
  message?: string;
}

export interface SkippedEdge {
  type: RelationType;
  from: string;
  to: string;
}

export interface IngestionSummary {
  products: number;
  suppliers: number;
  warehouses: number;
  routes: number;
  relationships: number;
  skippedEdges: SkippedEdge[];
  stats: GraphStats;
}
