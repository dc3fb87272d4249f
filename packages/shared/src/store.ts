import type {
  ProductContext,
  ProductWithEmbedding,
  RankedProduct,
  RelationshipRecord,
  RouteRecord,
  SupplierRecord,
  WarehouseRecord
} from "./types/supplyChain.js";

export interface GraphStats {
  nodeCounts: {
    Product: number;
    Supplier: number;
    Warehouse: number;
  };
  edgeCounts: {
    SUPPLIES: number;
    STORED_AT: number;
    CONNECTED_TO: number;
  };
}

/**
 * Ranked nearest-neighbour lookup over product description embeddings.
 * Products without an embedding never appear in the result.
 */
export interface NearestNeighborSearch {
  findTopK(vector: number[], k: number): Promise<RankedProduct[]>;
}

export interface NodeUpsertStore {
  ensureVectorIndex(): Promise<void>;
  upsertProduct(product: ProductWithEmbedding): Promise<void>;
  upsertSuppliers(suppliers: SupplierRecord[]): Promise<void>;
  upsertWarehouses(warehouses: WarehouseRecord[]): Promise<void>;
}

/**
 * Edge merges match both endpoints first; when either is missing the query
 * matches zero rows and nothing is created. The boolean tells whether the
 * edge exists after the call.
 */
export interface EdgeMergeStore {
  mergeRoute(route: RouteRecord): Promise<boolean>;
  mergeSupplies(relationship: RelationshipRecord): Promise<boolean>;
  mergeStoredAt(relationship: RelationshipRecord): Promise<boolean>;
}

export interface ProductContextStore {
  getProductContexts(productIds: string[]): Promise<ProductContext[]>;
}

export interface SupplyChainGraphStore
  extends NodeUpsertStore,
    EdgeMergeStore,
    ProductContextStore,
    NearestNeighborSearch {
  connect(): Promise<void>;
  disconnect(): Promise<void>;
  healthCheck(): Promise<boolean>;
  getStats(): Promise<GraphStats>;
}
