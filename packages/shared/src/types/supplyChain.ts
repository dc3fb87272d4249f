export interface ProductRecord {
  id: string;
  name: string;
  description: string;
  price: number;
  category: string;
}

export interface ProductWithEmbedding extends ProductRecord {
  descriptionEmbedding: number[];
}

export interface SupplierRecord {
  id: string;
  name: string;
  location: string;
  specialization: string;
}

export interface WarehouseRecord {
  id: string;
  name: string;
  location: string;
  capacity: number;
}

/** A transportation route between two warehouses, referenced by id. */
export interface RouteRecord {
  from: string;
  to: string;
  distance: number;
  duration: number;
}

/** One record drives both a SUPPLIES and a STORED_AT edge. */
export interface RelationshipRecord {
  supplier_id: string;
  product_id: string;
  warehouse_id: string;
}

export type NodeLabel = "Product" | "Supplier" | "Warehouse";

export type RelationType = "SUPPLIES" | "STORED_AT" | "CONNECTED_TO";

export interface RankedProduct {
  id: string;
  score: number;
}

export interface ProductContext {
  id: string;
  name: string;
  description: string;
  suppliers: Array<{ name: string }>;
  warehouses: Array<{ name: string; location: string }>;
}
