import neo4j, { type Driver, type Integer, type Session } from "neo4j-driver";
import type {
  GraphStats,
  NearestNeighborSearch,
  ProductContext,
  ProductWithEmbedding,
  RankedProduct,
  RelationshipRecord,
  RouteRecord,
  SupplierRecord,
  SupplyChainGraphStore,
  WarehouseRecord
} from "@supply-rag/shared";
import { appConfig, requireSetting } from "../config.js";
import { GraphQueryError, GraphStoreConnectionError } from "../errors.js";
import {
  CypherBruteForceSearch,
  VectorIndexSearch,
  type RetrievalStrategy,
  type SessionRunner
} from "./nearestNeighbor.js";

export const PRODUCT_VECTOR_INDEX = "product_description_embeddings";

export interface Neo4jSupplyChainStoreConfig {
  uri: string;
  user: string;
  password: string;
  database?: string;
  embeddingDimensions: number;
  retrievalStrategy?: RetrievalStrategy;
}

type AccessMode = "READ" | "WRITE";

const connectivityErrorCodes = new Set([
  "ServiceUnavailable",
  "SessionExpired",
  "Neo.ClientError.Security.Unauthorized",
  "Neo.ClientError.Security.AuthenticationRateLimit"
]);

export class Neo4jSupplyChainStore implements SupplyChainGraphStore {
  private driver: Driver | null = null;
  private readonly search: NearestNeighborSearch;

  constructor(private readonly config: Neo4jSupplyChainStoreConfig) {
    const runner: SessionRunner = (fn) => this.withSession("READ", fn);
    this.search =
      config.retrievalStrategy === "vector-index"
        ? new VectorIndexSearch(runner, PRODUCT_VECTOR_INDEX)
        : new CypherBruteForceSearch(runner);
  }

  static fromEnv(): Neo4jSupplyChainStore {
    return new Neo4jSupplyChainStore({
      uri: requireSetting("NEO4J_URI"),
      user: requireSetting("NEO4J_USERNAME"),
      password: requireSetting("NEO4J_PASSWORD"),
      database: appConfig.NEO4J_DATABASE,
      embeddingDimensions: appConfig.EMBEDDING_DIMENSIONS,
      retrievalStrategy: appConfig.RETRIEVAL_STRATEGY
    });
  }

  async connect(): Promise<void> {
    if (this.driver) {
      return;
    }

    this.driver = neo4j.driver(
      this.config.uri,
      neo4j.auth.basic(this.config.user, this.config.password)
    );

    try {
      await this.driver.verifyConnectivity();
    } catch (error) {
      await this.disconnect();
      throw new GraphStoreConnectionError(
        `Unable to connect to Neo4j at ${this.config.uri}: ${describeError(error)}`,
        error
      );
    }
  }

  async disconnect(): Promise<void> {
    if (!this.driver) {
      return;
    }

    await this.driver.close();
    this.driver = null;
  }

  async healthCheck(): Promise<boolean> {
    if (!this.driver) {
      return false;
    }

    try {
      await this.withSession("READ", async (session) => {
        await session.run("RETURN 1 AS ok");
      });
      return true;
    } catch {
      return false;
    }
  }

  async ensureVectorIndex(): Promise<void> {
    const dimensions = Math.trunc(this.config.embeddingDimensions);

    await this.withSession("WRITE", async (session) => {
      await session.run(
        `
        CREATE VECTOR INDEX ${PRODUCT_VECTOR_INDEX} IF NOT EXISTS
        FOR (p:Product) ON (p.description_embedding)
        OPTIONS {indexConfig: {
          \`vector.dimensions\`: ${dimensions},
          \`vector.similarity_function\`: 'cosine'
        }}
        `
      );
    });
  }

  async upsertProduct(product: ProductWithEmbedding): Promise<void> {
    await this.withSession("WRITE", async (session) => {
      await session.run(
        `
        MERGE (p:Product {id: $id})
        SET p.name = $name,
            p.description = $description,
            p.price = $price,
            p.category = $category,
            p.description_embedding = $embedding
        `,
        {
          id: product.id,
          name: product.name,
          description: product.description,
          price: product.price,
          category: product.category,
          embedding: product.descriptionEmbedding
        }
      );
    });
  }

  async upsertSuppliers(suppliers: SupplierRecord[]): Promise<void> {
    if (suppliers.length === 0) {
      return;
    }

    await this.withSession("WRITE", async (session) => {
      await session.run(
        `
        UNWIND $suppliers AS supplier
        MERGE (s:Supplier {id: supplier.id})
        SET s.name = supplier.name,
            s.location = supplier.location,
            s.specialization = supplier.specialization
        `,
        { suppliers }
      );
    });
  }

  async upsertWarehouses(warehouses: WarehouseRecord[]): Promise<void> {
    if (warehouses.length === 0) {
      return;
    }

    await this.withSession("WRITE", async (session) => {
      await session.run(
        `
        UNWIND $warehouses AS warehouse
        MERGE (w:Warehouse {id: warehouse.id})
        SET w.name = warehouse.name,
            w.location = warehouse.location,
            w.capacity = warehouse.capacity
        `,
        { warehouses }
      );
    });
  }

  async mergeRoute(route: RouteRecord): Promise<boolean> {
    return this.runEdgeMerge(
      `
      MATCH (w1:Warehouse {id: $from})
      MATCH (w2:Warehouse {id: $to})
      MERGE (w1)-[r:CONNECTED_TO]->(w2)
      SET r.distance = $distance,
          r.duration = $duration
      RETURN count(r) AS edges
      `,
      { ...route }
    );
  }

  async mergeSupplies(relationship: RelationshipRecord): Promise<boolean> {
    return this.runEdgeMerge(
      `
      MATCH (s:Supplier {id: $supplierId})
      MATCH (p:Product {id: $productId})
      MERGE (s)-[r:SUPPLIES]->(p)
      RETURN count(r) AS edges
      `,
      { supplierId: relationship.supplier_id, productId: relationship.product_id }
    );
  }

  async mergeStoredAt(relationship: RelationshipRecord): Promise<boolean> {
    return this.runEdgeMerge(
      `
      MATCH (p:Product {id: $productId})
      MATCH (w:Warehouse {id: $warehouseId})
      MERGE (p)-[r:STORED_AT]->(w)
      RETURN count(r) AS edges
      `,
      { productId: relationship.product_id, warehouseId: relationship.warehouse_id }
    );
  }

  findTopK(vector: number[], k: number): Promise<RankedProduct[]> {
    return this.search.findTopK(vector, k);
  }

  async getProductContexts(productIds: string[]): Promise<ProductContext[]> {
    if (productIds.length === 0) {
      return [];
    }

    return this.withSession("READ", async (session) => {
      const result = await session.run(
        `
        UNWIND range(0, size($ids) - 1) AS rank
        MATCH (p:Product {id: $ids[rank]})
        OPTIONAL MATCH (p)<-[:SUPPLIES]-(s:Supplier)
        WITH rank, p, collect(DISTINCT s.name) AS suppliers
        OPTIONAL MATCH (p)-[:STORED_AT]->(w:Warehouse)
        WITH rank, p, suppliers,
             collect(DISTINCT {name: w.name, location: w.location}) AS warehouses
        RETURN p.id AS id,
               p.name AS name,
               p.description AS description,
               suppliers,
               warehouses
        ORDER BY rank
        `,
        { ids: productIds }
      );

      return result.records.map((record) => ({
        id: this.toString(record.get("id"), ""),
        name: this.toString(record.get("name"), ""),
        description: this.toString(record.get("description"), ""),
        suppliers: this.toArray(record.get("suppliers"))
          .filter((name): name is string => typeof name === "string")
          .map((name) => ({ name })),
        warehouses: this.toArray(record.get("warehouses"))
          .map((item) => this.asRecord(item))
          .filter((item) => typeof item.name === "string")
          .map((item) => ({
            name: this.toString(item.name, ""),
            location: this.toString(item.location, "")
          }))
      }));
    });
  }

  async getStats(): Promise<GraphStats> {
    return this.withSession("READ", async (session) => {
      const result = await session.run(
        `
        CALL { MATCH (n:Product) RETURN count(n) AS products }
        CALL { MATCH (n:Supplier) RETURN count(n) AS suppliers }
        CALL { MATCH (n:Warehouse) RETURN count(n) AS warehouses }
        CALL { MATCH (:Supplier)-[r:SUPPLIES]->(:Product) RETURN count(r) AS supplies }
        CALL { MATCH (:Product)-[r:STORED_AT]->(:Warehouse) RETURN count(r) AS storedAt }
        CALL { MATCH (:Warehouse)-[r:CONNECTED_TO]->(:Warehouse) RETURN count(r) AS connectedTo }
        RETURN products, suppliers, warehouses, supplies, storedAt, connectedTo
        `
      );

      const record = result.records[0];
      const read = (field: string): number => (record ? this.toNumber(record.get(field)) : 0);

      return {
        nodeCounts: {
          Product: read("products"),
          Supplier: read("suppliers"),
          Warehouse: read("warehouses")
        },
        edgeCounts: {
          SUPPLIES: read("supplies"),
          STORED_AT: read("storedAt"),
          CONNECTED_TO: read("connectedTo")
        }
      };
    });
  }

  private async runEdgeMerge(query: string, params: Record<string, unknown>): Promise<boolean> {
    return this.withSession("WRITE", async (session) => {
      const result = await session.run(query, params);
      const edges = result.records[0]?.get("edges");
      return this.toNumber(edges) > 0;
    });
  }

  /**
   * Opens a session for a single operation and closes it on every exit path.
   * Driver errors are rethrown as connectivity or query errors.
   */
  private async withSession<T>(accessMode: AccessMode, fn: (session: Session) => Promise<T>): Promise<T> {
    const session = this.getDriver().session({
      database: this.config.database ?? "neo4j",
      defaultAccessMode: accessMode === "READ" ? neo4j.session.READ : neo4j.session.WRITE
    });

    try {
      return await fn(session);
    } catch (error) {
      throw this.translateError(error);
    } finally {
      await session.close();
    }
  }

  private getDriver(): Driver {
    if (!this.driver) {
      throw new GraphStoreConnectionError("Neo4j driver is not connected. Call connect() first.");
    }
    return this.driver;
  }

  private translateError(error: unknown): Error {
    if (error instanceof GraphStoreConnectionError || error instanceof GraphQueryError) {
      return error;
    }

    const code = errorCode(error);
    if (code !== undefined && connectivityErrorCodes.has(code)) {
      return new GraphStoreConnectionError(`Neo4j connection failed: ${describeError(error)}`, error);
    }
    return new GraphQueryError(`Neo4j query failed: ${describeError(error)}`, error);
  }

  private asRecord(value: unknown): Record<string, unknown> {
    if (value && typeof value === "object" && !Array.isArray(value)) {
      return value as Record<string, unknown>;
    }
    return {};
  }

  private toArray(value: unknown): unknown[] {
    return Array.isArray(value) ? value : [];
  }

  private toString(value: unknown, fallback: string): string {
    if (typeof value === "string") {
      return value;
    }
    if (typeof value === "number" || typeof value === "boolean") {
      return String(value);
    }
    return fallback;
  }

  private toNumber(value: unknown, fallback = 0): number {
    if (typeof value === "number") {
      return Number.isFinite(value) ? value : fallback;
    }
    if (neo4j.isInt(value)) {
      return (value as Integer).toNumber();
    }
    return fallback;
  }
}

// Driver errors (Neo4jError and the bolt connection errors) carry a string code.
function errorCode(error: unknown): string | undefined {
  if (error instanceof Error && "code" in error && typeof error.code === "string") {
    return error.code;
  }
  return undefined;
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
