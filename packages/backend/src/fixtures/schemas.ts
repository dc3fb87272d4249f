import { z } from "zod";
import type {
  ProductRecord,
  RelationshipRecord,
  RouteRecord,
  SupplierRecord,
  WarehouseRecord
} from "@supply-rag/shared";
import { FixtureRecordError } from "../errors.js";
import type { FixtureName, RawFixtureSet } from "./fixtureLoader.js";

const productSchema = z.object({
  id: z.string().min(1),
  name: z.string(),
  description: z.string(),
  price: z.number(),
  category: z.string()
});

const supplierSchema = z.object({
  id: z.string().min(1),
  name: z.string(),
  location: z.string(),
  specialization: z.string()
});

const warehouseSchema = z.object({
  id: z.string().min(1),
  name: z.string(),
  location: z.string(),
  capacity: z.number()
});

const routeSchema = z.object({
  from: z.string().min(1),
  to: z.string().min(1),
  distance: z.number(),
  duration: z.number()
});

const relationshipSchema = z.object({
  supplier_id: z.string().min(1),
  product_id: z.string().min(1),
  warehouse_id: z.string().min(1)
});

export interface FixtureSet {
  products: ProductRecord[];
  suppliers: SupplierRecord[];
  warehouses: WarehouseRecord[];
  routes: RouteRecord[];
  relationships: RelationshipRecord[];
}

function parseRecords<T>(fixture: FixtureName, raw: unknown, schema: z.ZodType<T>): T[] {
  if (!Array.isArray(raw)) {
    throw new FixtureRecordError(fixture, -1, ["expected an array of records"]);
  }

  return raw.map((item: unknown, index) => {
    const result = schema.safeParse(item);
    if (!result.success) {
      throw new FixtureRecordError(
        fixture,
        index,
        result.error.issues.map((issue) => `${issue.path.join(".") || "(record)"}: ${issue.message}`)
      );
    }
    return result.data;
  });
}

export function parseFixtureSet(raw: RawFixtureSet): FixtureSet {
  return {
    products: parseRecords("products", raw.products, productSchema),
    suppliers: parseRecords("suppliers", raw.suppliers, supplierSchema),
    warehouses: parseRecords("warehouses", raw.warehouses, warehouseSchema),
    routes: parseRecords("routes", raw.routes, routeSchema),
    relationships: parseRecords("relationships", raw.relationships, relationshipSchema)
  };
}
