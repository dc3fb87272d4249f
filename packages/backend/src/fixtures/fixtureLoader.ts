import { readFile } from "node:fs/promises";
import { resolve } from "node:path";
import { FixtureNotFoundError, FixtureParseError } from "../errors.js";

export const fixtureFiles = {
  products: "products.json",
  suppliers: "suppliers.json",
  warehouses: "warehouses.json",
  routes: "routes.json",
  relationships: "relationships.json"
} as const;

export type FixtureName = keyof typeof fixtureFiles;

export type RawFixtureSet = Record<FixtureName, unknown>;

/**
 * Reads a fixture file and decodes it as JSON. The shape of the decoded value
 * is not checked here.
 */
export async function loadJsonFixture(path: string): Promise<unknown> {
  let content: string;
  try {
    content = await readFile(path, "utf8");
  } catch (error) {
    if (isNodeError(error) && error.code === "ENOENT") {
      throw new FixtureNotFoundError(path);
    }
    throw error;
  }

  try {
    return JSON.parse(content) as unknown;
  } catch (error) {
    throw new FixtureParseError(path, error);
  }
}

export async function loadFixtureSet(dataDir: string): Promise<RawFixtureSet> {
  return {
    products: await loadJsonFixture(resolve(dataDir, fixtureFiles.products)),
    suppliers: await loadJsonFixture(resolve(dataDir, fixtureFiles.suppliers)),
    warehouses: await loadJsonFixture(resolve(dataDir, fixtureFiles.warehouses)),
    routes: await loadJsonFixture(resolve(dataDir, fixtureFiles.routes)),
    relationships: await loadJsonFixture(resolve(dataDir, fixtureFiles.relationships))
  };
}

function isNodeError(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && "code" in error;
}
