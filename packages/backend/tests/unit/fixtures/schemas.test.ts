import { describe, expect, it } from "vitest";
import { FixtureRecordError } from "../../../src/errors.js";
import type { RawFixtureSet } from "../../../src/fixtures/fixtureLoader.js";
import { parseFixtureSet } from "../../../src/fixtures/schemas.js";

function rawSet(overrides: Partial<RawFixtureSet> = {}): RawFixtureSet {
  return {
    products: [
      { id: "p1", name: "Laptop", description: "A portable computer", price: 999.5, category: "Computers" }
    ],
    suppliers: [{ id: "s1", name: "Acme Parts", location: "Shenzhen", specialization: "Electronics" }],
    warehouses: [{ id: "w1", name: "Central Hub", location: "Berlin", capacity: 50000 }],
    routes: [{ from: "w1", to: "w2", distance: 500, duration: 6 }],
    relationships: [{ supplier_id: "s1", product_id: "p1", warehouse_id: "w1" }],
    ...overrides
  };
}

describe("parseFixtureSet", () => {
  it("accepts well-formed records and keeps dangling references", () => {
    const fixtures = parseFixtureSet(rawSet());

    expect(fixtures.products[0]?.price).toBe(999.5);
    expect(fixtures.routes).toEqual([{ from: "w1", to: "w2", distance: 500, duration: 6 }]);
  });

  it("drops unknown fields", () => {
    const fixtures = parseFixtureSet(
      rawSet({
        suppliers: [
          { id: "s1", name: "Acme Parts", location: "Shenzhen", specialization: "Electronics", rating: 5 }
        ]
      })
    );

    expect(fixtures.suppliers[0]).toEqual({
      id: "s1",
      name: "Acme Parts",
      location: "Shenzhen",
      specialization: "Electronics"
    });
  });

  it("names the fixture, index and field of an invalid record", () => {
    const raw = rawSet({
      warehouses: [
        { id: "w1", name: "Central Hub", location: "Berlin", capacity: 50000 },
        { id: "w2", name: "North Depot", location: "Hamburg", capacity: "large" }
      ]
    });

    const error = (() => {
      try {
        parseFixtureSet(raw);
        return null;
      } catch (caught) {
        return caught;
      }
    })();

    expect(error).toBeInstanceOf(FixtureRecordError);
    expect(error).toMatchObject({
      fixture: "warehouses",
      index: 1,
      issues: ["capacity: Expected number, received string"]
    });
  });

  it("rejects a fixture that is not an array", () => {
    expect(() => parseFixtureSet(rawSet({ routes: { from: "w1" } }))).toThrow(
      "Invalid routes record at index -1: expected an array of records"
    );
  });

  it("rejects an empty id", () => {
    expect(() =>
      parseFixtureSet(rawSet({ relationships: [{ supplier_id: "", product_id: "p1", warehouse_id: "w1" }] }))
    ).toThrow(FixtureRecordError);
  });
});
