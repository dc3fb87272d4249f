import { describe, expect, it } from "vitest";
import { appConfig, missingRequiredSettings, requireSetting, resolveDataDir } from "../../src/config.js";
import { ConfigurationError } from "../../src/errors.js";

describe("config", () => {
  it("returns a trimmed required setting", () => {
    expect(requireSetting("NEO4J_URI", { ...appConfig, NEO4J_URI: " bolt://localhost:7687 " })).toBe(
      "bolt://localhost:7687"
    );
  });

  it("names the missing setting", () => {
    expect(() => requireSetting("GEMINI_API_KEY", { ...appConfig, GEMINI_API_KEY: "  " })).toThrow(
      new ConfigurationError("GEMINI_API_KEY")
    );
    expect(() => requireSetting("NEO4J_PASSWORD", { ...appConfig, NEO4J_PASSWORD: "" })).toThrow(
      "Missing required configuration: NEO4J_PASSWORD is not set"
    );
  });

  it("keeps an absolute data directory as given", () => {
    expect(resolveDataDir({ ...appConfig, DATA_DIR: "/srv/fixtures" })).toBe("/srv/fixtures");
  });

  it("resolves a relative data directory from the repository root", () => {
    expect(resolveDataDir({ ...appConfig, DATA_DIR: "data" }).endsWith("/data")).toBe(true);
  });

  it("lists every blank credential", () => {
    const blank = { ...appConfig, NEO4J_URI: "", NEO4J_USERNAME: "", NEO4J_PASSWORD: " ", GEMINI_API_KEY: "" };

    expect(missingRequiredSettings(blank)).toEqual(["NEO4J_URI", "NEO4J_USERNAME", "NEO4J_PASSWORD", "GEMINI_API_KEY"]);
    expect(
      missingRequiredSettings({ ...blank, NEO4J_URI: "bolt://localhost:7687", GEMINI_API_KEY: "test-secret" })
    ).toEqual(["NEO4J_USERNAME", "NEO4J_PASSWORD"]);
  });
});
