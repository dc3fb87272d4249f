export class ConfigurationError extends Error {
  constructor(readonly setting: string) {
    super(`Missing required configuration: ${setting} is not set`);
    this.name = "ConfigurationError";
  }
}

export class FixtureNotFoundError extends Error {
  constructor(readonly path: string) {
    super(`Fixture file not found: ${path}`);
    this.name = "FixtureNotFoundError";
  }
}

export class FixtureParseError extends Error {
  constructor(readonly path: string, cause: unknown) {
    super(`Fixture file is not valid JSON: ${path}`, { cause });
    this.name = "FixtureParseError";
  }
}

export class FixtureRecordError extends Error {
  constructor(
    readonly fixture: string,
    readonly index: number,
    readonly issues: string[]
  ) {
    super(`Invalid ${fixture} record at index ${index}: ${issues.join("; ")}`);
    this.name = "FixtureRecordError";
  }
}

export class EmbeddingDimensionError extends Error {
  constructor(readonly expected: number, readonly actual: number) {
    super(`Embedding has ${actual} dimensions, expected ${expected}`);
    this.name = "EmbeddingDimensionError";
  }
}

export class GraphStoreConnectionError extends Error {
  constructor(message: string, cause?: unknown) {
    super(message, { cause });
    this.name = "GraphStoreConnectionError";
  }
}

export class GraphQueryError extends Error {
  constructor(message: string, cause?: unknown) {
    super(message, { cause });
    this.name = "GraphQueryError";
  }
}
