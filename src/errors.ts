export class SchemaError extends Error {
  readonly missingColumns: string[];

  constructor(missingColumns: string[]) {
    super(`Missing required columns: ${missingColumns.join(", ")}`);
    this.name = "SchemaError";
    this.missingColumns = missingColumns;
  }
}

export class NoTableError extends Error {
  constructor() {
    super("No library loaded");
    this.name = "NoTableError";
  }
}

export class EnrichmentStateError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "EnrichmentStateError";
  }
}
