export class IngestError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "IngestError";
  }
}

export class SourceNotFoundError extends IngestError {
  readonly source: string;

  constructor(source: string, options?: { cause?: unknown }) {
    super(`Data file not found or unreadable: ${source}`, options);
    this.name = "SourceNotFoundError";
    this.source = source;
  }
}

export class SchemaError extends IngestError {
  readonly columns: string[];

  constructor(message: string, columns: string[]) {
    super(message);
    this.name = "SchemaError";
    this.columns = columns;
  }
}
