/**
 * Raised when the run itself is mis-configured (a required setting is absent or
 * a table does not have the shape the pipeline needs). Per-row data problems
 * never raise; they only show up in match statistics.
 */
export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigurationError";
  }
}

export class TableSchemaError extends ConfigurationError {
  readonly table: string;
  readonly missingColumns: string[];

  constructor(table: string, missingColumns: string[]) {
    super(`Table "${table}" is missing required column(s): ${missingColumns.join(", ")}`);
    this.name = "TableSchemaError";
    this.table = table;
    this.missingColumns = missingColumns;
  }
}
