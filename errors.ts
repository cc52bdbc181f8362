export class AppError extends Error {
  constructor(
    public code: string,
    message: string,
    public details?: Array<{ field: string; message: string }>,
  ) {
    super(message);
    this.name = 'AppError';
  }
}

export class MissingRequiredDatasetError extends AppError {
  constructor(dataset: string, reason?: string) {
    super(
      'MISSING_REQUIRED_DATASET',
      reason
        ? `The ${dataset} dataset is required for the analysis but ${reason}`
        : `The ${dataset} dataset is required for the analysis but was not found`,
    );
    this.name = 'MissingRequiredDatasetError';
  }
}

export class SchemaError extends AppError {
  constructor(dataset: string, missingColumns: string[]) {
    super(
      'SCHEMA_ERROR',
      `Dataset ${dataset} is missing column(s): ${missingColumns.join(', ')}`,
      missingColumns.map((field) => ({ field, message: 'Column is missing from the dataset' })),
    );
    this.name = 'SchemaError';
  }
}

export class EmptyInputError extends AppError {
  constructor(what: string) {
    super('EMPTY_INPUT', `Cannot compute ${what} over zero eligible rows`);
    this.name = 'EmptyInputError';
  }
}

export class ConfigError extends AppError {
  constructor(details: Array<{ field: string; message: string }>) {
    super(
      'CONFIG_ERROR',
      `Invalid configuration: ${details.map((d) => `${d.field} ${d.message}`).join('; ')}`,
      details,
    );
    this.name = 'ConfigError';
  }
}
