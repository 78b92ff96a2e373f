export class AppError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = new.target.name;
  }
}

export class ConfigError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'CONFIG_INVALID', details);
  }
}

/** A value could not be represented as an exact decimal. */
export class NumericConversionError extends AppError {
  constructor(input: unknown, details?: Record<string, unknown>) {
    super(`cannot convert ${String(input)} to decimal`, 'NUMERIC_CONVERSION', { input: String(input), ...details });
  }
}

/** The venue rejected an order placement or cancellation. */
export class ExecutionError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'EXECUTION_FAILED', details);
  }
}
