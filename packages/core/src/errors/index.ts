export class PgChainError extends Error {
  constructor(message: string, public code?: string, public override cause?: Error) {
    super(message);
    this.name = 'PgChainError';
    Error.captureStackTrace(this, this.constructor);
  }
}

export class ValidationError extends PgChainError {
  constructor(message: string, public field?: string, cause?: Error) {
    super(message, 'VALIDATION_ERROR', cause);
    this.name = 'ValidationError';
  }
}

export class InvalidTypeConfigurationError extends PgChainError {
  constructor(message: string, public type?: string, cause?: Error) {
    super(message, 'INVALID_TYPE_CONFIGURATION', cause);
    this.name = 'InvalidTypeConfigurationError';
  }
}

export class MissingJoinConditionError extends PgChainError {
  constructor(public table: string) {
    super(`No condition set for join on ${table}, call \`.on(...)\` first`, 'MISSING_JOIN_CONDITION');
    this.name = 'MissingJoinConditionError';
  }
}

export class InvalidSelectTargetError extends PgChainError {
  constructor(public target: unknown) {
    super(
      `Unsupported select target: ${describe(target)}. Expected a column, an aliased expression or a table`,
      'INVALID_SELECT_TARGET',
    );
    this.name = 'InvalidSelectTargetError';
  }
}

export class UnknownColumnError extends PgChainError {
  constructor(public table: string, public column: string) {
    super(`Table ${table} has no column "${column}"`, 'UNKNOWN_COLUMN');
    this.name = 'UnknownColumnError';
  }
}

function describe(value: unknown): string {
  if (value === null) {
    return 'null';
  }
  if (typeof value === 'object') {
    return value.constructor?.name ?? 'object';
  }
  return typeof value;
}
