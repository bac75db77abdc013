/**
 * Custom error classes for table and item operations
 * Every error carries a code and the context of the failing operation
 */

export enum ErrorCode {
  // Configuration errors
  TABLE_NAME_REQUIRED = 'TABLE_NAME_REQUIRED',
  INVALID_TABLE_CONFIG = 'INVALID_TABLE_CONFIG',
  KEY_SCHEMA_REQUIRED = 'KEY_SCHEMA_REQUIRED',
  INVALID_ENVIRONMENT = 'INVALID_ENVIRONMENT',
  INVALID_JSON_FILE = 'INVALID_JSON_FILE',

  // Existence errors
  TABLE_NOT_FOUND = 'TABLE_NOT_FOUND',
  STALE_HANDLE = 'STALE_HANDLE',

  // Provisioning errors
  TABLE_CREATION_FAILED = 'TABLE_CREATION_FAILED',
  INVALID_CREATE_PARAMETERS = 'INVALID_CREATE_PARAMETERS',

  // Backend errors
  DYNAMODB_ERROR = 'DYNAMODB_ERROR',
  UNPROCESSED_ITEMS = 'UNPROCESSED_ITEMS',
  NETWORK_ERROR = 'NETWORK_ERROR',
  AUTHENTICATION_ERROR = 'AUTHENTICATION_ERROR',
  THROTTLING_ERROR = 'THROTTLING_ERROR',
  VALIDATION_ERROR = 'VALIDATION_ERROR',
}

export interface ErrorContext {
  tableName?: string | undefined;
  operation?: string | undefined;
  key?: Record<string, unknown> | undefined;
  itemCount?: number | undefined;
  path?: string | undefined;
  awsErrorName?: string | undefined;
  originalError?: string | undefined;
}

/**
 * Base error class for all table operations
 */
export abstract class DynamoError extends Error {
  public readonly code: ErrorCode;
  public readonly context: ErrorContext;
  public readonly timestamp: Date;

  constructor(code: ErrorCode, message: string, context: ErrorContext = {}) {
    super(message);
    this.name = this.constructor.name;
    this.code = code;
    this.context = context;
    this.timestamp = new Date();

    // Maintains proper stack trace for where our error was thrown (only available on V8)
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  /**
   * Returns a detailed error message with context
   */
  public getDetailedMessage(): string {
    let message = this.message;

    if (this.context.tableName) {
      message += ` (Table: ${this.context.tableName})`;
    }

    if (this.context.operation) {
      message += ` (Operation: ${this.context.operation})`;
    }

    if (this.context.originalError) {
      message += ` (Original: ${this.context.originalError})`;
    }

    return message;
  }

  /**
   * Converts error to a plain object for logging/serialization
   */
  public toJSON(): object {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      context: this.context,
      timestamp: this.timestamp.toISOString(),
      stack: this.stack,
    };
  }
}

/**
 * A table that had to exist does not
 */
export class NotFoundError extends DynamoError {}

/**
 * CreateTable was rejected
 */
export class ProvisioningError extends DynamoError {}

/**
 * Any other failure reported by DynamoDB or the transport
 */
export class BackendError extends DynamoError {}

/**
 * The handle's table has been deleted
 */
export class StaleHandleError extends DynamoError {}

/**
 * Malformed table config, environment or JSON file
 */
export class ConfigError extends DynamoError {}

/**
 * Factory functions for common error scenarios
 */
export class DynamoErrorFactory {
  static tableNameRequired(): ConfigError {
    return new ConfigError(
      ErrorCode.TABLE_NAME_REQUIRED,
      'TableName is required'
    );
  }

  static invalidTableConfig(details: string, tableName?: string): ConfigError {
    return new ConfigError(
      ErrorCode.INVALID_TABLE_CONFIG,
      `Invalid table config: ${details}`,
      { tableName }
    );
  }

  /**
   * A missing table cannot be created from its name alone
   */
  static keySchemaRequired(tableName: string): ConfigError {
    return new ConfigError(
      ErrorCode.KEY_SCHEMA_REQUIRED,
      `KeySchema and AttributeDefinitions are required to create table ${tableName}`,
      { tableName, operation: 'createTable' }
    );
  }

  static invalidEnvironment(details: string): ConfigError {
    return new ConfigError(
      ErrorCode.INVALID_ENVIRONMENT,
      `Invalid environment: ${details}`
    );
  }

  static invalidJsonFile(path: string, details: string): ConfigError {
    return new ConfigError(
      ErrorCode.INVALID_JSON_FILE,
      `Invalid JSON file ${path}: ${details}`,
      { path, operation: 'loadFromJson' }
    );
  }

  static tableNotFound(tableName: string, operation?: string): NotFoundError {
    return new NotFoundError(
      ErrorCode.TABLE_NOT_FOUND,
      `Table ${tableName} does not exist`,
      { tableName, operation }
    );
  }

  static staleHandle(tableName: string, operation: string): StaleHandleError {
    return new StaleHandleError(
      ErrorCode.STALE_HANDLE,
      `Table ${tableName} has been deleted; the handle can no longer be used`,
      { tableName, operation }
    );
  }

  static tableCreationFailed(tableName: string, error: unknown): ProvisioningError {
    return new ProvisioningError(
      ErrorCode.TABLE_CREATION_FAILED,
      `Failed to create table ${tableName}`,
      {
        tableName,
        operation: 'createTable',
        awsErrorName: errorName(error),
        originalError: errorMessage(error),
      }
    );
  }

  /**
   * The config names a key schema, attribute definitions or throughput that
   * CreateTable cannot accept
   */
  static invalidCreateParameters(tableName: string, details: string): ProvisioningError {
    return new ProvisioningError(
      ErrorCode.INVALID_CREATE_PARAMETERS,
      `Invalid parameters for creating table ${tableName}: ${details}`,
      { tableName, operation: 'createTable' }
    );
  }

  static unprocessedItems(tableName: string, itemCount: number): BackendError {
    return new BackendError(
      ErrorCode.UNPROCESSED_ITEMS,
      `${itemCount} items were left unprocessed by BatchWriteItem`,
      { tableName, itemCount, operation: 'flushBatch' }
    );
  }

  /**
   * Wraps an SDK or transport failure. DynamoErrors pass through unchanged.
   */
  static backendError(error: unknown, context: ErrorContext = {}): DynamoError {
    if (isDynamoError(error)) return error;
    const code =
      error instanceof Error ? categorizeAwsError(error) : ErrorCode.DYNAMODB_ERROR;
    return new BackendError(code, `DynamoDB request failed: ${errorMessage(error)}`, {
      ...context,
      awsErrorName: errorName(error),
      originalError: errorMessage(error),
    });
  }
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function errorName(error: unknown): string | undefined {
  return error instanceof Error ? error.name : undefined;
}

/**
 * Error type guards for runtime type checking
 */
export function isDynamoError(error: unknown): error is DynamoError {
  return error instanceof DynamoError;
}

export function isNotFoundError(error: unknown): error is NotFoundError {
  return error instanceof NotFoundError;
}

export function isProvisioningError(error: unknown): error is ProvisioningError {
  return error instanceof ProvisioningError;
}

export function isBackendError(error: unknown): error is BackendError {
  return error instanceof BackendError;
}

export function isStaleHandleError(error: unknown): error is StaleHandleError {
  return error instanceof StaleHandleError;
}

export function isConfigError(error: unknown): error is ConfigError {
  return error instanceof ConfigError;
}

/**
 * Determines the error code of an AWS SDK error from its name and message
 */
export function categorizeAwsError(error: Error): ErrorCode {
  const name = error.name.toLowerCase();
  const message = error.message.toLowerCase();

  if (
    name.includes('throttl') ||
    name.includes('provisionedthroughputexceeded') ||
    message.includes('throttl') ||
    message.includes('limit exceeded')
  ) {
    return ErrorCode.THROTTLING_ERROR;
  }

  if (name.includes('validation') || message.includes('invalid')) {
    return ErrorCode.VALIDATION_ERROR;
  }

  if (
    name.includes('accessdenied') ||
    name.includes('unrecognizedclient') ||
    message.includes('access denied') ||
    message.includes('unauthorized')
  ) {
    return ErrorCode.AUTHENTICATION_ERROR;
  }

  if (
    name.includes('timeout') ||
    message.includes('network') ||
    message.includes('timeout') ||
    message.includes('econnrefused')
  ) {
    return ErrorCode.NETWORK_ERROR;
  }

  return ErrorCode.DYNAMODB_ERROR;
}
