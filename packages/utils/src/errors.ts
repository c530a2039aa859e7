/**
 * Custom Error Classes
 * ====================
 * Every failure the grid build can raise is an AppError with a stable code.
 */

export type ErrorContext = Record<string, unknown>;

/**
 * Base application error class
 */
export class AppError extends Error {
  public readonly code: string;
  public readonly exitCode: number;
  public readonly context?: ErrorContext;
  public readonly isOperational: boolean;

  constructor(
    message: string,
    code: string = 'APP_ERROR',
    exitCode: number = 1,
    context?: ErrorContext,
    isOperational: boolean = true
  ) {
    super(message);
    this.name = this.constructor.name;
    this.code = code;
    this.exitCode = exitCode;
    this.context = context;
    this.isOperational = isOperational;

    Error.captureStackTrace(this, this.constructor);
  }

  /**
   * Convert error to JSON for logging
   */
  toJSON(): ErrorContext {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      exitCode: this.exitCode,
      context: this.context,
      isOperational: this.isOperational,
      stack: this.stack,
    };
  }
}

/**
 * Input validation failures (CLI arguments, workflow inputs)
 */
export class ValidationError extends AppError {
  constructor(message: string, context?: ErrorContext) {
    super(message, 'VALIDATION_ERROR', 2, context);
  }
}

export class NotFoundError extends AppError {
  constructor(resource: string, identifier?: string, context?: ErrorContext) {
    const message = identifier
      ? `${resource} with identifier '${identifier}' not found`
      : `${resource} not found`;
    super(message, 'NOT_FOUND', 1, { resource, identifier, ...context });
  }
}

export class ConfigurationError extends AppError {
  constructor(message: string, configKey?: string, context?: ErrorContext) {
    super(message, 'CONFIGURATION_ERROR', 1, { configKey, ...context });
  }
}

/**
 * Malformed or degenerate axis input
 */
export class GridSpecError extends AppError {
  constructor(message: string, context?: ErrorContext) {
    super(message, 'GRID_SPEC_ERROR', 1, context);
  }
}

/**
 * Two distinct parameter combinations produced the same run name
 */
export class NamingCollisionError extends AppError {
  public readonly collisions: ReadonlyArray<{ runName: string; ordinals: number[] }>;

  constructor(collisions: Array<{ runName: string; ordinals: number[] }>, context?: ErrorContext) {
    const preview = collisions
      .slice(0, 5)
      .map((c) => `${c.runName} (ordinals ${c.ordinals.join(', ')})`)
      .join('; ');
    super(
      `Run names collide for ${collisions.length} name(s): ${preview}. Raise the naming precision or add a distinguishing axis.`,
      'NAMING_COLLISION',
      1,
      { collisions, ...context }
    );
    this.collisions = collisions;
  }
}

/**
 * Filesystem precondition violated while producing a run directory or job artifact
 */
export class MaterializationError extends AppError {
  constructor(message: string, path?: string, context?: ErrorContext) {
    super(message, 'MATERIALIZATION_ERROR', 1, { path, ...context });
  }
}

/**
 * Job count inconsistent with run count
 */
export class PartitionError extends AppError {
  constructor(message: string, context?: ErrorContext) {
    super(message, 'PARTITION_ERROR', 1, context);
  }
}

export class UnknownManagerError extends AppError {
  public readonly manager: string;

  constructor(manager: string, supported: readonly string[]) {
    super(
      `Unknown manager '${manager}'. Supported managers: ${supported.join(', ')}`,
      'UNKNOWN_MANAGER',
      1,
      { manager, supported }
    );
    this.manager = manager;
  }
}

/**
 * Underlying catalog storage fault
 */
export class CatalogError extends AppError {
  constructor(message: string, operation?: string, context?: ErrorContext) {
    super(message, 'CATALOG_ERROR', 1, { operation, ...context });
  }
}

/**
 * Message of any thrown value
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
