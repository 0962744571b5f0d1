import { StatusCodes } from 'http-status-codes';

export class ClusterviewError extends Error {
  constructor(
    message: string,
    public readonly code = 'INTERNAL_ERROR',
    public readonly status: number = StatusCodes.INTERNAL_SERVER_ERROR,
    public readonly details?: unknown
  ) {
    super(message);
    this.name = 'ClusterviewError';
  }
}

export class NotFoundError extends ClusterviewError {
  constructor(message = 'not found', details?: unknown) {
    super(message, 'NOT_FOUND', StatusCodes.NOT_FOUND, details);
    this.name = 'NotFoundError';
  }
}

export class ValidationError extends ClusterviewError {
  constructor(message = 'invalid request', details?: unknown) {
    super(message, 'VALIDATION_ERROR', StatusCodes.BAD_REQUEST, details);
    this.name = 'ValidationError';
  }
}

/**
 * A dashboard module could not be registered or could not install its routes.
 */
export class ModuleRegistrationError extends ClusterviewError {
  constructor(message: string, details?: unknown) {
    super(message, 'MODULE_REGISTRATION', StatusCodes.INTERNAL_SERVER_ERROR, details);
    this.name = 'ModuleRegistrationError';
  }
}

/**
 * Two modules resolved to the same content prefix.
 */
export class DuplicateContentPathError extends ModuleRegistrationError {
  constructor(
    public readonly contentPath: string,
    existingModule: string,
    rejectedModule: string
  ) {
    super(`content path ${contentPath} is already registered by module "${existingModule}"`, {
      contentPath,
      existingModule,
      rejectedModule
    });
    this.name = 'DuplicateContentPathError';
  }
}

/**
 * Registration was attempted after the registry snapshot had been built.
 */
export class RegistryFrozenError extends ModuleRegistrationError {
  constructor(moduleName: string) {
    super(`cannot register module "${moduleName}": registry is frozen`, { module: moduleName });
    this.name = 'RegistryFrozenError';
  }
}

/**
 * Render an unknown thrown value as a message for logs and annotations.
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
