export type RepositoryOperation = 'find' | 'stage' | 'commit' | 'rollback';

/**
 * A catalog document that could not be read or is not well-formed XML
 */
export class MalformedCatalogError extends Error {
  readonly document: string;

  constructor(document: string, message: string, options?: ErrorOptions) {
    super(`Malformed catalog ${document}: ${message}`, options);
    this.name = 'MalformedCatalogError';
    this.document = document;
  }
}

/**
 * A diagnosis repository call that failed; fatal for the current run
 */
export class RepositoryError extends Error {
  readonly operation: RepositoryOperation;

  constructor(operation: RepositoryOperation, message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'RepositoryError';
    this.operation = operation;
  }
}

export class ConfigurationError extends Error {
  readonly problems: string[];

  constructor(problems: string[]) {
    super(`Invalid import configuration: ${problems.join('; ')}`);
    this.name = 'ConfigurationError';
    this.problems = problems;
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Wrap anything a repository throws so callers only ever see RepositoryError
 */
export function toRepositoryError(error: unknown, operation: RepositoryOperation): RepositoryError {
  if (error instanceof RepositoryError) {
    return error;
  }
  return new RepositoryError(operation, `Repository ${operation} failed: ${describeError(error)}`, { cause: error });
}
