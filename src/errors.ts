export class GraphQLTestError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/** Expected and actual values differ */
export class AssertionFailedError extends GraphQLTestError {
  constructor(
    message: string,
    public readonly expected?: unknown,
    public readonly actual?: unknown
  ) {
    super(message);
  }
}

/**
 * A definite JSONPath expression selected nothing. Not an
 * AssertionFailedError, so callers can tell "missing" from "different".
 */
export class PathNotFoundError extends GraphQLTestError {
  constructor(
    message: string,
    public readonly path: string,
    public readonly data: unknown
  ) {
    super(message);
  }
}

/** The DSL was used in a way that can never pass, whatever the data */
export class PreconditionError extends GraphQLTestError {}

export class QueryFileNotFoundError extends PreconditionError {
  constructor(public readonly filename: string, public readonly resolvedPath: string) {
    super(`Required query file "${filename}" was not found at ${resolvedPath}`);
  }
}
