import { GraphQLArgs } from 'graphql';

export type JsonValue =
  | null
  | boolean
  | number
  | string
  | JsonValue[]
  | { [key: string]: JsonValue };

export type LogLevel = 'error' | 'warn' | 'info' | 'verbose' | 'debug';

export type GraphQLTestConfig = {
  /** Directory that relative `queryFromFile` names are resolved against */
  queryRoot: string;
};

/**
 * Receives the arguments object right before it is handed to graphql-js.
 * Anything set here wins over the builder's own fields.
 */
export type ExecutionArgsMutator = (args: GraphQLArgs) => void;

export type QueryRequest = {
  query: string;
  variables: Map<string, unknown>;
  context?: unknown;
  operationName?: string;
  rootValue?: unknown;
  configure?: ExecutionArgsMutator;
};
