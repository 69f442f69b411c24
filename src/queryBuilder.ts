import { graphql, GraphQLArgs, GraphQLSchema } from 'graphql';
import { pathExistsSync, readFileSync } from 'fs-extra';
import { resolve as pathResolve } from 'path';
import { GraphQLResultActions } from './resultActions';
import { QueryFileNotFoundError } from './errors';
import {
  ExecutionArgsMutator,
  GraphQLTestConfig,
  QueryRequest,
} from './types';
import { DEFAULT_CONFIG } from './constants';
import { log } from './logger';

/**
 * Collects everything needed for one execution. Nothing is validated
 * here; a broken query or an unknown variable surfaces as an error in the
 * execution result, the way graphql-js reports it.
 */
export class GraphQLQueryBuilder {
  readonly request: QueryRequest = {
    query: '',
    variables: new Map(),
  };

  constructor(
    private readonly schema: GraphQLSchema,
    private readonly config: GraphQLTestConfig = DEFAULT_CONFIG
  ) {}

  setQuery(query: string) {
    this.request.query = query;
    return this;
  }

  /**
   * Reads a .graphql document. Relative names resolve against the
   * configured query root.
   */
  queryFromFile(filename: string) {
    const resolvedPath = pathResolve(this.config.queryRoot, filename);
    if (!pathExistsSync(resolvedPath)) {
      throw new QueryFileNotFoundError(filename, resolvedPath);
    }
    return this.setQuery(readFileSync(resolvedPath, 'utf-8'));
  }

  /**
   * `null` is sent to the server as an explicit null; `undefined` removes
   * the variable so it is not sent at all.
   */
  setVariable(name: string, value: unknown) {
    if (value === undefined) {
      this.request.variables.delete(name);
    } else {
      this.request.variables.set(name, value);
    }
    return this;
  }

  mergeVariables(variables: { [name: string]: unknown }) {
    Object.entries(variables).forEach(([name, value]) =>
      this.setVariable(name, value)
    );
    return this;
  }

  setContext(context: unknown) {
    this.request.context = context;
    return this;
  }

  setOperationName(operationName: string) {
    this.request.operationName = operationName;
    return this;
  }

  setRootValue(rootValue: unknown) {
    this.request.rootValue = rootValue;
    return this;
  }

  configure(mutator: ExecutionArgsMutator) {
    this.request.configure = mutator;
    return this;
  }

  buildArgs(): GraphQLArgs {
    const { query, variables, context, operationName, rootValue, configure } =
      this.request;

    const args: GraphQLArgs = {
      schema: this.schema,
      source: query,
    };
    // left out entirely, not sent as {}, when nothing was set
    if (variables.size) {
      args.variableValues = Object.fromEntries(variables);
    }
    if (context !== undefined) {
      args.contextValue = context;
    }
    if (operationName !== undefined) {
      args.operationName = operationName;
    }
    if (rootValue !== undefined) {
      args.rootValue = rootValue;
    }
    if (configure) {
      configure(args);
    }
    return args;
  }

  async execute() {
    const args = this.buildArgs();

    log({
      title: 'Executing query',
      level: 'info',
      details: [
        typeof args.source === 'string' ? args.source : args.source.body,
        'Variables:',
        JSON.stringify(args.variableValues ?? {}),
      ],
    });

    try {
      const executionResult = await graphql(args);

      log({
        title: 'Execution result',
        level: 'debug',
        details: [JSON.stringify(executionResult)],
      });

      return new GraphQLResultActions(executionResult);
    } catch (err) {
      log({
        title: 'Execution error',
        level: 'error',
        details: [String(err), err instanceof Error ? err.stack || '' : ''],
      });
      throw err;
    }
  }
}
