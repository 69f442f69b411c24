import { GraphQLTestConfig, LogLevel } from './types';

export const LOG_LEVEL_ENV_VAR = 'GRAPHQL_TEST_LOG_LEVEL';
export const QUERY_ROOT_ENV_VAR = 'GRAPHQL_TEST_QUERY_ROOT';

export const LOG_LEVELS: LogLevel[] = [
  'error',
  'warn',
  'info',
  'verbose',
  'debug',
];

export const DEFAULT_LOG_LEVEL: LogLevel = 'warn';

export const DEFAULT_CONFIG: GraphQLTestConfig = {
  queryRoot: process.env[QUERY_ROOT_ENV_VAR] || process.cwd(),
};

export const LOG_PREFIX = '[GraphQL-Test]';
