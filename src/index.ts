export { graphQLTest, createGraphQLTest, GraphQLTester } from './graphqlTest';
export { GraphQLQueryBuilder } from './queryBuilder';
export { GraphQLResultActions } from './resultActions';
export { GraphQLResultMatcher } from './resultMatcher';
export {
  GraphQLJsonResultMatcher,
  GraphQLJsonPathResultMatcher,
} from './jsonResultMatcher';
export { JsonPathContext, isDefinitePath } from './jsonPathContext';
export {
  GraphQLTestError,
  AssertionFailedError,
  PathNotFoundError,
  PreconditionError,
  QueryFileNotFoundError,
} from './errors';
export { DEFAULT_CONFIG } from './constants';
export * from './types';
