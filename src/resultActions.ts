import { ExecutionResult } from 'graphql';
import { GraphQLResultMatcher } from './resultMatcher';
import { GraphQLJsonResultMatcher } from './jsonResultMatcher';
import { JsonPathContext } from './jsonPathContext';

/**
 * Wraps an execution result for chained expectations, e.g.
 *
 *   result
 *     .andExpect(m => m.assertNoErrors())
 *     .andExpectJson(json => json.pathEquals('$.user.name', 'Ada'));
 */
export class GraphQLResultActions {
  constructor(readonly executionResult: ExecutionResult) {}

  andExpect(expectations: (matcher: GraphQLResultMatcher) => void) {
    expectations(new GraphQLResultMatcher(this.executionResult));
    return this;
  }

  andExpectJson(expectations: (matcher: GraphQLJsonResultMatcher) => void) {
    return this.andExpect(matcher => matcher.withJson(expectations));
  }

  andDo(action: (executionResult: ExecutionResult) => void) {
    action(this.executionResult);
    return this;
  }

  andReturn() {
    return this.executionResult;
  }

  returnAt<T>(path: string): T {
    return new JsonPathContext(this.executionResult.data).read<T>(path);
  }
}
