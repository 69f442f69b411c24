import { ExecutionResult } from 'graphql';
import { equals } from 'ramda';
import { JsonPathContext } from './jsonPathContext';
import {
  GraphQLJsonResultMatcher,
  GraphQLJsonPathResultMatcher,
} from './jsonResultMatcher';
import { AssertionFailedError, PreconditionError } from './errors';
import { formatErrors } from './format';
import { log } from './logger';

const isMapping = (value: unknown): value is { [key: string]: unknown } =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

export class GraphQLResultMatcher {
  private jsonContext: JsonPathContext | null = null;

  constructor(readonly executionResult: ExecutionResult) {}

  assertNoErrors() {
    const errors = this.executionResult.errors || [];
    if (!errors.length) {
      return;
    }

    const message = formatErrors(errors);
    log({ title: 'Result has errors', level: 'verbose', details: [message] });
    throw new AssertionFailedError(message, [], errors);
  }

  assertRootField<T>(key: string, expected: T) {
    const data: unknown = this.executionResult.data;
    if (!isMapping(data)) {
      throw new PreconditionError(
        'Expected root data to be a map and contain field(s)'
      );
    }

    const actual = data[key];
    if (!equals<unknown>(actual, expected)) {
      log({
        title: `Root field "${key}" did not match`,
        level: 'verbose',
        details: [
          `Expected: ${JSON.stringify(expected)}`,
          `Actual: ${JSON.stringify(actual)}`,
        ],
      });
      throw new AssertionFailedError(
        `Expected field with key: ${key}`,
        expected,
        actual
      );
    }
  }

  /**
   * Runs `fn` against the JSON view of the data payload. The view is built
   * on first use and shared by every later path call on this matcher.
   */
  withJson<R>(fn: (matcher: GraphQLJsonResultMatcher) => R): R {
    if (!this.jsonContext) {
      this.jsonContext = new JsonPathContext(this.executionResult.data);
    }
    return fn(new GraphQLJsonResultMatcher(this.jsonContext));
  }

  asJson<R>(fn: (matcher: GraphQLJsonResultMatcher) => R): R {
    return this.withJson(fn);
  }

  onPath<T, R = void>(
    path: string,
    fn: (matcher: GraphQLJsonPathResultMatcher<T>) => R
  ): R {
    return this.withJson(json => json.onPath(path, fn));
  }

  pathEquals<T>(path: string, expected: T) {
    this.withJson(json => json.pathEquals(path, expected));
  }

  doWithPath<T, R>(path: string, fn: (value: T) => R): R {
    return this.withJson(json => json.doWithPath(path, fn));
  }
}
