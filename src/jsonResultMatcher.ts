import { equals } from 'ramda';
import { JsonPathContext } from './jsonPathContext';
import { AssertionFailedError } from './errors';
import { formatNoMatch } from './format';
import { log } from './logger';

/**
 * Assertions over the value a single JSONPath expression selected.
 */
export class GraphQLJsonPathResultMatcher<T> {
  constructor(
    readonly path: string,
    readonly value: T,
    private readonly context: JsonPathContext
  ) {}

  read(): T {
    return this.value;
  }

  andDo<R>(fn: (value: T) => R): R {
    return fn(this.value);
  }

  /**
   * Deep, type-sensitive comparison: `[1, 2]` equals a fresh `[1, 2]`,
   * `42` does not equal `"42"`.
   */
  assertEqualTo(expected: T) {
    if (equals(expected, this.value)) {
      return;
    }

    const message = formatNoMatch(this.path, this.context.json);
    log({
      title: 'Path assertion failed',
      level: 'verbose',
      details: [message, `Expected: ${JSON.stringify(expected)}`],
    });
    throw new AssertionFailedError(message, expected, this.value);
  }
}

/**
 * The JSON sub-DSL. Every method reads from the same cached context,
 * so batching several path checks in one block serializes the result once.
 */
export class GraphQLJsonResultMatcher {
  constructor(readonly context: JsonPathContext) {}

  onPath<T, R = void>(
    path: string,
    fn: (matcher: GraphQLJsonPathResultMatcher<T>) => R
  ): R {
    const value = this.context.read<T>(path);
    return fn(new GraphQLJsonPathResultMatcher(path, value, this.context));
  }

  pathEquals<T>(path: string, expected: T) {
    this.onPath<T>(path, matcher => matcher.assertEqualTo(expected));
  }

  doWithPath<T, R>(path: string, fn: (value: T) => R): R {
    return this.onPath<T, R>(path, matcher => matcher.andDo(fn));
  }

  /** Exposes the serialized text, e.g. to check key order or null rendering */
  asJsonText<R>(fn: (json: string) => R): R {
    return fn(this.context.json);
  }
}
