import { resolve as pathResolve } from 'path';
import schema from '../../test/fixtures/schema';
import { GraphQLQueryBuilder } from '../queryBuilder';
import { GraphQLResultActions } from '../resultActions';
import { PreconditionError, QueryFileNotFoundError } from '../errors';

const fixtures = pathResolve(__dirname, '../../test/fixtures');

describe('the query builder', () => {
  test('leaves variables out when none are set', () => {
    const args = new GraphQLQueryBuilder(schema)
      .setQuery('{ answer }')
      .buildArgs();

    expect(args).toEqual({ schema, source: '{ answer }' });
    expect('variableValues' in args).toBe(false);
    expect('contextValue' in args).toBe(false);
  });

  test('keeps explicit nulls apart from unset variables', () => {
    const builder = new GraphQLQueryBuilder(schema)
      .setVariable('a', null)
      .setVariable('b', 1)
      .setVariable('b', undefined);

    expect(builder.request.variables.has('a')).toBe(true);
    expect(builder.request.variables.has('b')).toBe(false);
    expect(builder.buildArgs().variableValues).toEqual({ a: null });
  });

  test('merges variables, overwriting existing ones', () => {
    const args = new GraphQLQueryBuilder(schema)
      .setVariable('a', 1)
      .mergeVariables({ a: 2, b: 'two', c: null })
      .buildArgs();

    expect(args.variableValues).toEqual({ a: 2, b: 'two', c: null });
  });

  test('forwards context, operation name and root value', () => {
    const context = { user: 'test-user' };
    const rootValue = { fromRoot: 'x' };
    const args = new GraphQLQueryBuilder(schema)
      .setQuery('query Named { answer }')
      .setContext(context)
      .setOperationName('Named')
      .setRootValue(rootValue)
      .buildArgs();

    expect(args.contextValue).toBe(context);
    expect(args.operationName).toBe('Named');
    expect(args.rootValue).toBe(rootValue);
  });

  test('runs the configure hook last', () => {
    const hook = jest.fn(args => {
      args.source = '{ greeting }';
      args.variableValues = { overridden: true };
    });
    const args = new GraphQLQueryBuilder(schema)
      .setQuery('{ answer }')
      .setVariable('a', 1)
      .configure(hook)
      .buildArgs();

    expect(hook).toHaveBeenCalledTimes(1);
    expect(args.source).toBe('{ greeting }');
    expect(args.variableValues).toEqual({ overridden: true });
  });

  test('executes once and wraps the result', async () => {
    const actions = await new GraphQLQueryBuilder(schema)
      .setQuery('{ answer }')
      .execute();

    expect(actions).toBeInstanceOf(GraphQLResultActions);
    expect(actions.andReturn()).toEqual({ data: { answer: 42 } });
  });

  test('leaves syntax errors to the engine', async () => {
    const actions = await new GraphQLQueryBuilder(schema)
      .setQuery('{ answer')
      .execute();

    const { errors, data } = actions.andReturn();
    expect(data).toBeUndefined();
    expect(errors).toHaveLength(1);
  });

  describe('reading query files', () => {
    test('reads relative to the query root', () => {
      const builder = new GraphQLQueryBuilder(schema, {
        queryRoot: fixtures,
      }).queryFromFile('queries/answer.graphql');

      expect(builder.request.query).toBe('{\n  answer\n}\n');
    });

    test('reads absolute paths as they are', () => {
      const builder = new GraphQLQueryBuilder(schema, {
        queryRoot: '/nowhere',
      }).queryFromFile(pathResolve(fixtures, 'queries/answer.graphql'));

      expect(builder.request.query).toBe('{\n  answer\n}\n');
    });

    test('fails for a missing file', () => {
      const builder = new GraphQLQueryBuilder(schema, { queryRoot: fixtures });

      expect(() => builder.queryFromFile('queries/missing.graphql')).toThrow(
        new QueryFileNotFoundError(
          'queries/missing.graphql',
          pathResolve(fixtures, 'queries/missing.graphql')
        )
      );
      expect(() => builder.queryFromFile('queries/missing.graphql')).toThrow(
        PreconditionError
      );
    });
  });
});
