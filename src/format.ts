import { GraphQLError } from 'graphql';

const QUOTE = '>> ';

const quote = (message: string) =>
  message
    .split('\n')
    .map(line => QUOTE + line)
    .join('\n');

export const formatErrors = (errors: readonly GraphQLError[]) =>
  [
    'Expected no errors in the result.',
    '',
    'It got these errors:',
    '',
    errors.map(error => quote(error.message)).join('\n>\n'),
  ].join('\n');

export const formatData = (data: unknown) => JSON.stringify(data ?? null);

export const formatNotFound = (path: string, json: string) =>
  `No results for path: ${path}\n\nIn data: ${json}`;

export const formatNoMatch = (path: string, json: string) =>
  `No match for path: ${path}\n\nIn data: ${json}`;
