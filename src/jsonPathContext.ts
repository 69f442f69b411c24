import { JSONPath } from 'jsonpath-plus';
import { JsonValue } from './types';
import { PathNotFoundError } from './errors';
import { formatData, formatNotFound } from './format';
import { log } from './logger';

const isIndefiniteSegment = (segment: string) =>
  segment === '*' ||
  segment === '..' ||
  segment.startsWith('?(') ||
  segment.startsWith('(') ||
  segment.includes(',') ||
  segment.includes(':');

/**
 * A definite path selects at most one node. Wildcards, deep scans,
 * filters, scripts, unions and slices make a path indefinite, and those
 * always read as a (possibly empty) list of matches.
 */
export const isDefinitePath = (path: string) =>
  !JSONPath.toPathArray(path).some(isIndefiniteSegment);

/**
 * The JSON view of a result's data payload. The payload is serialized once
 * (explicit nulls included) and parsed back into a plain document that
 * every path query runs against.
 */
export class JsonPathContext {
  readonly json: string;
  readonly document: JsonValue;

  constructor(readonly data: unknown) {
    this.json = formatData(data);
    this.document = JSON.parse(this.json);

    log({
      title: 'Serialized result data',
      level: 'debug',
      details: [this.json],
    });
  }

  read<T>(path: string): T {
    if (this.document === null) {
      throw this.notFound(path);
    }

    if (!isDefinitePath(path)) {
      return JSONPath<T>({ path, json: this.document, wrap: true });
    }

    const matches =
      JSONPath<T[] | undefined>({ path, json: this.document, wrap: true }) ||
      [];
    if (!matches.length) {
      throw this.notFound(path);
    }
    return matches[0];
  }

  private notFound(path: string) {
    return new PathNotFoundError(
      formatNotFound(path, this.json),
      path,
      this.data
    );
  }
}
