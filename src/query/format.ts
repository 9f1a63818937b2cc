import { GraphError } from '../core/errors.js';
import type { QueryResult, QueryValue } from './types.js';

export interface DelimitedOptions {
  /** Field separator (default: tab) */
  delimiter?: string;
  /** Title line printed above the table, followed by a blank line */
  title?: string;
  /** Header labels; defaults to the column names */
  labels?: string[];
}

/**
 * Render query results as delimited text, one line per row.
 */
export function formatDelimited(result: QueryResult, options: DelimitedOptions = {}): string {
  const delimiter = options.delimiter ?? '\t';
  const lines: string[] = [];

  if (options.title !== undefined) {
    lines.push(options.title, '');
  }

  const header = options.labels ?? result.columns;
  if (header.length !== result.columns.length) {
    throw new GraphError('INVALID_QUERY', `Expected ${result.columns.length} labels, got ${header.length}`);
  }
  lines.push(header.map(label => cell(label, delimiter)).join(delimiter));

  for (const row of result.rows) {
    lines.push(row.map(value => cell(value, delimiter)).join(delimiter));
  }

  return `${lines.join('\n')}\n`;
}

// Delimiters and line breaks inside a value become spaces
function cell(value: QueryValue, delimiter: string): string {
  return String(value).split(delimiter).join(' ').replace(/\r?\n/g, ' ');
}
