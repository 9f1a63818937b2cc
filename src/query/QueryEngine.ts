/**
 * QueryEngine — Interpreter for join queries over a TripleIndex.
 *
 * Matching is done in successive joins: start nodes, then one lookup per
 * step, then one per column path. A step or path that reaches nothing
 * drops the partial match, so an unmatched query yields zero rows rather
 * than an error. Output rows have set semantics and a total order that
 * does not depend on document order.
 */

import { GraphError } from '../core/errors.js';
import { createLogger } from '../core/logger.js';
import type { TripleIndex } from '../index/TripleIndex.js';
import type { Term } from '../index/types.js';
import type {
  JoinQuery,
  PathStep,
  QueryResult,
  QueryValue,
  StartStep,
} from './types.js';

const log = createLogger('query');

type Binding = readonly Term[];

export class QueryEngine {
  constructor(private readonly index: TripleIndex) {}

  run(query: JoinQuery): QueryResult {
    const steps = query.steps ?? [];
    const columnSpecs = query.columns ?? [];

    const names = [query.start.as ?? 'n0', ...steps.map((step, i) => step.as ?? `n${i + 1}`)];
    assertUniqueNames(names);

    // Step matches
    let bindings: Binding[] = this.startNodes(query.start).map(id => [nodeTerm(id)]);
    for (const step of steps) {
      const next: Binding[] = [];
      for (const binding of bindings) {
        const last = binding[binding.length - 1];
        if (last === undefined || last.termType !== 'node') {
          continue;
        }
        for (const object of this.follow(last.id, step)) {
          next.push([...binding, object]);
        }
      }
      log.debug(`Step '${step.predicate}' extended ${bindings.length} match(es) to ${next.length}`);
      bindings = next;
    }

    // Column projections
    for (const column of columnSpecs) {
      const fromIndex = names.indexOf(column.from);
      if (fromIndex === -1) {
        throw new GraphError('INVALID_QUERY', `Column '${column.name}' starts from unknown column '${column.from}'`);
      }
      names.push(column.name);
      assertUniqueNames(names);

      const next: Binding[] = [];
      for (const binding of bindings) {
        const origin = binding[fromIndex];
        if (origin === undefined) {
          continue;
        }
        for (const value of this.resolvePath(origin, column.path)) {
          next.push([...binding, value]);
        }
      }
      bindings = next;
    }

    let rows: QueryValue[][] = bindings.map(binding => binding.map(termValue));

    for (const filter of query.where ?? []) {
      const position = columnIndex(names, filter.column);
      rows = rows.filter(row => row[position] === filter.equals);
    }

    const selected = query.select ?? names;
    const positions = selected.map(name => columnIndex(names, name));
    const projected = rows.map(row => positions.map(position => valueAt(row, position)));

    const distinct = dedupeRows(projected);
    const orderBy = query.orderBy ?? selected;
    sortRows(distinct, orderBy.map(name => columnIndex(selected, name)));

    return { columns: [...selected], rows: distinct };
  }

  private startNodes(start: StartStep): readonly string[] {
    const subjects = this.index.subjectsOfType(start.type);
    if (start.id === undefined) {
      return subjects;
    }
    return subjects.filter(id => id === start.id);
  }

  private follow(subject: string, step: PathStep): Term[] {
    const objects = this.index.objects(subject, step.predicate);
    const type = step.type;
    if (type === undefined) {
      return objects;
    }
    return objects.filter(object => object.termType === 'node' && this.index.hasType(object.id, type));
  }

  private resolvePath(origin: Term, path: readonly PathStep[]): Term[] {
    let current: Term[] = [origin];
    for (const step of path) {
      const next: Term[] = [];
      for (const term of current) {
        if (term.termType === 'node') {
          next.push(...this.follow(term.id, step));
        }
      }
      current = next;
    }
    return current;
  }
}

/**
 * Run a single query against an index.
 */
export function runQuery(index: TripleIndex, query: JoinQuery): QueryResult {
  return new QueryEngine(index).run(query);
}

/**
 * Total order on output values: numbers, then booleans, then strings;
 * numbers numerically, strings by code point.
 */
export function compareValues(a: QueryValue, b: QueryValue): number {
  const rankDiff = typeRank(a) - typeRank(b);
  if (rankDiff !== 0) {
    return rankDiff;
  }
  if (typeof a === 'number' && typeof b === 'number') {
    return a - b;
  }
  const sa = String(a);
  const sb = String(b);
  return sa < sb ? -1 : sa > sb ? 1 : 0;
}

function typeRank(value: QueryValue): number {
  switch (typeof value) {
    case 'number':
      return 0;
    case 'boolean':
      return 1;
    default:
      return 2;
  }
}

function nodeTerm(id: string): Term {
  return { termType: 'node', id };
}

function termValue(term: Term): QueryValue {
  return term.termType === 'node' ? term.id : term.value;
}

function columnIndex(names: readonly string[], name: string): number {
  const index = names.indexOf(name);
  if (index === -1) {
    throw new GraphError('INVALID_QUERY', `Unknown column '${name}'`);
  }
  return index;
}

function valueAt(row: readonly QueryValue[], position: number): QueryValue {
  const value = row[position];
  if (value === undefined) {
    throw new GraphError('INVALID_QUERY', `Row has no value at column ${position}`);
  }
  return value;
}

function assertUniqueNames(names: readonly string[]): void {
  const seen = new Set<string>();
  for (const name of names) {
    if (seen.has(name)) {
      throw new GraphError('INVALID_QUERY', `Duplicate column name '${name}'`);
    }
    seen.add(name);
  }
}

function dedupeRows(rows: QueryValue[][]): QueryValue[][] {
  const seen = new Set<string>();
  const result: QueryValue[][] = [];
  for (const row of rows) {
    const key = JSON.stringify(row);
    if (!seen.has(key)) {
      seen.add(key);
      result.push(row);
    }
  }
  return result;
}

// Sort columns first, then every column left to right as a tie-break
function sortRows(rows: QueryValue[][], sortPositions: readonly number[]): void {
  rows.sort((a, b) => {
    for (const position of sortPositions) {
      const diff = compareValues(valueAt(a, position), valueAt(b, position));
      if (diff !== 0) {
        return diff;
      }
    }
    for (let position = 0; position < a.length; position++) {
      const diff = compareValues(valueAt(a, position), valueAt(b, position));
      if (diff !== 0) {
        return diff;
      }
    }
    return 0;
  });
}
