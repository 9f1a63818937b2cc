/**
 * Tests for the join query engine.
 */

import { describe, it, expect } from 'vitest';

import { isGraphError } from '../core/errors.js';
import { TripleIndex } from '../index/TripleIndex.js';
import { QueryEngine, compareValues, runQuery } from './QueryEngine.js';

const groupIndex = TripleIndex.load({
  '@type': 'StudyGroup',
  '@id': 'G',
  name: 'all subjects',
  members: [
    {
      '@type': 'Subject',
      '@id': 'A',
      name: 'GTEX-1',
      memberOf: [{ '@type': 'StudyGroup', '@id': 'G' }],
    },
  ],
});

const itemIndex = TripleIndex.load([
  { '@type': 'Item', '@id': 'i1', rank: 10, label: 'b', keywords: ['x', 'y'] },
  { '@type': 'Item', '@id': 'i2', rank: 9, label: 'a' },
  { '@type': 'Item', '@id': 'i3', rank: 'x', label: 'c', keywords: ['x'] },
]);

describe('QueryEngine', () => {
  it('follows a typed step from a start node', () => {
    const result = new QueryEngine(groupIndex).run({
      start: { type: 'Subject', id: 'A' },
      steps: [{ predicate: 'memberOf', type: 'StudyGroup' }],
    });

    expect(result).toEqual({ columns: ['n0', 'n1'], rows: [['A', 'G']] });
  });

  describe('empty branches', () => {
    it('returns no rows for a predicate without objects', () => {
      const result = runQuery(groupIndex, {
        start: { type: 'Subject' },
        steps: [{ predicate: 'hasPart' }],
      });
      expect(result).toEqual({ columns: ['n0', 'n1'], rows: [] });
    });

    it('returns no rows for an unknown start type or id', () => {
      expect(runQuery(groupIndex, { start: { type: 'Dataset' } }).rows).toEqual([]);
      expect(runQuery(groupIndex, { start: { type: 'Subject', id: 'B' } }).rows).toEqual([]);
    });

    it('drops matches whose object has another type', () => {
      const result = runQuery(groupIndex, {
        start: { type: 'Subject' },
        steps: [{ predicate: 'memberOf', type: 'Study' }],
      });
      expect(result.rows).toEqual([]);
    });

    it('drops rows whose column path reaches nothing', () => {
      const result = runQuery(itemIndex, {
        start: { type: 'Item', as: 'item' },
        columns: [{ name: 'keyword', from: 'item', path: [{ predicate: 'keywords' }] }],
        select: ['item', 'keyword'],
      });
      expect(result.rows).toEqual([
        ['i1', 'x'],
        ['i1', 'y'],
        ['i3', 'x'],
      ]);
    });
  });

  it('accepts literals on untyped steps', () => {
    const result = runQuery(groupIndex, {
      start: { type: 'Subject', as: 'subject' },
      steps: [{ predicate: 'name', as: 'name' }],
    });
    expect(result).toEqual({ columns: ['subject', 'name'], rows: [['A', 'GTEX-1']] });
  });

  it('chains columns from earlier columns', () => {
    const result = runQuery(groupIndex, {
      start: { type: 'Subject' },
      columns: [
        { name: 'group', from: 'n0', path: [{ predicate: 'memberOf', type: 'StudyGroup' }] },
        { name: 'groupName', from: 'group', path: [{ predicate: 'name' }] },
      ],
      select: ['groupName'],
    });
    expect(result).toEqual({ columns: ['groupName'], rows: [['all subjects']] });
  });

  it('removes duplicate rows', () => {
    const index = TripleIndex.load([
      { '@type': 'StudyGroup', '@id': 'G', name: 'g' },
      {
        '@type': 'Subject',
        '@id': 'A',
        name: 'GTEX-1',
        memberOf: [
          { '@type': 'StudyGroup', '@id': 'G' },
          { '@type': 'StudyGroup', '@id': 'G' },
        ],
      },
    ]);

    const result = runQuery(index, {
      start: { type: 'Subject' },
      steps: [{ predicate: 'memberOf', type: 'StudyGroup' }],
    });
    expect(result.rows).toEqual([['A', 'G']]);
  });

  describe('ordering', () => {
    it('sorts numbers numerically before strings', () => {
      const result = runQuery(itemIndex, {
        start: { type: 'Item', as: 'item' },
        columns: [{ name: 'rank', from: 'item', path: [{ predicate: 'rank' }] }],
        select: ['rank'],
      });
      expect(result.rows).toEqual([[9], [10], ['x']]);
    });

    it('sorts by orderBy columns', () => {
      const result = runQuery(itemIndex, {
        start: { type: 'Item', as: 'item' },
        columns: [{ name: 'label', from: 'item', path: [{ predicate: 'label' }] }],
        select: ['item', 'label'],
        orderBy: ['label'],
      });
      expect(result.rows).toEqual([
        ['i2', 'a'],
        ['i1', 'b'],
        ['i3', 'c'],
      ]);
    });
  });

  it('filters on output columns', () => {
    const result = runQuery(itemIndex, {
      start: { type: 'Item', as: 'item' },
      columns: [{ name: 'label', from: 'item', path: [{ predicate: 'label' }] }],
      where: [{ column: 'label', equals: 'b' }],
      select: ['item'],
    });
    expect(result).toEqual({ columns: ['item'], rows: [['i1']] });
  });

  describe('invalid queries', () => {
    function errorOf(fn: () => unknown): unknown {
      try {
        fn();
      } catch (err) {
        return err;
      }
      return undefined;
    }

    it('rejects unknown columns', () => {
      expect(() => runQuery(itemIndex, { start: { type: 'Item' }, select: ['label'] }))
        .toThrow("Unknown column 'label'");
      expect(() =>
        runQuery(itemIndex, {
          start: { type: 'Item' },
          columns: [{ name: 'label', from: 'item', path: [{ predicate: 'label' }] }],
        })
      ).toThrow("Column 'label' starts from unknown column 'item'");
    });

    it('rejects duplicate column names', () => {
      expect(() =>
        runQuery(itemIndex, {
          start: { type: 'Item', as: 'label' },
          columns: [{ name: 'label', from: 'label', path: [{ predicate: 'label' }] }],
        })
      ).toThrow("Duplicate column name 'label'");
    });

    it('reports query shape errors as INVALID_QUERY', () => {
      const unknownOrder = errorOf(() => runQuery(itemIndex, { start: { type: 'Item' }, orderBy: ['rank'] }));
      const duplicate = errorOf(() =>
        runQuery(itemIndex, { start: { type: 'Item', as: 'item' }, steps: [{ predicate: 'label', as: 'item' }] })
      );

      expect(isGraphError(unknownOrder, 'INVALID_QUERY')).toBe(true);
      expect(unknownOrder).toHaveProperty('message', "Unknown column 'rank'");
      expect(duplicate).toMatchObject({ name: 'GraphError', code: 'INVALID_QUERY' });
    });
  });
});

describe('compareValues', () => {
  it('orders numbers, then booleans, then strings', () => {
    expect(compareValues(2, 10)).toBeLessThan(0);
    expect(compareValues(1, true)).toBeLessThan(0);
    expect(compareValues(true, 'a')).toBeLessThan(0);
    expect(compareValues('a', 3)).toBeGreaterThan(0);
  });

  it('compares strings by code point', () => {
    expect(compareValues('10', '9')).toBeLessThan(0);
    expect(compareValues('B', 'a')).toBeLessThan(0);
    expect(compareValues('a', 'a')).toBe(0);
  });
});
