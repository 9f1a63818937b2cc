/**
 * Canned queries over DATS documents.
 *
 * Each one is a fixed JoinQuery; the engine does the matching.
 */

import type { TripleIndex } from '../index/TripleIndex.js';
import { QueryEngine } from './QueryEngine.js';
import type { EqualsFilter, JoinQuery, PathStep, QueryResult } from './types.js';

/** Dataset or Dimension → Identifier → accession literal */
const ACCESSION_PATH: PathStep[] = [
  { predicate: 'identifier', type: 'Identifier' },
  { predicate: 'identifier' },
];

/**
 * Variables (Dimensions) of every Dataset, or of the Dataset whose
 * accession is `datasetId`.
 *
 * Columns: study, variableId, name, description. Ordered by study, then
 * variable accession.
 */
export function listDatasetVariables(index: TripleIndex, datasetId?: string): QueryResult {
  const where: EqualsFilter[] = datasetId === undefined ? [] : [{ column: 'study', equals: datasetId }];
  const query: JoinQuery = {
    start: { type: 'Dataset', as: 'dataset' },
    steps: [{ predicate: 'dimensions', type: 'Dimension', as: 'dimension' }],
    columns: [
      { name: 'study', from: 'dataset', path: ACCESSION_PATH },
      { name: 'variableId', from: 'dimension', path: ACCESSION_PATH },
      {
        name: 'name',
        from: 'dimension',
        path: [{ predicate: 'name', type: 'Annotation' }, { predicate: 'value' }],
      },
      { name: 'description', from: 'dimension', path: [{ predicate: 'description' }] },
    ],
    where,
    select: ['study', 'variableId', 'name', 'description'],
    orderBy: ['study', 'variableId'],
  };
  return new QueryEngine(index).run(query);
}

/**
 * Members of the study group named `groupName` in the study that produced
 * the Dataset with accession `datasetId`.
 *
 * Columns: study, group, member. Ordered by member name.
 */
export function listStudyGroupMembers(
  index: TripleIndex,
  datasetId: string,
  groupName: string
): QueryResult {
  return new QueryEngine(index).run({
    start: { type: 'Dataset', as: 'dataset' },
    steps: [
      { predicate: 'producedBy', type: 'Study', as: 'studyNode' },
      { predicate: 'studyGroups', type: 'StudyGroup', as: 'groupNode' },
      { predicate: 'members', type: 'Material', as: 'memberNode' },
    ],
    columns: [
      { name: 'study', from: 'dataset', path: ACCESSION_PATH },
      { name: 'group', from: 'groupNode', path: [{ predicate: 'name' }] },
      { name: 'member', from: 'memberNode', path: [{ predicate: 'name' }] },
    ],
    where: [
      { column: 'study', equals: datasetId },
      { column: 'group', equals: groupName },
    ],
    select: ['study', 'group', 'member'],
    orderBy: ['member'],
  });
}

/**
 * Datasets that are parts of another Dataset.
 *
 * Columns: parent (title), child (accession), title. Ordered by parent,
 * then child accession.
 */
export function listSecondLevelDatasets(index: TripleIndex): QueryResult {
  return new QueryEngine(index).run({
    start: { type: 'Dataset', as: 'parentNode' },
    steps: [{ predicate: 'hasPart', type: 'Dataset', as: 'childNode' }],
    columns: [
      { name: 'parent', from: 'parentNode', path: [{ predicate: 'title' }] },
      { name: 'child', from: 'childNode', path: ACCESSION_PATH },
      { name: 'title', from: 'childNode', path: [{ predicate: 'title' }] },
    ],
    select: ['parent', 'child', 'title'],
  });
}
