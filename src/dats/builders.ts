/**
 * Helpers that build common DATS node shapes through a NodeStore.
 *
 * Field mapping from source files stays with the callers; these helpers
 * only fix the shape of the nodes they create.
 */

import { IdentityConflictError } from '../core/errors.js';
import type { DatsNode } from '../store/DatsNode.js';
import type { NodeStore } from '../store/NodeStore.js';
import { isNodeRef } from '../store/ref.js';
import type { PropertyEntry } from '../store/types.js';

/** Edge label of the back-link from a group member to its group */
export const MEMBER_OF = 'memberOf';

/**
 * A study variable from a data dictionary.
 */
export interface StudyVariable {
  /** Accession of the variable, e.g. phv00169061.v7 */
  id: string;
  name: string;
  description: string;
  /** Registry of the accession (default: dbGaP) */
  source?: string;
}

export interface ConsentInfoInit {
  name: string;
  abbreviation?: string;
  description?: string;
  /** IRI of the consent code, e.g. a Data Use Ontology term */
  codeIri?: string;
}

export interface StudyGroupInit {
  name: string;
  members: readonly DatsNode[];
  consentInfo?: DatsNode;
}

export function createIdentifier(store: NodeStore, identifier: string, source?: string): DatsNode {
  const properties: PropertyEntry[] = [['identifier', identifier]];
  if (source !== undefined) {
    properties.push(['identifierSource', source]);
  }
  return store.create('Identifier', properties);
}

export function createAnnotation(store: NodeStore, value: string, valueIRI?: string): DatsNode {
  const properties: PropertyEntry[] = [['value', value]];
  if (valueIRI !== undefined) {
    properties.push(['valueIRI', valueIRI]);
  }
  return store.create('Annotation', properties);
}

/**
 * Add one Dimension per variable to the dataset's `dimensions`.
 *
 * @returns Dimensions by variable accession
 */
export function addStudyVariables(
  store: NodeStore,
  dataset: DatsNode,
  variables: readonly StudyVariable[]
): Map<string, DatsNode> {
  const byAccession = new Map<string, DatsNode>();

  for (const variable of variables) {
    if (byAccession.has(variable.id)) {
      throw new IdentityConflictError(
        'IDENTITY_CONFLICT',
        `Duplicate definition of variable ${variable.name} with accession ${variable.id}`,
        'Dimension',
        variable.id
      );
    }
    const dimension = store.create('Dimension', [
      ['identifier', createIdentifier(store, variable.id, variable.source ?? 'dbGaP')],
      ['name', createAnnotation(store, variable.name)],
      ['description', variable.description],
    ]);
    dataset.append('dimensions', dimension);
    byAccession.set(variable.id, dimension);
  }

  return byAccession;
}

export function createConsentInfo(store: NodeStore, init: ConsentInfoInit): DatsNode {
  const properties: PropertyEntry[] = [['name', init.name]];
  if (init.abbreviation !== undefined) {
    properties.push(['abbreviation', init.abbreviation]);
  }
  properties.push(['description', init.description ?? init.name]);
  if (init.codeIri !== undefined) {
    properties.push([
      'relatedIdentifiers',
      [store.create('RelatedIdentifier', [['identifier', init.codeIri]])],
    ]);
  }
  return store.create('ConsentInfo', properties);
}

/**
 * Create a StudyGroup and link each member back to it.
 *
 * Back-links follow the store's setting; with back-links disabled the
 * members are left untouched.
 */
export function createStudyGroup(store: NodeStore, init: StudyGroupInit): DatsNode {
  const properties: PropertyEntry[] = [
    ['name', init.name],
    ['members', [...init.members]],
    ['size', init.members.length],
  ];
  if (init.consentInfo !== undefined) {
    properties.push(['consentInformation', [init.consentInfo]]);
  }
  const group = store.create('StudyGroup', properties);

  for (const member of init.members) {
    if (!isLinkedTo(member, group)) {
      store.linkBack(member, MEMBER_OF, group);
    }
  }
  return group;
}

function isLinkedTo(member: DatsNode, group: DatsNode): boolean {
  const links = member.find(MEMBER_OF);
  return Array.isArray(links) && links.some(link => isNodeRef(link) && link.id === group.id);
}
