/**
 * Tests for the DATS construction helpers.
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';

import { IdentityConflictError } from '../core/errors.js';
import { createLogger } from '../core/logger.js';
import { TripleIndex } from '../index/TripleIndex.js';
import { buildDocument } from '../jsonld/GraphBuilder.js';
import { DatsNode } from '../store/DatsNode.js';
import { NodeStore } from '../store/NodeStore.js';
import { createNodeRef } from '../store/ref.js';
import {
  MEMBER_OF,
  addStudyVariables,
  createAnnotation,
  createConsentInfo,
  createIdentifier,
  createStudyGroup,
} from './builders.js';

function nodeAt(node: DatsNode, name: string): DatsNode {
  const value = node.get(name);
  if (!(value instanceof DatsNode)) {
    throw new Error(`Property '${name}' is not a node`);
  }
  return value;
}

describe('DATS builders', () => {
  let store: NodeStore;

  beforeEach(() => {
    store = new NodeStore();
  });

  describe('createIdentifier', () => {
    it('creates an Identifier with an optional source', () => {
      const bare = createIdentifier(store, 'phs000424.v7.p2');
      const sourced = createIdentifier(store, 'phs000424.v7.p2', 'dbGaP');

      expect(bare.type).toBe('Identifier');
      expect(bare.propertyNames).toEqual(['identifier']);
      expect(sourced).not.toBe(bare);
      expect(sourced.get('identifierSource')).toBe('dbGaP');
    });

    it('deduplicates identical identifiers', () => {
      expect(createIdentifier(store, 'phs1', 'dbGaP')).toBe(createIdentifier(store, 'phs1', 'dbGaP'));
    });
  });

  describe('createAnnotation', () => {
    it('creates an Annotation with an optional IRI', () => {
      const annotation = createAnnotation(store, 'RNA-Seq', 'http://purl.obolibrary.org/obo/OBI_0001271');

      expect(annotation.type).toBe('Annotation');
      expect(annotation.get('value')).toBe('RNA-Seq');
      expect(annotation.get('valueIRI')).toBe('http://purl.obolibrary.org/obo/OBI_0001271');
    });
  });

  describe('addStudyVariables', () => {
    it('adds one Dimension per variable to the dataset', () => {
      const dataset = store.create('Dataset', { title: 'GTEx' });
      const dimensions = addStudyVariables(store, dataset, [
        { id: 'phv00169061.v7', name: 'AGE', description: 'Age of the subject' },
        { id: 'phv00169063.v7', name: 'SEX', description: 'Sex of the subject', source: 'TOPMed' },
      ]);

      expect(Array.from(dimensions.keys())).toEqual(['phv00169061.v7', 'phv00169063.v7']);
      expect(dataset.getList('dimensions')).toEqual(Array.from(dimensions.values()));

      const age = dimensions.get('phv00169061.v7');
      if (age === undefined) {
        throw new Error('missing dimension');
      }
      expect(age.type).toBe('Dimension');
      expect(age.propertyNames).toEqual(['identifier', 'name', 'description']);
      expect(nodeAt(age, 'identifier').get('identifier')).toBe('phv00169061.v7');
      expect(nodeAt(age, 'identifier').get('identifierSource')).toBe('dbGaP');
      expect(nodeAt(age, 'name').get('value')).toBe('AGE');
      expect(age.get('description')).toBe('Age of the subject');

      const sex = dimensions.get('phv00169063.v7');
      expect(sex === undefined ? undefined : nodeAt(sex, 'identifier').get('identifierSource')).toBe('TOPMed');
    });

    it('rejects duplicate accessions', () => {
      const dataset = store.create('Dataset', { title: 'GTEx' });
      let err: unknown;
      try {
        addStudyVariables(store, dataset, [
          { id: 'phv1', name: 'AGE', description: 'Age' },
          { id: 'phv1', name: 'AGE_AT_DEATH', description: 'Age at death' },
        ]);
      } catch (caught) {
        err = caught;
      }

      expect(err).toBeInstanceOf(IdentityConflictError);
      expect(err).toMatchObject({ code: 'IDENTITY_CONFLICT', nodeType: 'Dimension', nodeId: 'phv1' });
    });
  });

  describe('createConsentInfo', () => {
    it('defaults the description to the name', () => {
      const consent = createConsentInfo(store, { name: 'General Research Use', abbreviation: 'GRU' });

      expect(consent.propertyNames).toEqual(['name', 'abbreviation', 'description']);
      expect(consent.get('description')).toBe('General Research Use');
    });

    it('links the consent code as a related identifier', () => {
      const consent = createConsentInfo(store, {
        name: 'Disease-Specific',
        description: 'Use limited to one disease',
        codeIri: 'http://purl.obolibrary.org/obo/DUO_0000007',
      });

      const [related] = consent.getList('relatedIdentifiers');
      expect(related).toBeInstanceOf(DatsNode);
      expect(related instanceof DatsNode ? related.get('identifier') : undefined)
        .toBe('http://purl.obolibrary.org/obo/DUO_0000007');
    });
  });

  describe('createStudyGroup', () => {
    it('creates the group and links members back to it', () => {
      const s1 = store.create('Material', { name: 'GTEX-1' });
      const s2 = store.create('Material', { name: 'GTEX-2' });
      const consent = createConsentInfo(store, { name: 'General Research Use' });

      const group = createStudyGroup(store, { name: 'GRU', members: [s1, s2], consentInfo: consent });

      expect(group.propertyNames).toEqual(['name', 'members', 'size', 'consentInformation']);
      expect(group.get('size')).toBe(2);
      expect(group.getList('members')).toEqual([s1, s2]);
      expect(s1.getList(MEMBER_OF)).toEqual([createNodeRef({ id: group.id, type: 'StudyGroup' })]);
      expect(s2.getList(MEMBER_OF)).toEqual([createNodeRef({ id: group.id, type: 'StudyGroup' })]);
    });

    it('does not duplicate back-links when the group is created again', () => {
      const s1 = store.create('Material', { name: 'GTEX-1' });
      const s2 = store.create('Material', { name: 'GTEX-2' });

      const first = createStudyGroup(store, { name: 'GRU', members: [s1, s2] });
      const second = createStudyGroup(store, { name: 'GRU', members: [s2, s1] });

      expect(second).toBe(first);
      expect(s1.getList(MEMBER_OF)).toHaveLength(1);
    });

    it('serializes back-links as a cycle', () => {
      const s1 = store.create('Material', { name: 'GTEX-1' });
      const group = createStudyGroup(store, { name: 'GRU', members: [s1] });
      const study = store.create('Study', { name: 'GTEx', studyGroups: [group] });

      expect(TripleIndex.load(buildDocument(study)).findCycle()).not.toBeNull();
    });

    it('produces an acyclic document when back-links are disabled', () => {
      const warn = vi.spyOn(createLogger('node-store'), 'warn').mockImplementation(() => {});
      const acyclic = new NodeStore({ allowBackLinks: false });
      const s1 = acyclic.create('Material', { name: 'GTEX-1' });
      const s2 = acyclic.create('Material', { name: 'GTEX-2' });
      const group = createStudyGroup(acyclic, { name: 'GRU', members: [s1, s2] });
      const study = acyclic.create('Study', { name: 'GTEx', studyGroups: [group] });

      const index = TripleIndex.load(buildDocument(study));

      expect(s1.has(MEMBER_OF)).toBe(false);
      expect(index.findCycle()).toBeNull();
      expect(index.subjectsOfType('Material')).toHaveLength(2);
      warn.mockRestore();
    });
  });
});
