/**
 * Tests for conversion runs.
 */

import { describe, it, expect } from 'vitest';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { randomUUID } from 'node:crypto';

import type { AppConfig } from './config/types.js';
import { getDefaultConfig } from './config/loader.js';
import { createConversion, initializeConversion } from './conversion.js';
import { createStudyGroup } from './dats/builders.js';
import { TripleIndex } from './index/TripleIndex.js';
import { listStudyGroupMembers } from './query/datasetQueries.js';
import { runQuery } from './query/QueryEngine.js';

describe('createConversion', () => {
  it('uses the defaults', () => {
    const conversion = createConversion();
    const dataset = conversion.store.create('Dataset', { title: 'GTEx' });
    const { document } = conversion.build(dataset);

    expect(conversion.store.allowBackLinks).toBe(true);
    expect(dataset.id).toMatch(/^_:Dataset-[0-9a-f]{16}$/);
    expect(Object.keys(document)).toEqual(['@context', '@type', '@id', 'title']);
  });

  it('applies graph settings to the store and builder', () => {
    const config = getDefaultConfig();
    config.graph.namespace = 'https://example.org/dats/';
    config.graph.includeContext = false;
    config.graph.allowBackLinks = false;
    config.logging.level = 'error';

    const conversion = createConversion(config);
    const s1 = conversion.store.create('Material', { name: 'GTEX-1' });
    const group = createStudyGroup(conversion.store, { name: 'GRU', members: [s1] });
    const { document } = conversion.build(group);

    expect(group.id).toMatch(/^https:\/\/example\.org\/dats\/studygroup\/[0-9a-f]{16}$/);
    expect(document).toEqual({
      '@type': 'StudyGroup',
      '@id': group.id,
      name: 'GRU',
      members: [{ '@type': 'Material', '@id': s1.id, name: 'GTEX-1' }],
      size: 1,
    });
  });

  it('runs end to end from nodes to query rows', () => {
    const conversion = createConversion({ ...getDefaultConfig(), logging: { level: 'error' } });
    const { store } = conversion;
    const s1 = store.create('Material', { name: 'GTEX-1' });
    const group = createStudyGroup(store, { name: 'GRU', members: [s1] });
    const dataset = store.create('Dataset', [
      ['identifier', store.create('Identifier', { identifier: 'phs1' })],
      ['producedBy', store.create('Study', { name: 'GTEx', studyGroups: [group] })],
    ]);

    const index = TripleIndex.load(conversion.build(dataset).document);

    expect(listStudyGroupMembers(index, 'phs1', 'GRU').rows).toEqual([['phs1', 'GRU', 'GTEX-1']]);
  });
});

describe('node identity across back-link settings', () => {
  function buildMaterials(allowBackLinks: boolean): { index: TripleIndex; ids: [string, string] } {
    const config: AppConfig = { ...getDefaultConfig(), logging: { level: 'error' } };
    config.graph.allowBackLinks = allowBackLinks;

    const { store, build } = createConversion(config);
    const s1 = store.create('Material', { name: 'GTEX-1' });
    const s2 = store.create('Material', { name: 'GTEX-2' });
    const group = createStudyGroup(store, { name: 'GRU', members: [s1, s2] });

    return { index: TripleIndex.load(build(group).document), ids: [s1.id, s2.id] };
  }

  it('reloads the same node ids with and without back-links', () => {
    const linked = buildMaterials(true);
    const unlinked = buildMaterials(false);
    const query = { start: { type: 'Material', as: 'm' }, select: ['m'] };

    expect(linked.index.objects(linked.ids[0], 'memberOf')).toHaveLength(1);
    expect(unlinked.index.objects(unlinked.ids[0], 'memberOf')).toEqual([]);
    expect(runQuery(linked.index, query).rows).toEqual(runQuery(unlinked.index, query).rows);
    expect(runQuery(unlinked.index, query).rows).toEqual([...unlinked.ids].sort().map(id => [id]));
  });

  it('matches a start filter on a store id after reload', () => {
    const { index, ids } = buildMaterials(false);
    const [first] = ids;

    expect(runQuery(index, { start: { type: 'Material', id: first } }).rows).toEqual([[first]]);
  });
});

describe('initializeConversion', () => {
  it('falls back to the default configuration', async () => {
    const conversion = await initializeConversion({ configPath: join(tmpdir(), `missing-${randomUUID()}.yaml`) });
    expect(conversion.config).toEqual(getDefaultConfig());
  });
});
