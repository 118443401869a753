import * as assert from 'node:assert/strict';
import { describe, it } from 'node:test';

import { createEmptyCollectionLists } from '../../src/content/collections.js';
import { deriveAll } from '../../src/content/derive.js';
import { GameRegistry } from '../../src/content/registry.js';
import { asEntityIndex } from '../../src/kernel/branded.js';
import { ContentError } from '../../src/kernel/content-error.js';
import { buildingRecord, techRecord, weaponRecord } from '../helpers/records.js';

function buildRegistry(): GameRegistry {
  const collections = {
    ...createEmptyCollectionLists(),
    buildings: [buildingRecord('housing')],
    weapons: [weaponRecord('laser'), weaponRecord('mass_driver', { damage: 6, fireRate: 1 })],
    techs: [techRecord('agriculture'), techRecord('terraforming')],
  };
  const techEdges = [{ from: 'agriculture', to: 'terraforming' }];
  return GameRegistry.build(collections, deriveAll(collections, techEdges));
}

describe('GameRegistry', () => {
  it('resolves ids to dense indices in merge order', () => {
    const registry = buildRegistry();

    assert.equal(registry.resolve('weapons', 'laser'), 0);
    assert.equal(registry.resolve('weapons', 'mass_driver'), 1);
    assert.equal(registry.resolve('weapons', 'plasma_lance'), null);
    assert.equal(registry.resolve('buildings', 'laser'), null);
    assert.equal(registry.size('weapons'), 2);
    assert.equal(registry.size('species'), 0);
  });

  it('returns records, derived stats and ids by index', () => {
    const registry = buildRegistry();
    const index = registry.resolve('weapons', 'mass_driver');
    assert.ok(index !== null);

    assert.equal(registry.get('weapons', index).damage, 6);
    assert.deepEqual(registry.getDerived('weapons', index), { throughput: 6, costEfficiency: 1.2 });
    assert.equal(registry.idOf('weapons', index), 'mass_driver');

    const terraforming = registry.resolve('techs', 'terraforming');
    assert.ok(terraforming !== null);
    assert.deepEqual(registry.getDerived('techs', terraforming), {
      prerequisites: ['agriculture'],
      unlocks: [],
      depth: 1,
    });
  });

  it('looks records up by id', () => {
    const registry = buildRegistry();

    assert.equal(registry.lookup('techs', 'agriculture')?.researchCost, 10);
    assert.equal(registry.lookup('techs', 'warp'), undefined);
  });

  it('lists entries in index order', () => {
    const registry = buildRegistry();

    assert.deepEqual(
      registry.entries('weapons').map((entry) => [entry.index, entry.id, entry.derived.throughput]),
      [
        [0, 'laser', 20],
        [1, 'mass_driver', 6],
      ],
    );
  });

  it('binds each index to the collection that resolved it', () => {
    const registry = buildRegistry();
    const housing = registry.resolve('buildings', 'housing');
    assert.ok(housing !== null);
    assert.equal(registry.idOf('buildings', housing), 'housing');

    const crossCollectionGuard = (): void => {
      // @ts-expect-error a buildings index cannot address the weapons table.
      registry.get('weapons', housing);
      // @ts-expect-error a buildings index cannot address the weapons table.
      registry.getDerived('weapons', housing);
      // @ts-expect-error a buildings index cannot address the weapons table.
      registry.idOf('weapons', housing);
    };
    void crossCollectionGuard;
  });

  it('throws for an index outside the collection', () => {
    const registry = buildRegistry();

    for (const raw of [2, -1, 0.5]) {
      assert.throws(
        () => registry.get('weapons', asEntityIndex('weapons', raw)),
        (error: unknown) => error instanceof ContentError && error.code === 'CONTENT_INDEX_OUT_OF_RANGE',
      );
    }
  });
});
