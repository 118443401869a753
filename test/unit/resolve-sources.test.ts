import * as assert from 'node:assert/strict';
import { mkdirSync, rmSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { describe, it } from 'node:test';

import { resolveSources } from '../../src/content/resolve-sources.js';
import { listPackFiles } from '../../src/content/pack-files.js';
import { ContentError } from '../../src/kernel/content-error.js';
import {
  createPackFixture,
  fixtureConfig,
  weapon,
  writeFiles,
  writeMinimalBase,
  writeMod,
} from '../helpers/pack-fixtures.js';

describe('listPackFiles', () => {
  it('groups recognized files by stem in file-name order', async () => {
    const fixture = createPackFixture();
    try {
      writeFiles(fixture.baseDir, {
        'weapons.yaml': 'weapons: []\n',
        'weapons.json': '{"weapons": []}',
        'techs.yml': 'techs: []\n',
        'notes.txt': 'ignored',
      });

      const listing = await listPackFiles(fixture.baseDir);

      assert.ok(listing !== null);
      assert.deepEqual(
        [...listing].map(([stem, files]) => [stem, files.map((file) => file.fileName)]),
        [
          ['techs', ['techs.yml']],
          ['weapons', ['weapons.json', 'weapons.yaml']],
        ],
      );
      assert.equal(await listPackFiles(join(fixture.root, 'missing')), null);
    } finally {
      fixture.cleanup();
    }
  });
});

describe('resolveSources', () => {
  it('places the base pack first and orders mods by priority, then folder name', async () => {
    const fixture = createPackFixture();
    try {
      writeMinimalBase(fixture);
      writeMod(fixture, 'zeta', { 'mod.yaml': { priority: 0 } });
      writeMod(fixture, 'alpha', { 'mod.yaml': { priority: 0 } });
      writeMod(fixture, 'beta', { 'mod.yaml': { name: 'Beta Pack', priority: 10 } });
      writeMod(fixture, 'gamma', { 'mod.yaml': { priority: -1 } });
      writeMod(fixture, 'plain', { 'weapons.yaml': { weapons: [weapon('ion')] } });

      const resolution = await resolveSources(fixtureConfig(fixture));

      assert.deepEqual(
        resolution.sources.map((source) => [source.id, source.priority, source.name]),
        [
          ['base', 0, 'base'],
          ['mod:gamma', -1, 'gamma'],
          ['mod:alpha', 0, 'alpha'],
          ['mod:plain', 0, 'plain'],
          ['mod:zeta', 0, 'zeta'],
          ['mod:beta', 10, 'Beta Pack'],
        ],
      );
      assert.deepEqual(resolution.diagnostics, []);
      assert.deepEqual([...(resolution.sources[3]?.files.keys() ?? [])], ['weapons']);
      assert.deepEqual([...(resolution.sources[0]?.files.keys() ?? [])], ['buildings', 'techs', 'weapons']);
    } finally {
      fixture.cleanup();
    }
  });

  it('falls back to the supported schema version and English when there is no manifest', async () => {
    const fixture = createPackFixture();
    try {
      writeFiles(fixture.baseDir, { 'techs.yaml': 'techs: []\n' });

      const resolution = await resolveSources(fixtureConfig(fixture));

      assert.deepEqual(resolution.manifest, { schemaVersion: 1, locales: ['en'] });
      assert.deepEqual(
        resolution.sources.map((source) => source.id),
        ['base'],
      );
    } finally {
      fixture.cleanup();
    }
  });

  it('rejects a base pack newer than the runtime supports', async () => {
    const fixture = createPackFixture();
    try {
      writeFiles(fixture.baseDir, { 'manifest.yaml': { schemaVersion: 3 } });

      const resolution = await resolveSources(fixtureConfig(fixture));

      assert.deepEqual(
        resolution.diagnostics.map((entry) => [entry.code, entry.path, entry.severity]),
        [['CONTENT_SCHEMA_VERSION_REJECTED', 'manifest.schemaVersion', 'error']],
      );
    } finally {
      fixture.cleanup();
    }
  });

  it('skips a mod that declares a newer schema version', async () => {
    const fixture = createPackFixture();
    try {
      writeMinimalBase(fixture);
      writeMod(fixture, 'future', { 'mod.yaml': { schemaVersion: 2 }, 'weapons.yaml': { weapons: [weapon('ion')] } });

      const resolution = await resolveSources(fixtureConfig(fixture));

      assert.deepEqual(
        resolution.sources.map((source) => source.id),
        ['base'],
      );
      assert.deepEqual(
        resolution.diagnostics.map((entry) => [entry.code, entry.path, entry.severity, entry.message]),
        [
          [
            'CONTENT_SCHEMA_VERSION_REJECTED',
            'mods.future.schemaVersion',
            'warning',
            'Mod "future" declares schema version 2, newer than the manifest\'s 1; mod skipped.',
          ],
        ],
      );
    } finally {
      fixture.cleanup();
    }
  });

  it('skips a mod whose descriptor does not decode', async () => {
    const fixture = createPackFixture();
    try {
      writeMinimalBase(fixture);
      writeMod(fixture, 'broken', { 'mod.yaml': 'priority: high\n' });

      const resolution = await resolveSources(fixtureConfig(fixture));

      assert.deepEqual(
        resolution.sources.map((source) => source.id),
        ['base'],
      );
      assert.deepEqual(
        resolution.diagnostics.map((entry) => [entry.code, entry.path, entry.severity]),
        [
          ['CONTENT_SCHEMA_INVALID', 'mods.broken.mod.priority', 'warning'],
          ['CONTENT_MOD_SKIPPED', 'mods.broken', 'warning'],
        ],
      );
    } finally {
      fixture.cleanup();
    }
  });

  it('ignores folders without content and reports them as info', async () => {
    const fixture = createPackFixture();
    try {
      writeMinimalBase(fixture);
      mkdirSync(join(fixture.modsDir, 'notes'), { recursive: true });
      writeFileSync(join(fixture.modsDir, 'notes', 'readme.txt'), 'nothing here', 'utf8');
      writeFileSync(join(fixture.modsDir, 'stray.yaml'), 'weapons: []\n', 'utf8');

      const resolution = await resolveSources(fixtureConfig(fixture));

      assert.deepEqual(
        resolution.sources.map((source) => source.id),
        ['base'],
      );
      assert.deepEqual(
        resolution.diagnostics.map((entry) => [entry.code, entry.path, entry.severity]),
        [['CONTENT_MOD_UNRECOGNIZED', 'mods.notes', 'info']],
      );
    } finally {
      fixture.cleanup();
    }
  });

  it('warns when a descriptor exists in more than one format and reads the first', async () => {
    const fixture = createPackFixture();
    try {
      writeMinimalBase(fixture);
      writeMod(fixture, 'twice', { 'mod.json': { priority: 5 }, 'mod.yaml': { priority: 7 } });

      const resolution = await resolveSources(fixtureConfig(fixture));

      assert.equal(resolution.sources[1]?.priority, 5);
      assert.deepEqual(
        resolution.diagnostics.map((entry) => [entry.code, entry.path, entry.message]),
        [['CONTENT_FORMAT_AMBIGUOUS', 'mods.twice.mod', 'Found mod.json, mod.yaml; only mod.json is read.']],
      );
    } finally {
      fixture.cleanup();
    }
  });

  it('treats a missing mods root as having no mods', async () => {
    const fixture = createPackFixture();
    try {
      writeMinimalBase(fixture);
      rmSync(fixture.modsDir, { recursive: true, force: true });

      const resolution = await resolveSources(fixtureConfig(fixture));

      assert.equal(resolution.sources.length, 1);
    } finally {
      fixture.cleanup();
    }
  });

  it('throws when the base pack directory is missing', async () => {
    const fixture = createPackFixture();
    try {
      rmSync(fixture.baseDir, { recursive: true, force: true });

      await assert.rejects(
        resolveSources(fixtureConfig(fixture)),
        (error: unknown) => error instanceof ContentError && error.code === 'CONTENT_BASE_MISSING',
      );
    } finally {
      fixture.cleanup();
    }
  });
});
