import * as assert from 'node:assert/strict';
import { mkdtempSync, readFileSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { basename, join } from 'node:path';
import { describe, it } from 'node:test';
import { Ajv } from 'ajv';

import { DATA_FILE_KEYS } from '../../src/content/collections.js';
import { buildSchemaArtifactMap, writeSchemaArtifacts } from '../../src/content/schema-artifacts.js';

function compile(fileName: string) {
  const schema = buildSchemaArtifactMap().get(fileName);
  assert.ok(schema !== undefined, `missing ${fileName}`);
  const ajv = new Ajv({ allErrors: true, strict: false });
  return ajv.compile(schema);
}

describe('schema artifacts', () => {
  it('covers every data file plus the manifest and mod descriptor', () => {
    const names = [...buildSchemaArtifactMap().keys()];

    assert.equal(names.length, DATA_FILE_KEYS.length + 2);
    assert.equal(names.includes('weapons.schema.json'), true);
    assert.equal(names.includes('techEdges.schema.json'), true);
    assert.equal(names.includes('victoryRules.schema.json'), true);
    assert.equal(names.includes('manifest.schema.json'), true);
    assert.equal(names.includes('mod.schema.json'), true);
    assert.equal(buildSchemaArtifactMap().get('weapons.schema.json')?.$id, 'weapons.schema.json');
  });

  it('accepts what the decoder accepts for a weapons file', () => {
    const validate = compile('weapons.schema.json');

    assert.equal(
      validate({
        weapons: [
          { id: 'laser', name: 'Laser', damage: 10, fireRate: 2, range: 3, powerUse: 1, industryCost: 5 },
          {
            id: 'ion',
            name: { en: 'Ion', ru: 'Ион' },
            damage: 4,
            fireRate: 3,
            range: 2,
            powerUse: 1,
            industryCost: 3,
            unlockedBy: 'ballistics',
          },
        ],
      }),
      true,
    );
  });

  it('rejects wrong types, unknown fields and names without English text', () => {
    const validate = compile('weapons.schema.json');
    const base = { id: 'laser', name: 'Laser', damage: 10, fireRate: 2, range: 3, powerUse: 1, industryCost: 5 };

    assert.equal(validate({ weapons: [{ ...base, damage: 'ten' }] }), false);
    assert.equal(validate({ weapons: [{ ...base, colour: 'red' }] }), false);
    assert.equal(validate({ weapons: [{ ...base, name: { ru: 'Лазер' } }] }), false);
    assert.equal(validate({ weapons: [], armor: [] }), false);
  });

  it('lets authors omit fields that have defaults', () => {
    assert.equal(compile('victoryRules.schema.json')({ victoryRules: {} }), true);
    assert.equal(compile('mod.schema.json')({}), true);
    assert.equal(compile('manifest.schema.json')({ schemaVersion: 1, locales: ['en', 'ru'] }), true);
    assert.equal(compile('manifest.schema.json')({ locales: ['en'] }), false);
  });

  it('writes one file per artifact', () => {
    const outDir = mkdtempSync(join(tmpdir(), 'content-schemas-'));
    try {
      const written = writeSchemaArtifacts(join(outDir, 'nested'));

      assert.equal(written.length, DATA_FILE_KEYS.length + 2);
      const techs = written.find((filePath) => basename(filePath) === 'techs.schema.json');
      assert.ok(techs !== undefined);
      const parsed: unknown = JSON.parse(readFileSync(techs, 'utf8'));
      assert.deepEqual(parsed, buildSchemaArtifactMap().get('techs.schema.json'));
    } finally {
      rmSync(outDir, { recursive: true, force: true });
    }
  });
});
