import * as assert from 'node:assert/strict';
import { describe, it } from 'node:test';

import { getAlternatives, levenshteinDistance } from '../../src/kernel/alternatives.js';

describe('getAlternatives', () => {
  it('computes edit distance', () => {
    assert.equal(levenshteinDistance('laser', 'laser'), 0);
    assert.equal(levenshteinDistance('balistics', 'ballistics'), 1);
    assert.equal(levenshteinDistance('', 'farm'), 4);
    assert.equal(levenshteinDistance('kitten', 'sitting'), 3);
  });

  it('returns the closest candidates at the best distance', () => {
    assert.deepEqual(getAlternatives('balistics', ['agriculture', 'ballistics', 'terraforming']), ['ballistics']);
  });

  it('breaks ties by code-unit order', () => {
    assert.deepEqual(getAlternatives('farn', ['fern', 'farm', 'barn']), ['barn', 'farm', 'fern']);
  });

  it('returns nothing when no candidate is close enough', () => {
    assert.deepEqual(getAlternatives('quantum_computing', ['agriculture', 'ballistics']), []);
    assert.deepEqual(getAlternatives('laser', []), []);
  });
});
