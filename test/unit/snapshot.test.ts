import * as assert from 'node:assert/strict';
import { describe, it } from 'node:test';

import { createEmptyCollectionLists } from '../../src/content/collections.js';
import {
  canonicalJson,
  computeContentFingerprint,
  createSnapshotHandle,
  deepFreeze,
} from '../../src/content/snapshot.js';
import type { ContentSnapshot } from '../../src/content/snapshot.js';
import { ContentError } from '../../src/kernel/content-error.js';
import { emptySnapshot } from '../helpers/snapshots.js';
import { weaponRecord } from '../helpers/records.js';

const isClosedError = (error: unknown): boolean => error instanceof ContentError && error.code === 'CONTENT_HANDLE_CLOSED';

describe('canonicalJson', () => {
  it('orders object keys but keeps array order', () => {
    assert.equal(canonicalJson({ b: 1, a: { d: [2, 1], c: null } }), '{"a":{"c":null,"d":[2,1]},"b":1}');
  });
});

describe('computeContentFingerprint', () => {
  const content = (damage: number) => ({
    collections: { ...createEmptyCollectionLists(), weapons: [weaponRecord('laser', { damage })] },
    techEdges: [{ from: 'a', to: 'b' }],
    victoryRules: { dominationThreshold: 0.5 },
  });

  it('is a stable hex digest independent of key insertion order', () => {
    const reordered = {
      victoryRules: { dominationThreshold: 0.5 },
      techEdges: [{ to: 'b', from: 'a' }],
      collections: content(10).collections,
    };

    const fingerprint = computeContentFingerprint(content(10));

    assert.match(fingerprint, /^[0-9a-f]{64}$/);
    assert.equal(computeContentFingerprint(reordered), fingerprint);
  });

  it('changes when any value changes', () => {
    assert.notEqual(computeContentFingerprint(content(10)), computeContentFingerprint(content(11)));
  });
});

describe('deepFreeze', () => {
  it('freezes nested objects and arrays', () => {
    const value = deepFreeze({ outer: { inner: [{ id: 'laser' }] } });

    assert.equal(Object.isFrozen(value), true);
    assert.equal(Object.isFrozen(value.outer), true);
    assert.equal(Object.isFrozen(value.outer.inner), true);
    assert.equal(Object.isFrozen(value.outer.inner[0]), true);
  });
});

describe('createSnapshotHandle', () => {
  it('serves the initial snapshot frozen', () => {
    const { handle } = createSnapshotHandle(emptySnapshot(1));

    assert.equal(handle.current().generation, 1);
    assert.equal(Object.isFrozen(handle.current()), true);
    assert.equal(Object.isFrozen(handle.current().sources[0]), true);
  });

  it('swaps snapshots atomically and notifies subscribers with the previous one', () => {
    const { handle, publish } = createSnapshotHandle(emptySnapshot(1));
    const seen: [number, number][] = [];
    const unsubscribe = handle.subscribe((next: ContentSnapshot, previous: ContentSnapshot) => {
      seen.push([next.generation, previous.generation]);
    });

    const held = handle.current();
    publish(emptySnapshot(2));
    unsubscribe();
    publish(emptySnapshot(3));

    assert.deepEqual(seen, [[2, 1]]);
    assert.equal(held.generation, 1);
    assert.equal(handle.current().generation, 3);
  });

  it('notifies every subscriber and keeps the swap when one of them throws', () => {
    const { handle, publish } = createSnapshotHandle(emptySnapshot(1));
    const seen: number[] = [];
    handle.subscribe(() => {
      throw new Error('listener broke');
    });
    handle.subscribe((next) => {
      seen.push(next.generation);
    });

    assert.throws(
      () => publish(emptySnapshot(2)),
      (error: unknown) =>
        error instanceof AggregateError &&
        error.errors.length === 1 &&
        error.message === '1 snapshot listener(s) failed for generation 2.',
    );
    assert.equal(handle.current().generation, 2);
    assert.deepEqual(seen, [2]);
  });

  it('refuses every operation after close', () => {
    const { handle, publish } = createSnapshotHandle(emptySnapshot(1));

    handle.close();

    assert.equal(handle.closed, true);
    assert.throws(() => handle.current(), isClosedError);
    assert.throws(() => handle.subscribe(() => undefined), isClosedError);
    assert.throws(() => publish(emptySnapshot(2)), isClosedError);
    assert.throws(() => handle.current(), /Snapshot handle is closed; cannot read the current snapshot\./);
  });
});
