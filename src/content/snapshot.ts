import { createHash } from 'node:crypto';
import { ContentError } from '../kernel/content-error.js';
import type { Diagnostic } from '../kernel/diagnostics.js';
import type { CollectionLists } from './collections.js';
import type { GameRegistry } from './registry.js';
import type { ResolvedManifest } from './resolve-sources.js';
import type { TechEdge, VictoryRules } from './schemas.js';

export interface SourceSummary {
  readonly id: string;
  readonly name: string;
  readonly kind: 'base' | 'mod';
  readonly priority: number;
  readonly schemaVersion: number;
}

export interface ContentSettings {
  readonly victoryRules: VictoryRules;
}

/** One complete validated load. Deep-frozen before anyone can observe it. */
export interface ContentSnapshot {
  readonly generation: number;
  readonly fingerprint: string;
  readonly effectiveSchemaVersion: number;
  readonly manifest: ResolvedManifest;
  /** Sources that were merged, in load order. */
  readonly sources: readonly SourceSummary[];
  readonly registry: GameRegistry;
  readonly techEdges: readonly TechEdge[];
  readonly settings: ContentSettings;
  /** Advisory diagnostics of the load that produced this snapshot. */
  readonly diagnostics: readonly Diagnostic[];
}

export interface FingerprintInput {
  readonly collections: CollectionLists;
  readonly techEdges: readonly TechEdge[];
  readonly victoryRules: VictoryRules;
}

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

const canonicalize = (value: unknown): unknown => {
  if (Array.isArray(value)) {
    return value.map((entry) => canonicalize(entry));
  }
  if (!isRecord(value)) {
    return value;
  }

  const ordered: Record<string, unknown> = {};
  for (const key of Object.keys(value).sort()) {
    ordered[key] = canonicalize(value[key]);
  }
  return ordered;
};

export const canonicalJson = (value: unknown): string => JSON.stringify(canonicalize(value));

/** SHA-256 over the canonical JSON of the merged content; list order is significant. */
export const computeContentFingerprint = (content: FingerprintInput): string =>
  createHash('sha256')
    .update(
      canonicalJson({
        collections: content.collections,
        techEdges: content.techEdges,
        victoryRules: content.victoryRules,
      }),
    )
    .digest('hex');

export function deepFreeze<T>(value: T): T {
  freezeValue(value);
  return value;
}

function freezeValue(value: unknown): void {
  if (typeof value !== 'object' || value === null || Object.isFrozen(value)) {
    return;
  }
  Object.freeze(value);
  for (const child of Object.values(value)) {
    freezeValue(child);
  }
}

export type SnapshotListener = (snapshot: ContentSnapshot, previous: ContentSnapshot) => void;

export interface SnapshotHandle {
  current(): ContentSnapshot;
  /** Called after each publication; returns an unsubscribe function. */
  subscribe(listener: SnapshotListener): () => void;
  close(): void;
  readonly closed: boolean;
}

export type PublishSnapshot = (snapshot: ContentSnapshot) => void;

export interface SnapshotHandleControl {
  readonly handle: SnapshotHandle;
  /**
   * Swaps the current snapshot, then notifies every listener. Listener failures are
   * rethrown together as an AggregateError once all listeners ran; the swap stands.
   */
  readonly publish: PublishSnapshot;
}

export function createSnapshotHandle(initial: ContentSnapshot): SnapshotHandleControl {
  let current = deepFreeze(initial);
  let closed = false;
  const listeners = new Set<SnapshotListener>();

  const assertOpen = (operation: string): void => {
    if (closed) {
      throw new ContentError('CONTENT_HANDLE_CLOSED', `Snapshot handle is closed; cannot ${operation}.`);
    }
  };

  const handle: SnapshotHandle = {
    current() {
      assertOpen('read the current snapshot');
      return current;
    },
    subscribe(listener) {
      assertOpen('subscribe');
      listeners.add(listener);
      return () => {
        listeners.delete(listener);
      };
    },
    close() {
      closed = true;
      listeners.clear();
    },
    get closed() {
      return closed;
    },
  };

  const publish: PublishSnapshot = (snapshot) => {
    assertOpen('publish');
    const previous = current;
    current = deepFreeze(snapshot);
    const failures: unknown[] = [];
    for (const listener of [...listeners]) {
      try {
        listener(current, previous);
      } catch (error) {
        failures.push(error);
      }
    }
    if (failures.length > 0) {
      throw new AggregateError(failures, `${failures.length} snapshot listener(s) failed for generation ${current.generation}.`);
    }
  };

  return { handle, publish };
}
