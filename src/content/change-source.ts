import { existsSync, watch } from 'node:fs';
import type { FSWatcher } from 'node:fs';
import { join } from 'node:path';
import type { Logger } from '../kernel/logger.js';
import { silentLogger } from '../kernel/logger.js';

export interface ChangeEvent {
  readonly root: string;
  /** Changed file, when the platform reports one. */
  readonly path: string | null;
  readonly kind: 'rename' | 'change';
}

export type ChangeListener = (event: ChangeEvent) => void;

export interface ChangeSource {
  subscribe(listener: ChangeListener): () => void;
  close(): void;
}

export interface ManualChangeSource extends ChangeSource {
  emit(event: ChangeEvent): void;
}

/** In-process source; the caller decides when something changed. */
export function createManualChangeSource(): ManualChangeSource {
  const listeners = new Set<ChangeListener>();
  return {
    subscribe(listener) {
      listeners.add(listener);
      return () => {
        listeners.delete(listener);
      };
    },
    emit(event) {
      for (const listener of [...listeners]) {
        listener(event);
      }
    },
    close() {
      listeners.clear();
    },
  };
}

export interface FsChangeSourceOptions {
  readonly logger?: Logger;
}

/** Watches each existing root recursively. Roots missing at start are not watched. */
export function createFsChangeSource(roots: readonly string[], options: FsChangeSourceOptions = {}): ChangeSource {
  const logger = options.logger ?? silentLogger();
  const source = createManualChangeSource();
  const watchers: FSWatcher[] = [];

  for (const root of roots) {
    if (!existsSync(root)) {
      logger.debug('Skipping watch of missing content root', { root });
      continue;
    }
    const watcher = watch(root, { recursive: true }, (eventType, filename) => {
      source.emit({
        root,
        path: filename === null ? null : join(root, filename),
        kind: eventType,
      });
    });
    watcher.on('error', (error) => {
      logger.warn('Content watcher failed', { root, error: error.message });
    });
    watchers.push(watcher);
  }

  return {
    subscribe: (listener) => source.subscribe(listener),
    close() {
      for (const watcher of watchers.splice(0)) {
        watcher.close();
      }
      source.close();
    },
  };
}
