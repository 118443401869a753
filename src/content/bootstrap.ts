import { ContentLoadError } from '../kernel/content-error.js';
import { formatDiagnostic } from '../kernel/diagnostic-order.js';
import type { Logger } from '../kernel/logger.js';
import { createLogger } from '../kernel/logger.js';
import { createFsChangeSource } from './change-source.js';
import type { ChangeSource } from './change-source.js';
import type { PipelineConfig } from './config.js';
import { loadContent } from './pipeline.js';
import { ReloadSupervisor } from './reload-supervisor.js';
import { createSnapshotHandle } from './snapshot.js';
import type { SnapshotHandle } from './snapshot.js';

export interface ContentRuntimeOptions {
  /** Watch the base and mods roots on disk. Ignored when `changeSource` is given. */
  readonly watch?: boolean;
  readonly changeSource?: ChangeSource;
  readonly logger?: Logger;
}

export interface ContentRuntime {
  readonly handle: SnapshotHandle;
  readonly supervisor: ReloadSupervisor;
  /** Stops reloading, closes the change source and the handle. */
  stop(): Promise<void>;
}

/**
 * Performs the initial load and wires hot reload. A fatal initial load has no
 * previous snapshot to fall back on, so it throws `ContentLoadError`.
 */
export async function startContentRuntime(
  config: PipelineConfig,
  options: ContentRuntimeOptions = {},
): Promise<ContentRuntime> {
  const logger = options.logger ?? createLogger('content');
  const initial = await loadContent(config, { generation: 1, logger: logger.child('load') });
  if (!initial.ok) {
    throw new ContentLoadError(initial.diagnostics);
  }
  for (const diagnostic of initial.snapshot.diagnostics) {
    if (diagnostic.severity === 'warning') {
      logger.warn(formatDiagnostic(diagnostic));
    } else {
      logger.debug(formatDiagnostic(diagnostic));
    }
  }
  logger.info('Loaded content', {
    generation: initial.snapshot.generation,
    sources: initial.snapshot.sources.map((source) => source.id),
    warnings: initial.snapshot.diagnostics.length,
  });

  const { handle, publish } = createSnapshotHandle(initial.snapshot);
  const supervisorLogger = logger.child('reload');
  const supervisor = new ReloadSupervisor({
    handle,
    publish,
    loader: ({ signal, generation }) => loadContent(config, { signal, generation, logger: supervisorLogger }),
    debounceMs: config.debounceMs,
    queueCapacity: config.queueCapacity,
    logger: supervisorLogger,
  });

  const changeSource =
    options.changeSource ??
    (options.watch === true
      ? createFsChangeSource([config.baseDir, config.modsDir], { logger: logger.child('watch') })
      : undefined);
  if (changeSource !== undefined) {
    supervisor.attach(changeSource);
  }

  return {
    handle,
    supervisor,
    async stop() {
      await supervisor.stop();
      changeSource?.close();
      handle.close();
    },
  };
}
