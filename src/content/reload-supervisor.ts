import { formatError, isContentLoadAborted } from '../kernel/content-error.js';
import { formatDiagnostic } from '../kernel/diagnostic-order.js';
import { isFatalDiagnostic } from '../kernel/diagnostics.js';
import type { Logger } from '../kernel/logger.js';
import { silentLogger } from '../kernel/logger.js';
import type { ChangeEvent, ChangeSource } from './change-source.js';
import type { LoadOutcome } from './pipeline.js';
import type { PublishSnapshot, SnapshotHandle } from './snapshot.js';

export type SupervisorState = 'idle' | 'loading' | 'publishing' | 'stopped';

export type StateListener = (state: SupervisorState, previous: SupervisorState) => void;

export interface LoadRequest {
  readonly signal: AbortSignal;
  readonly generation: number;
}

export type ContentLoader = (request: LoadRequest) => Promise<LoadOutcome>;

export interface ReloadSupervisorOptions {
  readonly handle: SnapshotHandle;
  readonly publish: PublishSnapshot;
  readonly loader: ContentLoader;
  readonly debounceMs: number;
  readonly queueCapacity: number;
  readonly logger?: Logger;
}

export interface SupervisorStats {
  readonly runs: number;
  readonly published: number;
  readonly failed: number;
  readonly superseded: number;
  readonly dropped: number;
}

/**
 * Single-consumer reconciliation loop over a bounded queue of change events.
 * A new event aborts the in-flight load; only the latest run may publish.
 */
export class ReloadSupervisor {
  private readonly handle: SnapshotHandle;
  private readonly publish: PublishSnapshot;
  private readonly loader: ContentLoader;
  private readonly debounceMs: number;
  private readonly queueCapacity: number;
  private readonly logger: Logger;

  private readonly queue: ChangeEvent[] = [];
  private readonly stateListeners = new Set<StateListener>();
  private readonly settledWaiters: (() => void)[] = [];
  private readonly detachers: (() => void)[] = [];
  private currentState: SupervisorState = 'idle';
  private timer: ReturnType<typeof setTimeout> | null = null;
  private inFlight: AbortController | null = null;
  private draining: Promise<void> | null = null;
  private counters = { runs: 0, published: 0, failed: 0, superseded: 0, dropped: 0 };

  constructor(options: ReloadSupervisorOptions) {
    this.handle = options.handle;
    this.publish = options.publish;
    this.loader = options.loader;
    this.debounceMs = options.debounceMs;
    this.queueCapacity = options.queueCapacity;
    this.logger = options.logger ?? silentLogger();
  }

  get state(): SupervisorState {
    return this.currentState;
  }

  get stats(): SupervisorStats {
    return { ...this.counters };
  }

  attach(source: ChangeSource): void {
    this.detachers.push(source.subscribe((event) => this.notify(event)));
  }

  onStateChange(listener: StateListener): () => void {
    this.stateListeners.add(listener);
    return () => {
      this.stateListeners.delete(listener);
    };
  }

  notify(event: ChangeEvent): void {
    if (this.currentState === 'stopped') {
      return;
    }

    this.queue.push(event);
    if (this.queue.length > this.queueCapacity) {
      this.queue.shift();
      this.counters.dropped += 1;
    }

    if (this.inFlight !== null && !this.inFlight.signal.aborted) {
      this.logger.debug('Change arrived during load; superseding in-flight run', { path: event.path });
      this.inFlight.abort();
    }

    if (this.timer !== null) {
      clearTimeout(this.timer);
    }
    this.timer = setTimeout(() => {
      this.timer = null;
      this.startDrain();
    }, this.debounceMs);
  }

  /** Resolves once no reload is pending, running or scheduled. */
  whenSettled(): Promise<void> {
    if (this.isSettled()) {
      return Promise.resolve();
    }
    return new Promise((resolve) => {
      this.settledWaiters.push(resolve);
    });
  }

  async stop(): Promise<void> {
    if (this.currentState === 'stopped') {
      return;
    }
    for (const detach of this.detachers.splice(0)) {
      detach();
    }
    if (this.timer !== null) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    this.queue.length = 0;
    this.inFlight?.abort();
    this.setState('stopped');
    await this.draining;
    this.releaseSettledWaiters();
  }

  private startDrain(): void {
    if (this.draining !== null || this.currentState === 'stopped') {
      return;
    }
    this.draining = this.drain()
      .catch((error: unknown) => {
        this.logger.error('Content reload loop failed', { error: formatError(error) });
      })
      .finally(() => {
        this.draining = null;
        if (this.currentState !== 'stopped') {
          this.setState('idle');
        }
        if (this.isSettled()) {
          this.releaseSettledWaiters();
        }
      });
  }

  private async drain(): Promise<void> {
    while (this.queue.length > 0 && this.currentState !== 'stopped') {
      if (this.timer !== null) {
        // A newer burst is still debouncing; its timer restarts the loop.
        return;
      }

      const batch = this.queue.splice(0);
      const generation = this.handle.current().generation + 1;
      const controller = new AbortController();
      this.inFlight = controller;
      this.counters.runs += 1;
      this.setState('loading');
      this.logger.info('Reloading content', { generation, changes: batch.length });

      let outcome: LoadOutcome;
      try {
        outcome = await this.loader({ signal: controller.signal, generation });
      } catch (error) {
        if (isContentLoadAborted(error)) {
          this.counters.superseded += 1;
          this.logger.debug('Reload superseded by a newer change', { generation });
        } else {
          this.counters.failed += 1;
          this.logger.error('Content reload threw; keeping current snapshot', { generation, error: formatError(error) });
        }
        continue;
      } finally {
        this.inFlight = null;
      }

      if (controller.signal.aborted) {
        this.counters.superseded += 1;
        this.logger.debug('Discarding superseded reload result', { generation });
        continue;
      }

      if (!outcome.ok) {
        this.counters.failed += 1;
        const fatal = outcome.diagnostics.filter(isFatalDiagnostic);
        this.logger.warn('Content reload rejected; keeping current snapshot', {
          generation: this.handle.current().generation,
          diagnostics: fatal.map(formatDiagnostic),
        });
        continue;
      }

      this.setState('publishing');
      try {
        this.publish(outcome.snapshot);
      } catch (error) {
        if (!(error instanceof AggregateError)) {
          this.counters.failed += 1;
          this.logger.error('Publishing content snapshot failed', { generation, error: formatError(error) });
          continue;
        }
        this.logger.error('Snapshot listener failed', {
          generation,
          errors: error.errors.map((listenerError: unknown) => formatError(listenerError)),
        });
      }
      this.counters.published += 1;
      this.logger.info('Published content snapshot', {
        generation: outcome.snapshot.generation,
        fingerprint: outcome.snapshot.fingerprint,
        warnings: outcome.snapshot.diagnostics.length,
      });
    }
  }

  private isSettled(): boolean {
    return (
      this.currentState === 'stopped' ||
      (this.timer === null && this.draining === null && this.queue.length === 0)
    );
  }

  private releaseSettledWaiters(): void {
    for (const resolve of this.settledWaiters.splice(0)) {
      resolve();
    }
  }

  private setState(next: SupervisorState): void {
    const previous = this.currentState;
    if (previous === next) {
      return;
    }
    this.currentState = next;
    for (const listener of [...this.stateListeners]) {
      listener(next, previous);
    }
  }
}
