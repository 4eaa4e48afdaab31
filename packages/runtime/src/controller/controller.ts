// Grant controller - drives the reconciler from hub change events
//
// Events only name a Grant; workers re-read it through the reconciler. A
// failed pass is retried with per-key backoff, and the hub watch is
// re-established after a delay whenever its stream ends.

import { grantKey, parseGrantKey } from '@hubspoke/protocol';
import {
  kubernetes,
  type GrantEventSource,
  type GrantSubscription,
} from '@hubspoke/repositories';
import type { BackoffConfig, ControllerConfig } from '../config.js';
import { GrantValidationError } from '../errors.js';
import { createConsoleLogger, errorMessage, type ReconcileLogger } from '../logging/logger.js';
import { GrantReconciler } from '../reconciler/index.js';
import { WorkQueue } from './work-queue.js';

export type GrantControllerOptions = {
  reconciler: Pick<GrantReconciler, 'reconcile'>;
  events: GrantEventSource;
  workers: number;
  backoff: BackoffConfig;
  watchRestartMs: number;
  logger: ReconcileLogger;
};

export class GrantController {
  private readonly options: GrantControllerOptions;
  private readonly logger: ReconcileLogger;
  private queue: WorkQueue | undefined;
  private subscription: GrantSubscription | undefined;
  private restartTimer: ReturnType<typeof setTimeout> | undefined;
  private workers: Promise<void>[] = [];

  constructor(options: GrantControllerOptions) {
    this.options = options;
    this.logger = options.logger;
  }

  get running(): boolean {
    return this.queue !== undefined && !this.queue.isShuttingDown;
  }

  /**
   * Start the workers and the hub watch
   */
  async start(): Promise<void> {
    if (this.running) {
      return;
    }
    const queue = new WorkQueue(this.options.backoff);
    this.queue = queue;
    this.workers = Array.from({ length: this.options.workers }, (_, id) =>
      this.runWorker(queue, id)
    );
    this.logger.info('Grant controller started', { workers: this.options.workers });
    await this.watch(queue);
  }

  /**
   * Stop watching and shut the queue down. Resolves once every worker has
   * finished the item it was on.
   */
  async stop(): Promise<void> {
    const queue = this.queue;
    if (!queue || queue.isShuttingDown) {
      return;
    }
    if (this.restartTimer) {
      clearTimeout(this.restartTimer);
      this.restartTimer = undefined;
    }
    this.subscription?.close();
    this.subscription = undefined;
    queue.shutDown();
    await Promise.all(this.workers);
    this.workers = [];
    this.logger.info('Grant controller stopped');
  }

  private async watch(queue: WorkQueue): Promise<void> {
    try {
      this.subscription = await this.options.events.subscribe(
        (event) => queue.add(grantKey(event.ref)),
        (error) => this.onWatchClosed(queue, error)
      );
      this.logger.info('Watching grants');
    } catch (error) {
      this.logger.error('Could not watch grants', { error: errorMessage(error) });
      this.scheduleRestart(queue);
    }
  }

  private onWatchClosed(queue: WorkQueue, error?: unknown): void {
    this.subscription = undefined;
    if (queue.isShuttingDown) {
      return;
    }
    this.logger.warn('Grant watch ended', error === undefined ? {} : { error: errorMessage(error) });
    this.scheduleRestart(queue);
  }

  private scheduleRestart(queue: WorkQueue): void {
    if (queue.isShuttingDown) {
      return;
    }
    this.restartTimer = setTimeout(() => {
      this.restartTimer = undefined;
      if (!queue.isShuttingDown) {
        void this.watch(queue);
      }
    }, this.options.watchRestartMs);
  }

  private async runWorker(queue: WorkQueue, id: number): Promise<void> {
    for (;;) {
      const key = await queue.get();
      if (key === undefined) {
        return;
      }
      try {
        await this.process(queue, key, id);
      } finally {
        queue.done(key);
      }
    }
  }

  private async process(queue: WorkQueue, key: string, worker: number): Promise<void> {
    try {
      const outcome = await this.options.reconciler.reconcile(parseGrantKey(key));
      queue.forget(key);
      this.logger.debug('Reconciled grant', { grant: key, outcome: outcome.type, worker });
    } catch (error) {
      if (error instanceof GrantValidationError) {
        // Retrying cannot help; the next edit of the Grant triggers a new event
        queue.forget(key);
        this.logger.warn('Grant is invalid', { grant: key, codes: error.details?.codes });
        return;
      }
      this.logger.error('Reconcile failed; will retry', {
        grant: key,
        error: errorMessage(error),
        attempt: queue.numRequeues(key) + 1,
      });
      queue.addRateLimited(key);
    }
  }
}

/**
 * Wire the controller to the hub and spoke clusters named in `config` and start it
 */
export async function startGrantController(
  config: ControllerConfig,
  logger: ReconcileLogger = createConsoleLogger(config.logLevel)
): Promise<GrantController> {
  const repos = kubernetes.createKubernetesRepositoryContext({
    hub: config.hub,
    spoke: config.spoke,
  });
  const events = new kubernetes.KubeGrantEventSource(kubernetes.loadKubeConfig(config.hub));

  const controller = new GrantController({
    reconciler: new GrantReconciler({ repos, config, logger }),
    events,
    workers: config.workers,
    backoff: config.backoff,
    watchRestartMs: config.watchRestartMs,
    logger,
  });
  await controller.start();
  return controller;
}
