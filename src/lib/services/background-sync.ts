/**
 * Background sync runner
 *
 * Read paths call trigger() and move on. Tasks run one at a time on a
 * promise chain; a failing task is logged and never reaches the caller.
 */

import { errorMessage } from '../errors';
import type { SyncEngine } from '../../types';

export class BackgroundSyncRunner {
  private queue: Promise<void> = Promise.resolve();
  private pending = 0;

  constructor(private engine: Pick<SyncEngine, 'sync' | 'isRunning'>) {}

  /**
   * Queue a sync unless one is running or already queued
   */
  trigger(): void {
    if (this.engine.isRunning() || this.pending > 0) {
      console.log('[BackgroundSync] Sync already running or queued, skipping');
      return;
    }

    this.pending++;
    this.queue = this.queue
      .then(() => this.run())
      .finally(() => {
        this.pending--;
      });
  }

  /** Resolves once every queued task has finished */
  whenIdle(): Promise<void> {
    return this.queue;
  }

  private async run(): Promise<void> {
    try {
      const result = await this.engine.sync();
      if (result.status === 'error') {
        console.warn('[BackgroundSync] Sync finished with errors:', result.errors);
      }
    } catch (error) {
      console.error('[BackgroundSync] Sync task failed:', errorMessage(error));
    }
  }
}
