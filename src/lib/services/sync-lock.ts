/**
 * Single-slot lock guarding device sync. Never blocks: a caller that cannot
 * acquire it is told immediately.
 */
export class SyncLock {
  private acquiredAt: number | null = null;

  tryAcquire(): boolean {
    if (this.acquiredAt !== null) {
      return false;
    }
    this.acquiredAt = Date.now();
    return true;
  }

  release(): void {
    this.acquiredAt = null;
  }

  isRunning(): boolean {
    return this.acquiredAt !== null;
  }
}
