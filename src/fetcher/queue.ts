import PQueue from 'p-queue';

/**
 * Bounded worker pool for downloads, wrapping p-queue.
 * At most `concurrency` tasks run at once; a task's rejection reaches only
 * its own caller.
 */
export class DownloadQueue {
  private readonly queue: PQueue;

  constructor(concurrency: number) {
    this.queue = new PQueue({ concurrency: Math.max(1, concurrency) });
  }

  /**
   * Schedule `fn` and resolve with its result once a worker slot frees up.
   */
  add<T>(fn: () => Promise<T>): Promise<T> {
    return this.queue.add(fn, { throwOnTimeout: true });
  }
}
