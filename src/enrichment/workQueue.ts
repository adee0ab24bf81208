import { log } from '../log';

export interface WorkItem {
  name: string;
  run: () => Promise<void>;
}

export interface WorkQueueOptions {
  name: string;
  concurrency: number;
  /** Maximum number of items waiting for a worker. */
  limit: number;
}

/**
 * Bounded in-process worker pool. Items run at most `concurrency` at a time
 * with no ordering guarantee between concurrently running items.
 */
export class WorkQueue {
  private readonly pending: WorkItem[] = [];
  private readonly idleWaiters: Array<() => void> = [];
  private active = 0;

  constructor(private readonly options: WorkQueueOptions) {}

  public push(item: WorkItem): boolean {
    if (this.pending.length >= this.options.limit) {
      log.warn(
        { event: 'work_queue_full', queue: this.options.name, item: item.name, limit: this.options.limit },
        'work queue full; item dropped',
      );
      return false;
    }

    this.pending.push(item);
    setImmediate(() => this.drain());
    return true;
  }

  public size(): number {
    return this.pending.length;
  }

  public activeCount(): number {
    return this.active;
  }

  /** Resolves once nothing is running or waiting. */
  public onIdle(): Promise<void> {
    if (this.isIdle()) {
      return Promise.resolve();
    }
    return new Promise((resolve) => {
      this.idleWaiters.push(resolve);
    });
  }

  private isIdle(): boolean {
    return this.active === 0 && this.pending.length === 0;
  }

  private drain(): void {
    while (this.active < this.options.concurrency && this.pending.length > 0) {
      const item = this.pending.shift();
      if (!item) {
        break;
      }
      this.active += 1;
      void this.runItem(item);
    }
  }

  private async runItem(item: WorkItem): Promise<void> {
    try {
      await item.run();
    } catch (error) {
      log.error(
        { err: error, event: 'work_item_failed', queue: this.options.name, item: item.name },
        'work item failed',
      );
    } finally {
      this.active -= 1;
      this.drain();
      if (this.isIdle()) {
        const waiters = this.idleWaiters.splice(0);
        for (const resolve of waiters) {
          resolve();
        }
      }
    }
  }
}
