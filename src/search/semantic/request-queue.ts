import { logger } from '../../utils/logger';

type QueuedRequest = () => Promise<void>;

/**
 * Caps how many embedding calls are in flight at once, so indexing a large
 * recipe collection does not flood the embedding server.
 */
export class RequestQueue {
  private queue: QueuedRequest[] = [];
  private activeRequests = 0;
  private maxConcurrent: number;

  constructor(maxConcurrent = 3) {
    this.maxConcurrent = maxConcurrent;
  }

  add<T>(request: () => Promise<T>): Promise<T> {
    return new Promise<T>((resolve, reject) => {
      this.queue.push(async () => {
        try {
          this.activeRequests++;
          resolve(await request());
        } catch (error) {
          reject(error);
        } finally {
          this.activeRequests--;
          this.processNext();
        }
      });

      if (this.activeRequests >= this.maxConcurrent) {
        logger.debug(`RequestQueue: Embedding request waiting (${this.queue.length} queued)`);
      }
      this.processNext();
    });
  }

  private processNext(): void {
    while (this.queue.length > 0 && this.activeRequests < this.maxConcurrent) {
      const request = this.queue.shift();
      if (!request) {
        return;
      }
      // Settlement is reported through the promise returned by add()
      void request();
    }
  }

  getQueueSize(): number {
    return this.queue.length;
  }

  getActiveRequests(): number {
    return this.activeRequests;
  }
}
