import { abortReason } from '../../src/errors.js';
import type { BlockingPool } from '../../src/workers/pool.js';

/** In-process stand-in for WorkerPool: runs the handler on a later turn of the event loop. */
export class InlinePool<Req, Res> implements BlockingPool<Req, Res> {
  readonly requests: Req[] = [];
  closed = false;

  constructor(private readonly handler: (request: Req) => Res | Promise<Res>, readonly size = 4) {}

  run(request: Req, signal?: AbortSignal): Promise<Res> {
    if (this.closed) return Promise.reject(new Error('inline pool is closed'));
    this.requests.push(request);
    return new Promise<Res>((resolve, reject) => {
      setImmediate(() => {
        if (signal?.aborted) {
          reject(abortReason(signal));
          return;
        }
        try {
          Promise.resolve(this.handler(request)).then(resolve, reject);
        } catch (err) {
          reject(err);
        }
      });
    });
  }

  async close(): Promise<void> {
    this.closed = true;
  }
}
