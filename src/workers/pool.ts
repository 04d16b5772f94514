/**
 * Fixed-size worker_threads pool for blocking jobs.
 * FIFO queue; a slot takes the oldest job when it goes idle. Slots are spawned on demand
 * up to `size` and a failed or cancelled slot is replaced on the next dispatch.
 */
import { Worker } from 'node:worker_threads';
import { z } from 'zod';
import { abortReason, errorMessage } from '../errors.js';
import { logger } from '../utils/logger.js';

export interface BlockingPool<Req, Res> {
  readonly size: number;
  run(request: Req, signal?: AbortSignal): Promise<Res>;
  close(): Promise<void>;
}

export interface PoolStats {
  size: number;
  spawned: number;
  busy: number;
  queued: number;
}

export interface WorkerPoolOptions<Res> {
  size: number;
  script: string | URL;
  /** Treat `script` as CommonJS source instead of a file. */
  eval?: boolean;
  decode: (value: unknown) => Res;
  name?: string;
}

/** Message shapes exchanged with worker scripts. */
export interface PoolRequestMessage<Req> {
  id: number;
  request: Req;
}

export type PoolReplyMessage =
  | { id: number; ok: true; value: unknown }
  | { id: number; ok: false; error: string };

const ReplySchema = z.discriminatedUnion('ok', [
  z.object({ id: z.number(), ok: z.literal(true), value: z.unknown() }),
  z.object({ id: z.number(), ok: z.literal(false), error: z.string() }),
]);

interface Task<Req, Res> {
  id: number;
  request: Req;
  resolve: (value: Res) => void;
  reject: (err: Error) => void;
  signal?: AbortSignal;
  onAbort?: () => void;
}

interface Slot<Req, Res> {
  worker: Worker;
  task: Task<Req, Res> | null;
  retired: boolean;
}

export class WorkerPool<Req, Res> implements BlockingPool<Req, Res> {
  readonly size: number;

  private readonly slots: Slot<Req, Res>[] = [];
  private readonly queue: Task<Req, Res>[] = [];
  private readonly name: string;
  private nextId = 1;
  private closed = false;

  constructor(private readonly options: WorkerPoolOptions<Res>) {
    if (!Number.isInteger(options.size) || options.size < 1) {
      throw new RangeError(`Worker pool size must be a positive integer, got ${options.size}`);
    }
    this.size = options.size;
    this.name = options.name ?? 'worker-pool';
  }

  run(request: Req, signal?: AbortSignal): Promise<Res> {
    if (this.closed) return Promise.reject(new Error(`${this.name}: pool is closed`));
    if (signal?.aborted) return Promise.reject(abortReason(signal));

    return new Promise<Res>((resolve, reject) => {
      const task: Task<Req, Res> = { id: this.nextId++, request, resolve, reject, signal };
      if (signal) {
        task.onAbort = () => this.cancel(task);
        signal.addEventListener('abort', task.onAbort, { once: true });
      }
      this.queue.push(task);
      this.drain();
    });
  }

  stats(): PoolStats {
    return {
      size: this.size,
      spawned: this.slots.length,
      busy: this.slots.filter((s) => s.task !== null).length,
      queued: this.queue.length,
    };
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    const closing = new Error(`${this.name}: pool is closed`);
    for (const task of this.queue.splice(0)) this.settle(task, { ok: false, error: closing });
    const slots = this.slots.splice(0);
    for (const slot of slots) {
      slot.retired = true;
      if (slot.task) this.settle(slot.task, { ok: false, error: closing });
      slot.task = null;
    }
    await Promise.all(slots.map((slot) => slot.worker.terminate()));
    logger.debug('Worker pool closed', { pool: this.name });
  }

  private drain(): void {
    while (this.queue.length > 0) {
      const slot = this.acquire();
      if (!slot) return;
      const task = this.queue.shift();
      if (!task) return;
      slot.task = task;
      slot.worker.ref();
      const message: PoolRequestMessage<Req> = { id: task.id, request: task.request };
      slot.worker.postMessage(message);
    }
  }

  private acquire(): Slot<Req, Res> | undefined {
    const idle = this.slots.find((s) => s.task === null);
    if (idle) return idle;
    if (this.slots.length < this.size) return this.spawn();
    return undefined;
  }

  private spawn(): Slot<Req, Res> {
    const worker = new Worker(this.options.script, { eval: this.options.eval ?? false });
    const slot: Slot<Req, Res> = { worker, task: null, retired: false };
    worker.on('message', (msg: unknown) => this.onMessage(slot, msg));
    worker.on('error', (err) => this.onFailure(slot, err));
    worker.on('exit', (code) => {
      if (!slot.retired) this.onFailure(slot, new Error(`worker exited with code ${code}`));
    });
    this.slots.push(slot);
    logger.debug('Worker pool: spawned slot', { pool: this.name, spawned: this.slots.length, size: this.size });
    return slot;
  }

  private onMessage(slot: Slot<Req, Res>, msg: unknown): void {
    const reply = ReplySchema.safeParse(msg);
    const task = slot.task;
    if (!reply.success || !task || reply.data.id !== task.id) {
      logger.warn('Worker pool: dropping unexpected message', { pool: this.name });
      return;
    }
    slot.task = null;
    slot.worker.unref();
    if (reply.data.ok) {
      let value: Res;
      try {
        value = this.options.decode(reply.data.value);
      } catch (err) {
        this.settle(task, { ok: false, error: new Error(`${this.name}: invalid worker reply: ${errorMessage(err)}`) });
        this.drain();
        return;
      }
      this.settle(task, { ok: true, value });
    } else {
      this.settle(task, { ok: false, error: new Error(reply.data.error) });
    }
    this.drain();
  }

  private onFailure(slot: Slot<Req, Res>, err: Error): void {
    if (slot.retired) return;
    logger.error('Worker pool: worker failed', { pool: this.name, error: err.message });
    const task = this.retire(slot);
    if (task) this.settle(task, { ok: false, error: new Error(`${this.name}: worker failed: ${err.message}`) });
    this.drain();
  }

  private cancel(task: Task<Req, Res>): void {
    const reason = task.signal ? abortReason(task.signal) : new Error('cancelled');
    const queued = this.queue.indexOf(task);
    if (queued !== -1) {
      this.queue.splice(queued, 1);
      this.settle(task, { ok: false, error: reason });
      return;
    }
    const slot = this.slots.find((s) => s.task === task);
    if (!slot) return;
    // a blocking call cannot be interrupted in place; drop the thread
    this.retire(slot);
    this.settle(task, { ok: false, error: reason });
    this.drain();
  }

  private retire(slot: Slot<Req, Res>): Task<Req, Res> | null {
    slot.retired = true;
    const idx = this.slots.indexOf(slot);
    if (idx !== -1) this.slots.splice(idx, 1);
    const task = slot.task;
    slot.task = null;
    slot.worker.terminate().catch((err: unknown) => {
      logger.warn('Worker pool: terminate failed', { pool: this.name, error: errorMessage(err) });
    });
    return task;
  }

  private settle(task: Task<Req, Res>, outcome: { ok: true; value: Res } | { ok: false; error: Error }): void {
    if (task.signal && task.onAbort) task.signal.removeEventListener('abort', task.onAbort);
    if (outcome.ok) task.resolve(outcome.value);
    else task.reject(outcome.error);
  }
}

/** Resolves a worker entry next to `base`, as .ts under a TS loader and .js when built. */
export function workerScript(name: string, base: string): URL {
  const ext = base.endsWith('.ts') ? '.ts' : '.js';
  return new URL(`./${name}${ext}`, base);
}
