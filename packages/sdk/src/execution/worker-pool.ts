/**
 * Worker Pool
 * Bounded worker_threads pool for providers whose generation blocks
 *
 * A closure cannot cross a thread boundary, so work is addressed by module
 * and export name: the worker imports the module and calls the export with
 * structured-clone-able arguments.
 */

import { Worker } from 'node:worker_threads';
import { isAbsolute } from 'node:path';
import { pathToFileURL } from 'node:url';
import { z } from 'zod';
import { ErrorCode, ErrorFactory } from '../types/errors';

const WORKER_SOURCE = `
const { parentPort } = require('node:worker_threads');
parentPort.on('message', async (task) => {
  try {
    const mod = await import(task.moduleUrl);
    const fn = mod[task.exportName];
    if (typeof fn !== 'function') {
      throw new Error('Export ' + task.exportName + ' is not a function');
    }
    const value = await fn(...task.args);
    parentPort.postMessage({ ok: true, value });
  } catch (error) {
    parentPort.postMessage({ ok: false, message: error instanceof Error ? error.message : String(error) });
  }
});
`;

const WorkerReplySchema = z.union([
  z.object({ ok: z.literal(true), value: z.unknown() }),
  z.object({ ok: z.literal(false), message: z.string() })
]);

export interface WorkerPoolConfig {
  maxWorkers?: number;
}

interface Task {
  moduleUrl: string;
  exportName: string;
  args: unknown[];
  resolve: (value: unknown) => void;
  reject: (error: Error) => void;
}

interface Slot {
  worker: Worker;
  task?: Task;
}

export class WorkerPool {
  private readonly slots = new Set<Slot>();
  private readonly queue: Task[] = [];
  private readonly config: Required<WorkerPoolConfig>;
  private closed = false;

  constructor(config: WorkerPoolConfig = {}) {
    this.config = {
      maxWorkers: Math.max(1, config.maxWorkers ?? 2)
    };
  }

  /**
   * Run `exportName` from `modulePath` (absolute path or URL) on a worker thread
   */
  run(modulePath: string, exportName: string, args: unknown[] = []): Promise<unknown> {
    if (this.closed) {
      return Promise.reject(
        ErrorFactory.create(ErrorCode.Internal, 'Worker pool is closed', 'worker-pool')
      );
    }

    const moduleUrl = isAbsolute(modulePath) ? pathToFileURL(modulePath).href : modulePath;

    return new Promise<unknown>((resolve, reject) => {
      this.queue.push({ moduleUrl, exportName, args, resolve, reject });
      this.drain();
    });
  }

  /**
   * Like `run`, for exports that produce text
   */
  async runText(modulePath: string, exportName: string, args: unknown[] = []): Promise<string> {
    const value = await this.run(modulePath, exportName, args);
    if (typeof value !== 'string') {
      throw ErrorFactory.create(
        ErrorCode.ContractViolation,
        `${exportName} returned ${typeof value}, expected string`,
        'worker-pool'
      );
    }
    return value;
  }

  get size(): number {
    return this.slots.size;
  }

  get pending(): number {
    return this.queue.length;
  }

  /**
   * Terminate every worker and reject queued work
   */
  async destroy(): Promise<void> {
    this.closed = true;

    for (const task of this.queue.splice(0)) {
      task.reject(ErrorFactory.create(ErrorCode.Internal, 'Worker pool destroyed', 'worker-pool'));
    }

    const slots = Array.from(this.slots);
    this.slots.clear();
    await Promise.allSettled(
      slots.map(async (slot) => {
        slot.task?.reject(
          ErrorFactory.create(ErrorCode.Internal, 'Worker pool destroyed', 'worker-pool')
        );
        await slot.worker.terminate();
      })
    );
  }

  private drain(): void {
    while (this.queue.length > 0) {
      const slot = this.idleSlot() ?? this.spawn();
      if (!slot) {
        return;
      }
      const task = this.queue.shift();
      if (!task) {
        return;
      }
      this.assign(slot, task);
    }
  }

  private idleSlot(): Slot | undefined {
    for (const slot of this.slots) {
      if (!slot.task) {
        return slot;
      }
    }
    return undefined;
  }

  private spawn(): Slot | undefined {
    if (this.slots.size >= this.config.maxWorkers) {
      return undefined;
    }

    const slot: Slot = { worker: new Worker(WORKER_SOURCE, { eval: true }) };

    slot.worker.on('message', (message: unknown) => {
      const task = slot.task;
      slot.task = undefined;
      slot.worker.unref();

      if (task) {
        const reply = WorkerReplySchema.safeParse(message);
        if (!reply.success) {
          task.reject(
            ErrorFactory.create(ErrorCode.Internal, 'Malformed worker reply', 'worker-pool')
          );
        } else if (reply.data.ok) {
          task.resolve(reply.data.value);
        } else {
          task.reject(
            ErrorFactory.create(ErrorCode.BackendFailure, reply.data.message, 'worker-pool', {
              exportName: task.exportName
            })
          );
        }
      }

      this.drain();
    });

    slot.worker.on('error', (error) => {
      this.slots.delete(slot);
      slot.task?.reject(ErrorFactory.fromUnknown(ErrorCode.BackendFailure, error, 'worker-pool'));
      slot.task = undefined;
      this.drain();
    });

    // a worker can also die without an 'error', e.g. process.exit() in the task module
    slot.worker.on('exit', (exitCode: number) => {
      if (!this.slots.delete(slot)) {
        return;
      }
      const task = slot.task;
      slot.task = undefined;
      if (task) {
        task.reject(
          ErrorFactory.create(
            ErrorCode.BackendFailure,
            `Worker exited with code ${exitCode}`,
            'worker-pool',
            { exitCode, exportName: task.exportName }
          )
        );
      }
      if (!this.closed) {
        this.drain();
      }
    });

    this.slots.add(slot);
    return slot;
  }

  private assign(slot: Slot, task: Task): void {
    slot.task = task;
    slot.worker.ref();
    slot.worker.postMessage({
      moduleUrl: task.moduleUrl,
      exportName: task.exportName,
      args: task.args
    });
  }
}
