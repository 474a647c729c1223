import type { Logger } from '../types/index.js';
import { SchedulerError, errorMessage } from './errors.js';
import { MinHeap } from './utils/min-heap.js';

/**
 * A simulation process.
 *
 * Each `yield` suspends the process for the yielded number of simulated days.
 * Work between two yields (including awaited collaborator calls) runs without
 * any other process interleaving and without moving the clock.
 */
export type SimProcess = AsyncGenerator<number, void, void>;

interface Task {
  name: string;
  process: SimProcess;
}

interface Wakeup {
  time: number;
  /** Insertion sequence: breaks ties between equal times */
  seq: number;
  task: Task;
}

/**
 * Scheduler options.
 */
export interface SchedulerOptions {
  logger?: Logger | undefined;
  /** Called with the new time before every resumed step and at the end of a run */
  onAdvance?: ((now: number) => void) | undefined;
  /** Called when a process throws; the process is retired and the run continues */
  onError?: ((taskName: string, error: unknown) => void) | undefined;
}

/**
 * Cooperative virtual-time scheduler.
 *
 * Wake-ups are ordered by (time, insertion sequence): for equal times the
 * wake-up registered first runs first, so runs are reproducible.
 */
export class Scheduler {
  private clock = 0;
  private sequence = 0;
  private running = false;
  private readonly queue = new MinHeap<Wakeup>(
    (a, b) => a.time - b.time || a.seq - b.seq
  );
  private readonly logger?: Logger | undefined;
  private readonly onAdvance?: ((now: number) => void) | undefined;
  private readonly onError?: ((taskName: string, error: unknown) => void) | undefined;

  constructor(options: SchedulerOptions = {}) {
    this.logger = options.logger?.child({ component: 'scheduler' });
    this.onAdvance = options.onAdvance;
    this.onError = options.onError;
  }

  /**
   * Current simulated time in days.
   */
  get now(): number {
    return this.clock;
  }

  /**
   * Number of wake-ups waiting in the queue.
   */
  get pending(): number {
    return this.queue.size;
  }

  /**
   * Register a process. Its first step runs at `now + delay`.
   */
  spawn(name: string, process: SimProcess, delay = 0): void {
    this.assertDelay(name, delay);
    this.schedule({ name, process }, this.clock + delay);
    this.logger?.debug({ process: name, at: this.clock + delay }, 'Process registered');
  }

  /**
   * Run until the queue is empty or the next wake-up is at or past `until`.
   * The clock ends at `until`.
   */
  async run(until: number): Promise<void> {
    if (this.running) {
      throw new SchedulerError('Scheduler is already running');
    }
    if (!Number.isFinite(until) || until < this.clock) {
      throw new SchedulerError(
        `Invalid horizon ${String(until)} (clock is at ${String(this.clock)})`
      );
    }

    this.running = true;
    let steps = 0;
    try {
      for (;;) {
        const next = this.queue.peek();
        if (!next || next.time >= until) break;
        this.queue.pop();

        this.clock = next.time;
        this.onAdvance?.(this.clock);
        await this.step(next.task);
        steps++;
      }
      this.clock = until;
      this.onAdvance?.(this.clock);
    } finally {
      this.running = false;
    }

    this.logger?.debug({ until, steps, pending: this.queue.size }, 'Scheduler run finished');
  }

  private async step(task: Task): Promise<void> {
    try {
      const result = await task.process.next();
      if (result.done) {
        this.logger?.debug({ process: task.name, at: this.clock }, 'Process finished');
        return;
      }
      this.assertDelay(task.name, result.value);
      this.schedule(task, this.clock + result.value);
    } catch (error) {
      this.logger?.error(
        { process: task.name, at: this.clock, error: errorMessage(error) },
        'Process failed and was retired'
      );
      this.report(task.name, error);
    }
  }

  private report(taskName: string, error: unknown): void {
    try {
      this.onError?.(taskName, error);
    } catch (hookError) {
      this.logger?.error(
        { process: taskName, at: this.clock, error: errorMessage(hookError) },
        'onError hook failed'
      );
    }
  }

  private schedule(task: Task, time: number): void {
    this.queue.push({ time, seq: this.sequence++, task });
  }

  private assertDelay(name: string, delay: number): void {
    if (!Number.isFinite(delay) || delay < 0) {
      throw new SchedulerError(`Process "${name}" yielded invalid delay ${String(delay)}`);
    }
  }
}
