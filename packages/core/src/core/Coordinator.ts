/**
 * Coordinator - serial task queue on the main event loop
 *
 * Program data is only read from coordinator tasks. Posted tasks run one
 * per event-loop turn, in post order, so I/O and timers interleave with
 * a long batch the way a host's main-thread tick would.
 */

export type TaskOutcome<T> =
  | { status: 'done'; value: T }
  | { status: 'failed'; error: unknown }
  | { status: 'withdrawn' };

/**
 * Handle to a posted task. `result` never rejects.
 */
export interface CoordinatorTask<T> {
  readonly result: Promise<TaskOutcome<T>>;
  readonly started: boolean;
  readonly settled: boolean;
  /**
   * Drop a task that has not started. Returns false once it has.
   */
  withdraw(): boolean;
}

interface Runnable {
  run(): void;
}

class QueuedTask<T> implements CoordinatorTask<T>, Runnable {
  readonly result: Promise<TaskOutcome<T>>;
  private readonly body: () => T;
  private readonly settle: (outcome: TaskOutcome<T>) => void;
  private state: 'queued' | 'running' | 'settled' = 'queued';

  constructor(body: () => T) {
    this.body = body;
    let settle: (outcome: TaskOutcome<T>) => void = () => {};
    this.result = new Promise<TaskOutcome<T>>((resolve) => {
      settle = resolve;
    });
    this.settle = settle;
  }

  get started(): boolean {
    return this.state !== 'queued';
  }

  get settled(): boolean {
    return this.state === 'settled';
  }

  withdraw(): boolean {
    if (this.state !== 'queued') {
      return false;
    }
    this.state = 'settled';
    this.settle({ status: 'withdrawn' });
    return true;
  }

  run(): void {
    if (this.state !== 'queued') return;
    this.state = 'running';
    let outcome: TaskOutcome<T>;
    try {
      outcome = { status: 'done', value: this.body() };
    } catch (error) {
      outcome = { status: 'failed', error };
    }
    this.state = 'settled';
    this.settle(outcome);
  }
}

export class Coordinator {
  private readonly queue: Runnable[] = [];
  private scheduled = false;

  post<T>(body: () => T): CoordinatorTask<T> {
    const task = new QueuedTask(body);
    this.queue.push(task);
    this.schedule();
    return task;
  }

  /** Tasks posted but not yet run (withdrawn ones included) */
  get pending(): number {
    return this.queue.length;
  }

  private schedule(): void {
    if (this.scheduled) return;
    this.scheduled = true;
    setImmediate(() => this.drain());
  }

  private drain(): void {
    this.scheduled = false;
    const task = this.queue.shift();
    task?.run();
    if (this.queue.length > 0) {
      this.schedule();
    }
  }
}
