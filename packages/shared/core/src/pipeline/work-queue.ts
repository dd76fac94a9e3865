/**
 * Single-consumer task queue.
 *
 * Every pipeline transition is posted here instead of being called in
 * place, so dispatch chains never grow the call stack and no transition
 * runs inside another one.
 */

export type Task = () => void;

export class WorkQueue {
  private tasks: Task[] = [];
  private scheduled = false;

  constructor(private readonly onError: (error: unknown) => void) {}

  post(task: Task): void {
    this.tasks.push(task);
    if (!this.scheduled) {
      this.scheduled = true;
      queueMicrotask(() => this.drain());
    }
  }

  get size(): number {
    return this.tasks.length;
  }

  clear(): void {
    this.tasks = [];
  }

  private drain(): void {
    // Tasks posted while draining run in this same pass
    let task = this.tasks.shift();
    while (task) {
      try {
        task();
      } catch (error) {
        this.onError(error);
      }
      task = this.tasks.shift();
    }
    this.scheduled = false;
  }
}
