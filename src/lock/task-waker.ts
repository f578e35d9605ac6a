import type { Waker } from '../types/lock.js';

type TaskWakerState = 'pending' | 'woken' | 'abandoned' | 'passed';

/**
 * Waker backed by a promise the suspended task awaits.
 *
 * Only the first wakeup is taken. Any later one, or one that reaches a task
 * that stopped waiting (it acquired on its retry, or was aborted), is
 * declined so the adapter moves on to the next queued waiter. A wakeup the
 * task took and then had no use for is handed on through `passOn`.
 */
export class TaskWaker implements Waker {
  readonly promise: Promise<void>;
  private readonly resolvePromise: () => void;
  private readonly passOn: () => void;
  private state: TaskWakerState = 'pending';

  constructor(passOn: () => void) {
    let resolve: () => void = () => undefined;
    this.promise = new Promise<void>((done) => {
      resolve = done;
    });
    this.resolvePromise = resolve;
    this.passOn = passOn;
  }

  wake(): boolean {
    if (this.state === 'pending') {
      this.state = 'woken';
      this.resolvePromise();
      return true;
    }

    if (this.state === 'abandoned') {
      this.state = 'passed';
    }
    // a stale queue entry: the task was resumed already and retries on its own
    return false;
  }

  /**
   * The task stopped waiting on this waker. A wakeup it already took goes
   * to the next waiter; one that arrives later is declined.
   */
  abandon(): void {
    if (this.state === 'pending') {
      this.state = 'abandoned';
      return;
    }

    if (this.state === 'woken') {
      this.state = 'passed';
      this.passOn();
    }
  }

  isWoken(): boolean {
    return this.state === 'woken';
  }
}
