// Readers-writer lock
//
// Any number of readers, or one writer. Waiters are served in arrival order,
// so a queued writer is not starved by readers arriving after it.

export type LockMode = 'read' | 'write';

type Waiter = {
  mode: LockMode;
  grant: () => void;
};

export class ReadWriteLock {
  private readers = 0;
  private writing = false;
  private queue: Waiter[] = [];

  /**
   * Wait for the lock.
   * @returns A function that releases it; call it exactly once
   */
  async acquire(mode: LockMode): Promise<() => void> {
    if (this.queue.length === 0 && this.isFree(mode)) {
      this.take(mode);
    } else {
      await new Promise<void>((resolve) => {
        this.queue.push({ mode, grant: resolve });
      });
    }

    let released = false;
    return () => {
      if (released) return;
      released = true;
      this.release(mode);
    };
  }

  private isFree(mode: LockMode): boolean {
    return mode === 'read' ? !this.writing : !this.writing && this.readers === 0;
  }

  private take(mode: LockMode): void {
    if (mode === 'read') {
      this.readers += 1;
    } else {
      this.writing = true;
    }
  }

  private release(mode: LockMode): void {
    if (mode === 'read') {
      this.readers -= 1;
    } else {
      this.writing = false;
    }

    while (this.queue.length > 0 && this.isFree(this.queue[0].mode)) {
      const next = this.queue.shift();
      if (!next) break;
      this.take(next.mode);
      next.grant();
    }
  }
}
