/**
 * Append Lock
 * ===========
 *
 * In-process FIFO mutex for the append path, with a bounded wait.
 * A waiter that gives up never runs its job; its slot is handed on as soon
 * as its turn arrives.
 */

import { StorageError } from '../../../common/errors.js';

export class AppendLock {
  private tail: Promise<void> = Promise.resolve();

  constructor(private readonly timeoutMs: number) {}

  async runExclusive<T>(fn: () => Promise<T>): Promise<T> {
    const previous = this.tail;
    let release: () => void = () => {};
    const current = new Promise<void>(resolve => {
      release = resolve;
    });
    this.tail = previous.then(() => current);

    const acquired = await this.waitTurn(previous);
    if (!acquired) {
      void previous.then(release);
      throw new StorageError(`lock timeout after ${this.timeoutMs}ms`);
    }

    try {
      return await fn();
    } finally {
      release();
    }
  }

  private async waitTurn(previous: Promise<void>): Promise<boolean> {
    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<boolean>(resolve => {
      timer = setTimeout(() => resolve(false), this.timeoutMs);
    });

    try {
      return await Promise.race([previous.then(() => true), timeout]);
    } finally {
      clearTimeout(timer);
    }
  }
}
