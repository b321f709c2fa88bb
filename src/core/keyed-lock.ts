import { AsyncLocalStorage } from "node:async_hooks";

/**
 * One queue per key. A task already holding a key may take it again,
 * so recovery hooks that call back into the engine do not deadlock.
 *
 * A hold is a token, valid only while its `runExclusive` call is
 * running. Async work that outlives the call keeps a stale token and
 * queues like any other caller.
 */
export class KeyedMutex {
  private readonly tails = new Map<string, Promise<void>>();
  private readonly holders = new Map<string, symbol>();
  private readonly held = new AsyncLocalStorage<ReadonlyMap<string, symbol>>();

  isHeld(key: string): boolean {
    const token = this.held.getStore()?.get(key);
    return token !== undefined && this.holders.get(key) === token;
  }

  async runExclusive<T>(key: string, task: () => Promise<T>): Promise<T> {
    if (this.isHeld(key)) {
      return task();
    }

    let release: () => void = () => {};
    const current = new Promise<void>((resolve) => {
      release = resolve;
    });
    const previous = this.tails.get(key) ?? Promise.resolve();
    const tail = previous.then(() => current);
    this.tails.set(key, tail);

    await previous;
    const token = Symbol(key);
    this.holders.set(key, token);
    const heldKeys = new Map(this.held.getStore() ?? []);
    heldKeys.set(key, token);
    try {
      return await this.held.run(heldKeys, task);
    } finally {
      if (this.holders.get(key) === token) {
        this.holders.delete(key);
      }
      release();
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    }
  }
}
