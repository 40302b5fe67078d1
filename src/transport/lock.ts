/**
 * Transport Module - Command Lock
 *
 * FIFO mutual exclusion over a promise chain. One lock per physical device,
 * shared by every zone talking to it.
 */

export type CommandLock = Readonly<{
  /** Run `task` once every previously queued task has settled. */
  run<T>(task: () => Promise<T>): Promise<T>;
}>;

export function createCommandLock(): CommandLock {
  let tail: Promise<void> = Promise.resolve();

  return {
    run<T>(task: () => Promise<T>): Promise<T> {
      const result = tail.then(task);
      // Keep the chain alive when a task rejects; the caller still sees it.
      tail = result.then(
        () => undefined,
        () => undefined,
      );
      return result;
    },
  };
}
