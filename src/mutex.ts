export type Mutex = {
  /** Run `fn` once every earlier caller has finished. The lock is released even if `fn` throws. */
  runExclusive<T>(fn: () => T | Promise<T>): Promise<T>;
};

export function createMutex(): Mutex {
  // Settles when the current holder finishes, whether it succeeded or not.
  let tail: Promise<void> = Promise.resolve();
  return {
    runExclusive<T>(fn: () => T | Promise<T>): Promise<T> {
      const run = tail.then(() => fn());
      tail = run.then(
        () => undefined,
        () => undefined,
      );
      return run;
    },
  };
}
