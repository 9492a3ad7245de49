export type SerialQueue = <T>(task: () => Promise<T>) => Promise<T>;

/**
 * Run tasks one at a time, in call order. A failed task rejects its own
 * caller and does not block the tasks queued behind it.
 */
export const createSerialQueue = (): SerialQueue => {
  let tail: Promise<void> = Promise.resolve();

  return <T>(task: () => Promise<T>): Promise<T> => {
    const run = tail.then(task);
    tail = run.then(
      () => undefined,
      () => undefined
    );
    return run;
  };
};
