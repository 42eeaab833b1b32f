/**
 * Push/pull bridge from callback sources (socket messages, test pushes)
 * to an `AsyncIterable`.
 *
 * Items pushed before anyone pulls are buffered. `fail` ends the sequence
 * with an error after the buffer drains; `close` ends it quietly.
 */

export interface AsyncQueue<T> extends AsyncIterable<T> {
  push: (item: T) => void;
  fail: (error: unknown) => void;
  close: () => void;
  readonly closed: boolean;
}

type Waiter<T> = {
  resolve: (result: IteratorResult<T>) => void;
  reject: (error: unknown) => void;
};

export const createAsyncQueue = <T>(): AsyncQueue<T> => {
  const buffer: T[] = [];
  const waiters: Waiter<T>[] = [];
  let done = false;
  let failure: { error: unknown } | null = null;

  const settleWaiters = (): void => {
    while (waiters.length > 0) {
      const waiter = waiters.shift();
      if (!waiter) break;
      if (failure) {
        waiter.reject(failure.error);
      } else {
        waiter.resolve({ value: undefined, done: true });
      }
    }
  };

  const push = (item: T): void => {
    if (done) return;
    const waiter = waiters.shift();
    if (waiter) {
      waiter.resolve({ value: item, done: false });
    } else {
      buffer.push(item);
    }
  };

  const fail = (error: unknown): void => {
    if (done) return;
    done = true;
    failure = { error };
    settleWaiters();
  };

  const close = (): void => {
    if (done) return;
    done = true;
    settleWaiters();
  };

  const next = (): Promise<IteratorResult<T>> => {
    if (buffer.length > 0) {
      const value = buffer.shift();
      if (value !== undefined) return Promise.resolve({ value, done: false });
    }
    if (failure) return Promise.reject(failure.error);
    if (done) return Promise.resolve({ value: undefined, done: true });
    return new Promise((resolve, reject) => {
      waiters.push({ resolve, reject });
    });
  };

  return {
    push,
    fail,
    close,
    get closed() {
      return done;
    },
    [Symbol.asyncIterator]: () => ({
      next,
      return: (): Promise<IteratorResult<T>> => {
        close();
        buffer.length = 0;
        return Promise.resolve({ value: undefined, done: true });
      },
    }),
  };
};
