/**
 * Single-concurrency job queue through which every ledger writer runs.
 *
 * Paired trades and rebalances never overlap. Cancelling drops jobs that
 * have not started and closes the queue to new ones; a running job always
 * finishes, so fill verification is never abandoned halfway.
 */

import PQueue from "p-queue";

export type JobStatus = "pending" | "running" | "completed" | "failed" | "cancelled";

export interface JobHandle<T> {
  id: string;
  promise: Promise<T>;
  getStatus: () => JobStatus;
}

export class JobCancelledError extends Error {
  constructor(public readonly jobId: string) {
    super(`Job ${jobId} was cancelled before it started`);
    this.name = "JobCancelledError";
  }
}

export interface SerialQueue {
  enqueue: <T>(id: string, job: () => Promise<T>) => JobHandle<T>;
  /**
   * Cancel every job that has not started and reject later submissions;
   * returns how many were dropped
   */
  cancelPending: () => number;
  /** Status of a job still queued or running; null once it has settled */
  getStatus: (id: string) => JobStatus | null;
  /** Waiting jobs plus the running one */
  getPendingCount: () => number;
  waitForIdle: () => Promise<void>;
}

export const createSerialQueue = (): SerialQueue => {
  const queue = new PQueue({ concurrency: 1 });
  // Live jobs only; an entry is dropped once its job settles
  const jobs = new Map<string, () => JobStatus>();
  const waiting = new Map<string, () => void>();
  let closed = false;

  const enqueue = <T>(id: string, job: () => Promise<T>): JobHandle<T> => {
    if (jobs.has(id)) {
      throw new Error(`Job ${id} is already queued`);
    }
    if (closed) {
      return {
        id,
        promise: Promise.reject(new JobCancelledError(id)),
        getStatus: () => "cancelled",
      };
    }

    const controller = new AbortController();
    let status: JobStatus = "pending";
    jobs.set(id, () => status);
    waiting.set(id, () => {
      status = "cancelled";
      controller.abort();
    });

    const promise = queue
      .add(
        async () => {
          waiting.delete(id);
          status = "running";
          try {
            const result = await job();
            status = "completed";
            return result;
          } catch (error) {
            status = "failed";
            throw error;
          }
        },
        { signal: controller.signal, throwOnTimeout: true },
      )
      .catch((error: unknown) => {
        if (status === "cancelled") throw new JobCancelledError(id);
        throw error;
      })
      .finally(() => {
        jobs.delete(id);
      });

    return { id, promise, getStatus: () => status };
  };

  const cancelPending = (): number => {
    closed = true;
    const cancelled = waiting.size;
    for (const cancel of waiting.values()) {
      cancel();
    }
    waiting.clear();
    return cancelled;
  };

  return {
    enqueue,
    cancelPending,
    getStatus: (id) => jobs.get(id)?.() ?? null,
    getPendingCount: () => queue.size + queue.pending,
    waitForIdle: () => queue.onIdle(),
  };
};
