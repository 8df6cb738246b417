/**
 * Incremental delivery of a run: step progress, answer fragments and a final
 * complete/error event, pulled by the caller as an async iterable.
 */

import { AppError, errorMessage } from '../core/errors';
import { QueryResult, RunCallbacks, RunEvent } from '../types';
import { linkAbortSignals } from '../utils/timeout';

/**
 * Push/pull bridge between callback producers and an async-iterable consumer.
 */
export class EventChannel<T extends object> implements AsyncIterable<T> {
  private readonly buffer: T[] = [];
  private readonly waiters: Array<(result: IteratorResult<T, undefined>) => void> = [];
  private closed = false;

  push(value: T): void {
    if (this.closed) return;
    const waiter = this.waiters.shift();
    if (waiter) {
      waiter({ value, done: false });
    } else {
      this.buffer.push(value);
    }
  }

  close(): void {
    this.closed = true;
    for (const waiter of this.waiters.splice(0)) {
      waiter({ value: undefined, done: true });
    }
  }

  [Symbol.asyncIterator](): AsyncIterator<T, undefined> {
    return {
      next: (): Promise<IteratorResult<T, undefined>> => {
        const value = this.buffer.shift();
        if (value !== undefined) {
          return Promise.resolve({ value, done: false });
        }
        if (this.closed) {
          return Promise.resolve({ value: undefined, done: true });
        }
        return new Promise<IteratorResult<T, undefined>>(resolve => {
          this.waiters.push(resolve);
        });
      },
    };
  }
}

export function toErrorPayload(error: unknown): { code: string; message: string } {
  return {
    code: error instanceof AppError ? error.code : 'INTERNAL_ERROR',
    message: errorMessage(error),
  };
}

export type StreamableRun = (callbacks: RunCallbacks, signal: AbortSignal) => Promise<QueryResult>;

/**
 * Runs `run` and yields its events as they happen. The last event is always
 * `complete` or `error`. Leaving the loop early cancels the run and waits for
 * it to release its resources.
 */
export async function* streamRun(
  run: StreamableRun,
  signal?: AbortSignal
): AsyncGenerator<RunEvent, void, undefined> {
  const channel = new EventChannel<RunEvent>();
  const { controller, dispose } = linkAbortSignals(signal);

  const completion = run(
    {
      onStep: step => channel.push({ type: 'step', step }),
      onFragment: text => channel.push({ type: 'fragment', text }),
      onFallback: reason => channel.push({ type: 'fallback', reason }),
    },
    controller.signal
  )
    .then(
      result => channel.push({ type: 'complete', result }),
      (error: unknown) => channel.push({ type: 'error', error: toErrorPayload(error) })
    )
    .finally(() => channel.close());

  try {
    yield* channel;
  } finally {
    controller.abort();
    await completion;
    dispose();
  }
}
