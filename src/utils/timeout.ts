// src/utils/timeout.ts
import {
  AppError,
  CapabilityName,
  CapabilityTimeoutError,
  CapabilityUnavailableError,
  RunCancelledError,
  errorMessage,
} from '../core/errors';

export interface CapabilityCall {
  capability: CapabilityName;
  timeoutMs: number;
  /** Scope signal: aborts when the caller cancels or the surrounding budget runs out. */
  signal?: AbortSignal;
  /** Distinguishes a caller cancellation from any other abort of the scope signal. */
  isCancelled: () => boolean;
}

export interface LinkedController {
  controller: AbortController;
  dispose: () => void;
}

/**
 * Creates a controller that aborts whenever any parent aborts
 */
export function linkAbortSignals(...parents: Array<AbortSignal | undefined>): LinkedController {
  const controller = new AbortController();
  const cleanups: Array<() => void> = [];

  for (const parent of parents) {
    if (!parent) continue;
    if (parent.aborted) {
      controller.abort(parent.reason);
      break;
    }
    const onAbort = () => controller.abort(parent.reason);
    parent.addEventListener('abort', onAbort, { once: true });
    cleanups.push(() => parent.removeEventListener('abort', onAbort));
  }

  return {
    controller,
    dispose: () => cleanups.forEach(cleanup => cleanup()),
  };
}

function abortReason(signal: AbortSignal): Error {
  return signal.reason instanceof Error ? signal.reason : new Error('Operation aborted');
}

/**
 * Settles with the promise, or rejects as soon as the signal aborts
 */
export function raceAbort<T>(promise: Promise<T>, signal: AbortSignal): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(abortReason(signal));
    signal.addEventListener('abort', onAbort, { once: true });
    promise.then(
      value => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      error => {
        signal.removeEventListener('abort', onAbort);
        reject(error);
      }
    );
    if (signal.aborted) onAbort();
  });
}

function classifyFailure(call: CapabilityCall, error: unknown, timedOut: boolean): AppError {
  if (call.isCancelled()) return new RunCancelledError();
  if (timedOut) return new CapabilityTimeoutError(call.capability, call.timeoutMs);
  if (call.signal?.aborted && call.signal.reason instanceof AppError) return call.signal.reason;
  if (error instanceof AppError) return error;
  return new CapabilityUnavailableError(
    call.capability,
    `${call.capability} call failed: ${errorMessage(error)}`
  );
}

/**
 * Runs one request/response capability call under its own deadline.
 * Every failure comes back as an AppError: a timeout, a cancellation, or the
 * capability's own error (anything else is reported as unavailability).
 */
export async function callWithTimeout<T>(
  call: CapabilityCall,
  fn: (signal: AbortSignal) => Promise<T>
): Promise<T> {
  const { controller, dispose } = linkAbortSignals(call.signal);
  let timedOut = false;
  const timer = setTimeout(() => {
    timedOut = true;
    controller.abort();
  }, call.timeoutMs);

  try {
    if (controller.signal.aborted) {
      throw abortReason(controller.signal);
    }
    return await raceAbort(fn(controller.signal), controller.signal);
  } catch (error) {
    throw classifyFailure(call, error, timedOut);
  } finally {
    clearTimeout(timer);
    dispose();
  }
}

/**
 * Consumes an incremental capability response. The deadline applies to the
 * gap between fragments, not to the whole stream. Leaving early (consumer
 * break, timeout, cancellation) aborts the underlying call.
 */
export async function* streamWithTimeout(
  call: CapabilityCall,
  open: (signal: AbortSignal) => AsyncIterable<string>
): AsyncGenerator<string, void, undefined> {
  const { controller, dispose } = linkAbortSignals(call.signal);
  let timedOut = false;
  let timer: NodeJS.Timeout | undefined;
  let pending = false;
  let finished = false;

  const arm = () => {
    clearTimeout(timer);
    timer = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, call.timeoutMs);
  };

  let iterator: AsyncIterator<string> | undefined;
  try {
    iterator = open(controller.signal)[Symbol.asyncIterator]();
    while (true) {
      arm();
      let step: IteratorResult<string>;
      pending = true;
      try {
        step = await raceAbort(iterator.next(), controller.signal);
      } catch (error) {
        throw classifyFailure(call, error, timedOut);
      }
      pending = false;
      if (step.done) {
        finished = true;
        return;
      }
      yield step.value;
    }
  } catch (error) {
    throw classifyFailure(call, error, timedOut);
  } finally {
    clearTimeout(timer);
    if (!finished) {
      controller.abort();
      // A pending next() settles through the abort; only an idle iterator can be closed.
      if (iterator?.return && !pending) {
        await iterator.return();
      }
    }
    dispose();
  }
}
