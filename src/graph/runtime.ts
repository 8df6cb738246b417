import { GradingMode } from '../core/config';
import { CapabilityName } from '../core/errors';
import { CapabilitySet } from '../types/graph';
import {
  RunCallbacks,
  RunMetrics,
  RunOutcome,
  StepName,
  StepTiming,
} from '../types';
import { callWithTimeout, streamWithTimeout } from '../utils/timeout';

export interface WorkflowSettings {
  maxRewrites: number;
  topK: number;
  gradingMode: GradingMode;
  capabilityTimeout: number;
  totalTimeout: number;
}

/**
 * Per-run bookkeeping. Lives outside the graph state so that counters and
 * step timings survive a run that fails half way and ends in the fallback.
 */
export class RunRecorder {
  readonly startedAt = Date.now();
  readonly trace: StepName[] = [];
  private readonly timings: StepTiming[] = [];

  rewriteCount = 0;
  retrievalCycles = 0;
  retrievedChunkCount = 0;
  relevantChunkCount = 0;
  budgetExhausted = false;
  usedFallback = false;
  fallbackReason?: string;

  async time<T>(step: StepName, fn: () => Promise<T>): Promise<T> {
    this.trace.push(step);
    const start = Date.now();
    try {
      const result = await fn();
      this.timings.push({ step, durationMs: Date.now() - start, ok: true });
      return result;
    } catch (error) {
      this.timings.push({ step, durationMs: Date.now() - start, ok: false });
      throw error;
    }
  }

  elapsed(): number {
    return Date.now() - this.startedAt;
  }

  toMetrics(
    runId: string,
    outcome: RunOutcome,
    extra: { queryLength: number; answerLength: number; errorCode?: string }
  ): RunMetrics {
    return {
      runId,
      outcome,
      startedAt: this.startedAt,
      durationMs: this.elapsed(),
      steps: [...this.timings],
      rewriteCount: this.rewriteCount,
      retrievalCycles: this.retrievalCycles,
      retrievedChunkCount: this.retrievedChunkCount,
      relevantChunkCount: this.relevantChunkCount,
      budgetExhausted: this.budgetExhausted,
      usedFallback: this.usedFallback,
      fallbackReason: this.fallbackReason,
      queryLength: extra.queryLength,
      answerLength: extra.answerLength,
      errorCode: extra.errorCode,
    };
  }
}

export interface RunRuntimeOptions {
  capabilities: CapabilitySet;
  settings: WorkflowSettings;
  recorder: RunRecorder;
  callbacks: RunCallbacks;
  stream: boolean;
  /** Caller's cancellation signal. */
  cancelSignal?: AbortSignal;
  /** Signal bounding the current phase; defaults to the caller's. */
  scopeSignal?: AbortSignal;
}

/**
 * Everything a node needs besides the state: the capabilities, the limits,
 * the per-run recorder and the caller's callbacks. Built fresh for each run,
 * so concurrent runs share nothing mutable.
 */
export class RunRuntime {
  constructor(private readonly options: RunRuntimeOptions) {}

  get capabilities(): CapabilitySet {
    return this.options.capabilities;
  }

  get settings(): WorkflowSettings {
    return this.options.settings;
  }

  get recorder(): RunRecorder {
    return this.options.recorder;
  }

  get streaming(): boolean {
    return this.options.stream;
  }

  get isCancelled(): boolean {
    return this.options.cancelSignal?.aborted ?? false;
  }

  /** Same run, bounded by a different signal (the fallback runs outside the adaptive deadline). */
  withScope(scopeSignal: AbortSignal | undefined): RunRuntime {
    return new RunRuntime({ ...this.options, scopeSignal });
  }

  call<T>(capability: CapabilityName, fn: (signal: AbortSignal) => Promise<T>): Promise<T> {
    return callWithTimeout(
      {
        capability,
        timeoutMs: this.options.settings.capabilityTimeout,
        signal: this.options.scopeSignal ?? this.options.cancelSignal,
        isCancelled: () => this.isCancelled,
      },
      fn
    );
  }

  stream(
    capability: CapabilityName,
    open: (signal: AbortSignal) => AsyncIterable<string>
  ): AsyncGenerator<string, void, undefined> {
    return streamWithTimeout(
      {
        capability,
        timeoutMs: this.options.settings.capabilityTimeout,
        signal: this.options.scopeSignal ?? this.options.cancelSignal,
        isCancelled: () => this.isCancelled,
      },
      open
    );
  }

  emitFragment(text: string): void {
    if (text) this.options.callbacks.onFragment?.(text);
  }

  emitFallback(reason: string): void {
    this.options.callbacks.onFallback?.(reason);
  }

  step<T>(step: StepName, fn: () => Promise<T>): Promise<T> {
    this.options.callbacks.onStep?.(step);
    return this.recorder.time(step, fn);
  }
}
