import { randomUUID } from 'node:crypto';
import { config } from '../core/config';
import { logger } from '../core/logger';
import {
  AppError,
  RunCancelledError,
  ValidationError,
  errorMessage,
} from '../core/errors';
import { CapabilitySet } from '../types/graph';
import {
  ConversationTurn,
  MetricsSink,
  QueryResult,
  RunEvent,
  RunMetrics,
  RunOptions,
  TerminalAnswer,
} from '../types';
import { linkAbortSignals } from '../utils/timeout';
import { maskSensitiveData } from '../utils/security';
import { Conversation } from './conversation';
import { runFallbackPipeline } from './fallback';
import { createWorkflowGraph, recursionLimitFor } from './graph';
import { streamRun } from './graph-stream';
import { RunRecorder, RunRuntime, WorkflowSettings } from './runtime';
import { createInitialState } from './state';

export const DEFAULT_SETTINGS: WorkflowSettings = {
  maxRewrites: config.workflow.maxRewrites,
  topK: config.retrieval.topK,
  gradingMode: config.workflow.gradingMode,
  capabilityTimeout: config.workflow.capabilityTimeout,
  totalTimeout: config.workflow.totalTimeout,
};

export interface OrchestratorOptions {
  settings?: Partial<WorkflowSettings>;
  metricsSinks?: MetricsSink[];
}

/**
 * Entry point for answering questions. Runs the adaptive graph and, when any
 * of its nodes fails for good, the single-pass fallback. Holds no per-run
 * state, so one instance serves any number of concurrent sessions.
 */
export class QueryOrchestrator {
  private readonly settings: WorkflowSettings;
  private readonly sinks = new Set<MetricsSink>();

  constructor(
    private readonly capabilities: CapabilitySet,
    options: OrchestratorOptions = {}
  ) {
    this.settings = { ...DEFAULT_SETTINGS, ...options.settings };
    if (!Number.isInteger(this.settings.maxRewrites) || this.settings.maxRewrites < 0) {
      throw new ValidationError('maxRewrites must be a non-negative integer', {
        maxRewrites: this.settings.maxRewrites,
      });
    }
    if (!Number.isInteger(this.settings.topK) || this.settings.topK < 1) {
      throw new ValidationError('topK must be a positive integer', { topK: this.settings.topK });
    }
    options.metricsSinks?.forEach(sink => this.sinks.add(sink));
  }

  getSettings(): WorkflowSettings {
    return { ...this.settings };
  }

  /** Registers an analytics sink; returns the function that removes it. */
  onMetrics(sink: MetricsSink): () => void {
    this.sinks.add(sink);
    return () => {
      this.sinks.delete(sink);
    };
  }

  /**
   * Answers `query` in the context of `conversation`. On success the question
   * and the answer are appended to the conversation. Rejects with
   * FallbackFailureError when no answer could be produced, or RunCancelledError
   * when the caller aborted.
   */
  async runQuery(
    conversation: Conversation,
    query: string,
    options: RunOptions = {}
  ): Promise<QueryResult> {
    const question = query.trim();
    if (!question) {
      throw new ValidationError('Query must not be empty');
    }

    const runId = randomUUID();
    const recorder = new RunRecorder();
    const runtime = new RunRuntime({
      capabilities: this.capabilities,
      settings: this.settings,
      recorder,
      callbacks: options,
      stream: options.stream ?? false,
      cancelSignal: options.signal,
    });

    logger.info('Starting run', {
      runId,
      query: maskSensitiveData(question.substring(0, 100)),
      historyTurns: conversation.length,
      maxRewrites: this.settings.maxRewrites,
    });

    try {
      if (options.signal?.aborted) {
        throw new RunCancelledError();
      }

      const answer = await this.answer(runtime, conversation.snapshot(), question, options.signal);

      conversation.append('user', question);
      conversation.append('assistant', answer.text);

      const result: QueryResult = {
        runId,
        answerText: answer.text,
        citations: answer.citations,
        usedFallback: recorder.usedFallback,
        rewriteCount: recorder.rewriteCount,
        retrievalCycles: recorder.retrievalCycles,
        trace: [...recorder.trace],
        durationMs: recorder.elapsed(),
      };

      logger.info('Run completed', {
        runId,
        origin: answer.origin,
        durationMs: result.durationMs,
        rewriteCount: result.rewriteCount,
        usedFallback: result.usedFallback,
        citations: result.citations.length,
      });

      this.emitMetrics(
        recorder.toMetrics(runId, 'answered', {
          queryLength: question.length,
          answerLength: answer.text.length,
        })
      );
      return result;
    } catch (error) {
      const failure =
        error instanceof AppError ? error : new AppError(errorMessage(error), 'INTERNAL_ERROR');
      const cancelled = failure instanceof RunCancelledError;

      if (cancelled) {
        logger.info('Run cancelled', { runId, durationMs: recorder.elapsed() });
      } else {
        logger.error('Run failed', {
          runId,
          code: failure.code,
          error: failure.message,
          usedFallback: recorder.usedFallback,
        });
      }

      this.emitMetrics(
        recorder.toMetrics(runId, cancelled ? 'cancelled' : 'failed', {
          queryLength: question.length,
          answerLength: 0,
          errorCode: failure.code,
        })
      );
      throw failure;
    }
  }

  /** Same run as `runQuery`, delivered as events; answer fragments arrive as they are generated. */
  streamQuery(
    conversation: Conversation,
    query: string,
    options: { signal?: AbortSignal } = {}
  ): AsyncGenerator<RunEvent, void, undefined> {
    return streamRun(
      (callbacks, signal) =>
        this.runQuery(conversation, query, { ...callbacks, signal, stream: true }),
      options.signal
    );
  }

  private async answer(
    runtime: RunRuntime,
    history: ConversationTurn[],
    question: string,
    cancelSignal: AbortSignal | undefined
  ): Promise<TerminalAnswer> {
    const { totalTimeout, maxRewrites, topK } = this.settings;
    const deadline = linkAbortSignals(cancelSignal);
    const timer = setTimeout(
      () =>
        deadline.controller.abort(
          new AppError(`Adaptive workflow exceeded ${totalTimeout}ms`, 'CAPABILITY_TIMEOUT', 504)
        ),
      totalTimeout
    );

    let fallbackReason: string;
    try {
      const graph = createWorkflowGraph(runtime.withScope(deadline.controller.signal));
      const final = await graph.invoke(createInitialState(history, question, { maxRewrites, topK }), {
        recursionLimit: recursionLimitFor(maxRewrites),
        signal: deadline.controller.signal,
      });
      if (final.terminal) {
        return final.terminal;
      }
      fallbackReason = 'workflow ended without an answer';
    } catch (error) {
      if (runtime.isCancelled) {
        throw new RunCancelledError();
      }
      fallbackReason =
        error instanceof AppError ? `${error.code}: ${error.message}` : errorMessage(error);
    } finally {
      clearTimeout(timer);
      deadline.dispose();
    }

    logger.warn('Adaptive path failed, switching to fallback pipeline', {
      reason: fallbackReason,
      trace: runtime.recorder.trace,
    });

    runtime.recorder.usedFallback = true;
    runtime.recorder.fallbackReason = fallbackReason;
    runtime.emitFallback(fallbackReason);

    return runFallbackPipeline(runtime.withScope(cancelSignal), {
      conversation: history,
      query: question,
    });
  }

  private emitMetrics(metrics: RunMetrics): void {
    for (const sink of this.sinks) {
      try {
        sink(metrics);
      } catch (error) {
        logger.error('Metrics sink failed', { runId: metrics.runId, error: errorMessage(error) });
      }
    }
  }
}
