import { logger } from '../core/logger';
import { RunMetrics, RunOutcome, StepName } from '../types';

export interface StepStats {
  calls: number;
  failures: number;
  avgDurationMs: number;
}

export interface ConversationStats {
  totalMessages: number;
  userQuestions: number;
  assistantResponses: number;
  avgQuestionLength: number;
  avgResponseLength: number;
  longestQuestion: number;
  longestResponse: number;
}

export interface AnalyticsSnapshot {
  runs: Record<RunOutcome, number> & { total: number };
  fallbackCount: number;
  budgetExhaustedCount: number;
  avgDurationMs: number;
  avgRewrites: number;
  avgRetrievalCycles: number;
  steps: Partial<Record<StepName, StepStats>>;
  conversation: ConversationStats;
  recent: RunMetrics[];
}

interface LengthTotals {
  count: number;
  sum: number;
  max: number;
}

const emptyLengths = (): LengthTotals => ({ count: 0, sum: 0, max: 0 });

interface StepTotals {
  calls: number;
  failures: number;
  totalMs: number;
}

const round = (value: number): number => Math.round(value * 100) / 100;

/**
 * Aggregates per-run metrics for the dashboard endpoint. Register
 * `service.record` as a metrics sink on the orchestrator.
 */
export class AnalyticsService {
  private outcomes: Record<RunOutcome, number> = { answered: 0, failed: 0, cancelled: 0 };
  private fallbackCount = 0;
  private budgetExhaustedCount = 0;
  private totalDurationMs = 0;
  private totalRewrites = 0;
  private totalRetrievalCycles = 0;
  private steps = new Map<StepName, StepTotals>();
  private questionLengths = emptyLengths();
  private responseLengths = emptyLengths();
  private recent: RunMetrics[] = [];

  constructor(private readonly recentLimit: number = 20) {}

  readonly record = (metrics: RunMetrics): void => {
    this.outcomes[metrics.outcome]++;
    this.totalDurationMs += metrics.durationMs;
    this.totalRewrites += metrics.rewriteCount;
    this.totalRetrievalCycles += metrics.retrievalCycles;
    if (metrics.usedFallback) this.fallbackCount++;
    if (metrics.budgetExhausted) this.budgetExhaustedCount++;

    for (const timing of metrics.steps) {
      const totals = this.steps.get(timing.step) ?? { calls: 0, failures: 0, totalMs: 0 };
      totals.calls++;
      totals.totalMs += timing.durationMs;
      if (!timing.ok) totals.failures++;
      this.steps.set(timing.step, totals);
    }

    // Only answered runs land in the conversation
    if (metrics.outcome === 'answered') {
      this.addLength(this.questionLengths, metrics.queryLength);
      this.addLength(this.responseLengths, metrics.answerLength);
    }

    this.recent.push(metrics);
    if (this.recent.length > this.recentLimit) {
      this.recent.shift();
    }

    logger.debug('Run metrics recorded', { runId: metrics.runId, outcome: metrics.outcome });
  };

  snapshot(): AnalyticsSnapshot {
    const total = this.outcomes.answered + this.outcomes.failed + this.outcomes.cancelled;
    const average = (sum: number) => (total > 0 ? round(sum / total) : 0);

    const steps: Partial<Record<StepName, StepStats>> = {};
    this.steps.forEach((totals, step) => {
      steps[step] = {
        calls: totals.calls,
        failures: totals.failures,
        avgDurationMs: round(totals.totalMs / totals.calls),
      };
    });

    return {
      runs: { ...this.outcomes, total },
      fallbackCount: this.fallbackCount,
      budgetExhaustedCount: this.budgetExhaustedCount,
      avgDurationMs: average(this.totalDurationMs),
      avgRewrites: average(this.totalRewrites),
      avgRetrievalCycles: average(this.totalRetrievalCycles),
      steps,
      conversation: this.conversationStats(),
      recent: [...this.recent],
    };
  }

  reset(): void {
    this.outcomes = { answered: 0, failed: 0, cancelled: 0 };
    this.fallbackCount = 0;
    this.budgetExhaustedCount = 0;
    this.totalDurationMs = 0;
    this.totalRewrites = 0;
    this.totalRetrievalCycles = 0;
    this.steps.clear();
    this.questionLengths = emptyLengths();
    this.responseLengths = emptyLengths();
    this.recent = [];
  }

  private addLength(totals: LengthTotals, length: number): void {
    totals.count++;
    totals.sum += length;
    totals.max = Math.max(totals.max, length);
  }

  private conversationStats(): ConversationStats {
    const avg = (totals: LengthTotals) => (totals.count > 0 ? round(totals.sum / totals.count) : 0);
    const questions = this.questionLengths;
    const responses = this.responseLengths;

    return {
      totalMessages: questions.count + responses.count,
      userQuestions: questions.count,
      assistantResponses: responses.count,
      avgQuestionLength: avg(questions),
      avgResponseLength: avg(responses),
      longestQuestion: questions.max,
      longestResponse: responses.max,
    };
  }
}
