import { AnalyticsService } from '../services/analytics.service';
import { metricsFixture } from './helpers/stubs';

describe('AnalyticsService', () => {
  const runs = [
    metricsFixture({
      runId: 'run-1',
      durationMs: 100,
      steps: [
        { step: 'generate_query_or_respond', durationMs: 10, ok: true },
        { step: 'retrieve_documents', durationMs: 30, ok: true },
      ],
      queryLength: 20,
      answerLength: 50,
    }),
    metricsFixture({
      runId: 'run-2',
      outcome: 'failed',
      durationMs: 300,
      rewriteCount: 2,
      retrievalCycles: 3,
      usedFallback: true,
      budgetExhausted: true,
      steps: [
        { step: 'generate_query_or_respond', durationMs: 20, ok: true },
        { step: 'retrieve_documents', durationMs: 50, ok: false },
      ],
      queryLength: 40,
      answerLength: 0,
    }),
    metricsFixture({
      runId: 'run-3',
      durationMs: 200,
      rewriteCount: 1,
      retrievalCycles: 2,
      queryLength: 10,
      answerLength: 150,
    }),
  ];

  test('should report zeros before any run', () => {
    const snapshot = new AnalyticsService().snapshot();

    expect(snapshot.runs).toEqual({ answered: 0, failed: 0, cancelled: 0, total: 0 });
    expect(snapshot.avgDurationMs).toBe(0);
    expect(snapshot.conversation.totalMessages).toBe(0);
  });

  test('should aggregate run outcomes and averages', () => {
    const analytics = new AnalyticsService();
    runs.forEach(analytics.record);

    const snapshot = analytics.snapshot();

    expect(snapshot.runs).toEqual({ answered: 2, failed: 1, cancelled: 0, total: 3 });
    expect(snapshot.fallbackCount).toBe(1);
    expect(snapshot.budgetExhaustedCount).toBe(1);
    expect(snapshot.avgDurationMs).toBe(200);
    expect(snapshot.avgRewrites).toBe(1);
    expect(snapshot.avgRetrievalCycles).toBe(2);
  });

  test('should average step latency per step', () => {
    const analytics = new AnalyticsService();
    runs.forEach(analytics.record);

    expect(analytics.snapshot().steps).toEqual({
      generate_query_or_respond: { calls: 2, failures: 0, avgDurationMs: 15 },
      retrieve_documents: { calls: 2, failures: 1, avgDurationMs: 40 },
    });
  });

  test('should count only answered runs in the conversation stats', () => {
    const analytics = new AnalyticsService();
    runs.forEach(analytics.record);

    expect(analytics.snapshot().conversation).toEqual({
      totalMessages: 4,
      userQuestions: 2,
      assistantResponses: 2,
      avgQuestionLength: 15,
      avgResponseLength: 100,
      longestQuestion: 20,
      longestResponse: 150,
    });
  });

  test('should keep only the most recent runs', () => {
    const analytics = new AnalyticsService(2);
    runs.forEach(analytics.record);

    expect(analytics.snapshot().recent.map(run => run.runId)).toEqual(['run-2', 'run-3']);
  });

  test('should start over after a reset', () => {
    const analytics = new AnalyticsService();
    runs.forEach(analytics.record);
    analytics.reset();

    expect(analytics.snapshot().runs.total).toBe(0);
    expect(analytics.snapshot().steps).toEqual({});
    expect(analytics.snapshot().conversation.longestResponse).toBe(0);
  });

  test('should keep conversation totals across many runs', () => {
    const analytics = new AnalyticsService();
    for (let i = 1; i <= 1000; i++) {
      analytics.record(metricsFixture({ runId: `run-${i}`, queryLength: i, answerLength: 2 * i }));
    }

    expect(analytics.snapshot().conversation).toEqual({
      totalMessages: 2000,
      userQuestions: 1000,
      assistantResponses: 1000,
      avgQuestionLength: 500.5,
      avgResponseLength: 1001,
      longestQuestion: 1000,
      longestResponse: 2000,
    });
  });
});
