import { ConversationTurn, RetrievedChunk, RunMetrics } from '../../types';
import { AnswerRequest, CapabilityCallOptions, CapabilitySet } from '../../types/graph';
import { RunRecorder, RunRuntime, WorkflowSettings } from '../../graph/runtime';

export const RETRIEVE = '{"action": "retrieve"}';

export const respond = (answer: string): string => JSON.stringify({ action: 'respond', answer });

export const chunk = (sourceId: string, position: number, text: string): RetrievedChunk => ({
  sourceId,
  position,
  text,
});

export const TEST_SETTINGS: WorkflowSettings = {
  maxRewrites: 2,
  topK: 5,
  gradingMode: 'per-chunk',
  capabilityTimeout: 1000,
  totalTimeout: 5000,
};

/** Scripted behaviour for each capability; anything left out gets a harmless default. */
export interface StubBehaviour {
  decide?: (query: string, conversation: readonly ConversationTurn[]) => string | Promise<string>;
  retrieve?: (query: string, k: number) => RetrievedChunk[] | Promise<RetrievedChunk[]>;
  grade?: (query: string, text: string) => boolean | Promise<boolean>;
  gradeBatch?: (query: string, texts: readonly string[]) => boolean[] | Promise<boolean[]>;
  rewrite?: (query: string) => string | Promise<string>;
  generate?: (request: AnswerRequest) => string | Promise<string>;
  stream?: (request: AnswerRequest) => string[];
}

async function* emit(fragments: string[]): AsyncGenerator<string> {
  for (const fragment of fragments) {
    yield fragment;
  }
}

export function createStubCapabilities(behaviour: StubBehaviour = {}) {
  const decide = jest.fn(
    async (conversation: readonly ConversationTurn[], query: string, _options: CapabilityCallOptions) =>
      behaviour.decide ? behaviour.decide(query, conversation) : RETRIEVE
  );
  const retrieve = jest.fn(async (query: string, k: number, _options: CapabilityCallOptions) =>
    behaviour.retrieve ? behaviour.retrieve(query, k) : []
  );
  const gradeRelevance = jest.fn(
    async (query: string, text: string, _options: CapabilityCallOptions) =>
      behaviour.grade ? behaviour.grade(query, text) : false
  );
  const gradeRelevanceBatch = jest.fn(
    async (query: string, texts: readonly string[], _options: CapabilityCallOptions) =>
      behaviour.gradeBatch ? behaviour.gradeBatch(query, texts) : texts.map(() => false)
  );
  const rewrite = jest.fn(
    async (_conversation: readonly ConversationTurn[], query: string, _options: CapabilityCallOptions) =>
      behaviour.rewrite ? behaviour.rewrite(query) : `${query} (rephrased)`
  );
  const generate = jest.fn(async (request: AnswerRequest, _options: CapabilityCallOptions) =>
    behaviour.generate ? behaviour.generate(request) : 'stub answer'
  );
  const streamFragments = behaviour.stream;
  const streamGenerate = jest.fn((request: AnswerRequest, _options: CapabilityCallOptions) =>
    emit(streamFragments ? streamFragments(request) : [])
  );

  const capabilities: CapabilitySet = {
    retriever: { retrieve },
    grader: behaviour.gradeBatch ? { gradeRelevance, gradeRelevanceBatch } : { gradeRelevance },
    rewriter: { rewrite },
    generator: streamFragments ? { decide, generate, streamGenerate } : { decide, generate },
  };

  return {
    capabilities,
    mocks: { decide, retrieve, gradeRelevance, gradeRelevanceBatch, rewrite, generate, streamGenerate },
  };
}

export function createTestRuntime(
  capabilities: CapabilitySet,
  settings: Partial<WorkflowSettings> = {},
  options: { stream?: boolean; signal?: AbortSignal } = {}
): RunRuntime {
  return new RunRuntime({
    capabilities,
    settings: { ...TEST_SETTINGS, ...settings },
    recorder: new RunRecorder(),
    callbacks: {},
    stream: options.stream ?? false,
    cancelSignal: options.signal,
  });
}

export function metricsFixture(overrides: Partial<RunMetrics> = {}): RunMetrics {
  return {
    runId: 'run-1',
    outcome: 'answered',
    startedAt: 0,
    durationMs: 100,
    steps: [],
    rewriteCount: 0,
    retrievalCycles: 1,
    retrievedChunkCount: 3,
    relevantChunkCount: 1,
    budgetExhausted: false,
    usedFallback: false,
    queryLength: 20,
    answerLength: 50,
    ...overrides,
  };
}

/** A promise that never settles, for capabilities that hang. */
export const never = <T>(): Promise<T> => new Promise<T>(() => undefined);
