import { MalformedCapabilityResponseError, RunCancelledError } from '../core/errors';
import {
  GRADE_ROUTES,
  QUERY_ROUTES,
  describeWorkflow,
  recursionLimitFor,
  routeAfterGrading,
  routeAfterQueryDecision,
} from '../graph/graph';
import { gradeDocumentsNode } from '../graph/nodes/grade-documents';
import { retrieveDocumentsNode } from '../graph/nodes/retrieve-documents';
import { generateAnswerNode } from '../graph/nodes/generate-answer';
import { rewriteQuestionNode } from '../graph/nodes/rewrite-question';
import {
  WorkflowState,
  collectCitations,
  createInitialState,
  selectAnswerContext,
} from '../graph/state';
import { ContextChunk, RetrievedChunk } from '../types';
import { chunk, createStubCapabilities, createTestRuntime } from './helpers/stubs';

const A = chunk('docs/a.md', 0, 'alpha relevant text');
const B = chunk('docs/b.md', 1, 'beta filler');
const C = chunk('docs/a.md', 3, 'gamma relevant text');

function stateWith(overrides: Partial<WorkflowState>): WorkflowState {
  return { ...createInitialState([], 'question', { maxRewrites: 2, topK: 5 }), ...overrides };
}

const unset = (...chunks: RetrievedChunk[]): ContextChunk[] =>
  chunks.map((c): ContextChunk => ({ ...c, verdict: 'unset' }));

describe('workflow routing', () => {
  test('should only answer directly when a terminal answer is present', () => {
    expect(routeAfterQueryDecision(stateWith({ queryRoute: 'respond_directly' }))).toBe('retrieve');
    expect(
      routeAfterQueryDecision(
        stateWith({
          queryRoute: 'respond_directly',
          terminal: { text: 'Hi', citations: [], origin: 'direct' },
        })
      )
    ).toBe('respond_directly');
  });

  test('should force generation once the rewrite budget is spent', () => {
    expect(routeAfterGrading(stateWith({ gradeRoute: 'rewrite_question', rewriteCount: 1 }))).toBe(
      'rewrite_question'
    );
    expect(routeAfterGrading(stateWith({ gradeRoute: 'rewrite_question', rewriteCount: 2 }))).toBe(
      'generate_answer'
    );
    expect(routeAfterGrading(stateWith({ gradeRoute: null }))).toBe('generate_answer');
  });

  test('should map every route to a node', () => {
    expect(QUERY_ROUTES.retrieve).toBe('retrieve_documents');
    expect(GRADE_ROUTES).toEqual({
      generate_answer: 'generate_answer',
      rewrite_question: 'rewrite_question',
    });
  });

  test('should size the step limit to the rewrite budget', () => {
    expect(recursionLimitFor(0)).toBe(6);
    expect(recursionLimitFor(2)).toBe(12);
  });

  test('should describe the transition table', () => {
    const lines = describeWorkflow().split('\n');
    expect(lines[0]).toBe('flowchart TD');
    expect(lines).toContain('  generate_query_or_respond -- retrieve --> retrieve_documents');
    expect(lines).toContain('  generate_query_or_respond -- respond_directly --> terminal');
    expect(lines).toContain('  grade_documents -- rewrite_question --> rewrite_question');
    expect(lines).toContain('  fallback_retrieve --> fallback_generate');
  });
});

describe('answer context', () => {
  test('should prefer relevant chunks', () => {
    const graded: ContextChunk[] = [
      { ...A, verdict: 'relevant' },
      { ...B, verdict: 'irrelevant' },
    ];
    expect(selectAnswerContext(graded)).toEqual([{ ...A, verdict: 'relevant' }]);
  });

  test('should use every chunk when none is relevant', () => {
    const graded: ContextChunk[] = [
      { ...A, verdict: 'irrelevant' },
      { ...B, verdict: 'irrelevant' },
    ];
    expect(selectAnswerContext(graded)).toHaveLength(2);
  });

  test('should cite each source once in order of appearance', () => {
    expect(collectCitations(unset(A, B, C))).toEqual(['docs/a.md', 'docs/b.md']);
  });
});

describe('retrieveDocumentsNode', () => {
  test('should cap results at topK and count the cycle', async () => {
    const { capabilities } = createStubCapabilities({ retrieve: () => [A, B, C] });
    const runtime = createTestRuntime(capabilities, { topK: 2 });

    const update = await retrieveDocumentsNode(stateWith({ topK: 2, retrievalCycles: 1 }), runtime);

    expect(update.retrievedChunks).toEqual(unset(A, B));
    expect(update.retrievalCycles).toBe(2);
    expect(runtime.recorder.retrievalCycles).toBe(2);
  });

  test('should treat a malformed payload as no results', async () => {
    const { capabilities } = createStubCapabilities({
      retrieve: () => {
        throw new MalformedCapabilityResponseError('retriever');
      },
    });

    const update = await retrieveDocumentsNode(stateWith({}), createTestRuntime(capabilities));

    expect(update.retrievedChunks).toEqual([]);
  });

  test('should escalate an unreachable retriever', async () => {
    const { capabilities } = createStubCapabilities({
      retrieve: () => {
        throw new Error('connection refused');
      },
    });

    await expect(
      retrieveDocumentsNode(stateWith({}), createTestRuntime(capabilities))
    ).rejects.toMatchObject({ code: 'CAPABILITY_UNAVAILABLE' });
  });
});

describe('gradeDocumentsNode', () => {
  test('should route to generation when any chunk is relevant', async () => {
    const { capabilities } = createStubCapabilities({
      grade: (_query, text) => text.includes('relevant'),
    });

    const update = await gradeDocumentsNode(
      stateWith({ retrievedChunks: unset(A, B) }),
      createTestRuntime(capabilities)
    );

    expect(update.gradeRoute).toBe('generate_answer');
    expect(update.retrievedChunks?.map(c => c.verdict)).toEqual(['relevant', 'irrelevant']);
  });

  test('should ask for a rewrite when nothing is relevant and budget remains', async () => {
    const { capabilities } = createStubCapabilities({ grade: () => false });
    const runtime = createTestRuntime(capabilities);

    const update = await gradeDocumentsNode(stateWith({ retrievedChunks: unset(A) }), runtime);

    expect(update.gradeRoute).toBe('rewrite_question');
    expect(runtime.recorder.budgetExhausted).toBe(false);
  });

  test('should record budget exhaustion', async () => {
    const { capabilities } = createStubCapabilities({ grade: () => false });
    const runtime = createTestRuntime(capabilities);

    const update = await gradeDocumentsNode(
      stateWith({ retrievedChunks: unset(A), rewriteCount: 2, maxRewrites: 2 }),
      runtime
    );

    expect(update.gradeRoute).toBe('generate_answer');
    expect(runtime.recorder.budgetExhausted).toBe(true);
  });

  test('should route an empty retrieval to a rewrite without grading', async () => {
    const { capabilities, mocks } = createStubCapabilities();

    const update = await gradeDocumentsNode(stateWith({}), createTestRuntime(capabilities));

    expect(update.gradeRoute).toBe('rewrite_question');
    expect(mocks.gradeRelevance).not.toHaveBeenCalled();
  });

  test('should grade a whole batch in one call', async () => {
    const { capabilities, mocks } = createStubCapabilities({
      gradeBatch: (_query, texts) => texts.map(text => text.startsWith('gamma')),
    });

    const update = await gradeDocumentsNode(
      stateWith({ retrievedChunks: unset(A, B, C) }),
      createTestRuntime(capabilities, { gradingMode: 'batch' })
    );

    expect(mocks.gradeRelevanceBatch).toHaveBeenCalledTimes(1);
    expect(mocks.gradeRelevance).not.toHaveBeenCalled();
    expect(update.retrievedChunks?.map(c => c.verdict)).toEqual(['irrelevant', 'irrelevant', 'relevant']);
  });

  test('should count every chunk irrelevant when the batch has the wrong length', async () => {
    const { capabilities } = createStubCapabilities({ gradeBatch: () => [true] });

    const update = await gradeDocumentsNode(
      stateWith({ retrievedChunks: unset(A, B) }),
      createTestRuntime(capabilities, { gradingMode: 'batch' })
    );

    expect(update.retrievedChunks?.map(c => c.verdict)).toEqual(['irrelevant', 'irrelevant']);
    expect(update.gradeRoute).toBe('rewrite_question');
  });

  test('should grade chunk by chunk when the grader has no batch mode', async () => {
    const { capabilities, mocks } = createStubCapabilities({ grade: () => true });

    await gradeDocumentsNode(
      stateWith({ retrievedChunks: unset(A, B) }),
      createTestRuntime(capabilities, { gradingMode: 'batch' })
    );

    expect(mocks.gradeRelevance).toHaveBeenCalledTimes(2);
  });
});

describe('rewriteQuestionNode', () => {
  test('should replace the query and count the rewrite', async () => {
    const { capabilities } = createStubCapabilities({ rewrite: () => '  refund window in days  ' });

    const update = await rewriteQuestionNode(
      stateWith({ query: 'how long for money back', rewriteCount: 1 }),
      createTestRuntime(capabilities)
    );

    expect(update).toEqual({ query: 'refund window in days', rewriteCount: 2 });
  });

  test('should keep the query when the rewrite is blank', async () => {
    const { capabilities } = createStubCapabilities({ rewrite: () => '   ' });

    const update = await rewriteQuestionNode(stateWith({ query: 'original' }), createTestRuntime(capabilities));

    expect(update).toEqual({ query: 'original', rewriteCount: 1 });
  });

  test('should propagate cancellation', async () => {
    const controller = new AbortController();
    const { capabilities } = createStubCapabilities({
      rewrite: () => {
        controller.abort();
        return 'never used';
      },
    });

    await expect(
      rewriteQuestionNode(stateWith({}), createTestRuntime(capabilities, {}, { signal: controller.signal }))
    ).rejects.toBeInstanceOf(RunCancelledError);
  });
});

describe('generateAnswerNode', () => {
  test('should reject a blank answer', async () => {
    const { capabilities } = createStubCapabilities({ generate: () => '' });

    await expect(
      generateAnswerNode(stateWith({ retrievedChunks: unset(A) }), createTestRuntime(capabilities))
    ).rejects.toBeInstanceOf(MalformedCapabilityResponseError);
  });

  test('should join streamed fragments into the answer', async () => {
    const { capabilities } = createStubCapabilities({ stream: () => ['Al', 'pha'] });

    const update = await generateAnswerNode(
      stateWith({ retrievedChunks: [{ ...A, verdict: 'relevant' }] }),
      createTestRuntime(capabilities, {}, { stream: true })
    );

    expect(update.terminal).toEqual({ text: 'Alpha', citations: ['docs/a.md'], origin: 'generated' });
  });
});
