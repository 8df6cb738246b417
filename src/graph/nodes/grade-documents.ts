import { logger } from '../../core/logger';
import { RunCancelledError, errorMessage } from '../../core/errors';
import { ContextChunk, GradeRoute } from '../../types';
import { RunRuntime } from '../runtime';
import { WorkflowState, WorkflowUpdate } from '../state';

async function gradeOneByOne(
  state: WorkflowState,
  runtime: RunRuntime
): Promise<Array<boolean | null>> {
  const verdicts: Array<boolean | null> = [];
  for (const chunk of state.retrievedChunks) {
    try {
      verdicts.push(
        await runtime.call('grader', signal =>
          runtime.capabilities.grader.gradeRelevance(state.query, chunk.text, { signal })
        )
      );
    } catch (error) {
      if (error instanceof RunCancelledError) throw error;
      logger.warn('Grading call failed, chunk counts as irrelevant', {
        sourceId: chunk.sourceId,
        position: chunk.position,
        error: errorMessage(error),
      });
      verdicts.push(null);
    }
  }
  return verdicts;
}

async function gradeInBatch(
  state: WorkflowState,
  runtime: RunRuntime
): Promise<Array<boolean | null>> {
  const { grader } = runtime.capabilities;
  if (!grader.gradeRelevanceBatch) {
    return gradeOneByOne(state, runtime);
  }
  const batch = grader.gradeRelevanceBatch.bind(grader);
  const texts = state.retrievedChunks.map(chunk => chunk.text);

  try {
    const verdicts = await runtime.call('grader', signal => batch(state.query, texts, { signal }));
    if (verdicts.length !== texts.length) {
      logger.warn('Batch grading returned the wrong number of verdicts', {
        expected: texts.length,
        received: verdicts.length,
      });
      return texts.map(() => null);
    }
    return verdicts;
  } catch (error) {
    if (error instanceof RunCancelledError) throw error;
    logger.warn('Batch grading failed, all chunks count as irrelevant', {
      error: errorMessage(error),
    });
    return texts.map(() => null);
  }
}

/**
 * Binary relevance per chunk, then the routing decision. The rewrite budget
 * bounds the loop: once it is spent the answer is generated regardless.
 */
export async function gradeDocumentsNode(
  state: WorkflowState,
  runtime: RunRuntime
): Promise<WorkflowUpdate> {
  const verdicts =
    state.retrievedChunks.length === 0
      ? []
      : runtime.settings.gradingMode === 'batch'
        ? await gradeInBatch(state, runtime)
        : await gradeOneByOne(state, runtime);

  const graded: ContextChunk[] = state.retrievedChunks.map((chunk, index): ContextChunk => ({
    ...chunk,
    verdict: verdicts[index] === true ? 'relevant' : 'irrelevant',
  }));
  const relevantCount = graded.filter(chunk => chunk.verdict === 'relevant').length;
  const budgetExhausted = state.rewriteCount >= state.maxRewrites;

  let gradeRoute: GradeRoute;
  if (relevantCount > 0) {
    gradeRoute = 'generate_answer';
  } else if (budgetExhausted) {
    gradeRoute = 'generate_answer';
    runtime.recorder.budgetExhausted = true;
    logger.warn('Rewrite budget exhausted, answering with best-effort context', {
      rewriteCount: state.rewriteCount,
      maxRewrites: state.maxRewrites,
      chunks: graded.length,
    });
  } else {
    gradeRoute = 'rewrite_question';
  }

  runtime.recorder.relevantChunkCount = relevantCount;

  logger.info('Documents graded', {
    total: graded.length,
    relevant: relevantCount,
    route: gradeRoute,
  });

  return { retrievedChunks: graded, gradeRoute };
}
