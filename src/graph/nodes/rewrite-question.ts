import { logger } from '../../core/logger';
import { RunCancelledError, errorMessage } from '../../core/errors';
import { maskSensitiveData } from '../../utils/security';
import { RunRuntime } from '../runtime';
import { WorkflowState, WorkflowUpdate } from '../state';

export async function rewriteQuestionNode(
  state: WorkflowState,
  runtime: RunRuntime
): Promise<WorkflowUpdate> {
  const rewriteCount = state.rewriteCount + 1;
  runtime.recorder.rewriteCount = rewriteCount;

  let rewritten = '';
  try {
    rewritten = (
      await runtime.call('rewriter', signal =>
        runtime.capabilities.rewriter.rewrite(state.conversation, state.query, { signal })
      )
    ).trim();
  } catch (error) {
    if (error instanceof RunCancelledError) throw error;
    logger.warn('Rewrite failed, retrying with the unmodified query', {
      error: errorMessage(error),
    });
  }

  const query = rewritten || state.query;

  logger.info('Question rewritten', {
    rewriteCount,
    maxRewrites: state.maxRewrites,
    changed: query !== state.query,
    query: maskSensitiveData(query.substring(0, 100)),
  });

  return { query, rewriteCount };
}
