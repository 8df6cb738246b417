import { logger } from '../../core/logger';
import { MalformedCapabilityResponseError } from '../../core/errors';
import { ContextChunk } from '../../types';
import { RunRuntime } from '../runtime';
import { WorkflowState, WorkflowUpdate } from '../state';

export async function retrieveDocumentsNode(
  state: WorkflowState,
  runtime: RunRuntime
): Promise<WorkflowUpdate> {
  const cycle = state.retrievalCycles + 1;
  runtime.recorder.retrievalCycles = cycle;

  let chunks: ContextChunk[];
  try {
    const retrieved = await runtime.call('retriever', signal =>
      runtime.capabilities.retriever.retrieve(state.query, state.topK, { signal })
    );
    chunks = retrieved.slice(0, state.topK).map((chunk): ContextChunk => ({ ...chunk, verdict: 'unset' }));
  } catch (error) {
    // Unreachable or timed-out retrieval escalates; a garbled payload counts as "nothing found".
    if (!(error instanceof MalformedCapabilityResponseError)) throw error;
    logger.warn('Retriever returned a malformed payload, treating as empty', {
      error: error.message,
    });
    chunks = [];
  }

  runtime.recorder.retrievedChunkCount = chunks.length;

  logger.info('Documents retrieved', {
    cycle,
    count: chunks.length,
    sources: chunks.map(chunk => chunk.sourceId).slice(0, 5),
  });

  return {
    retrievedChunks: chunks,
    retrievalCycles: cycle,
    gradeRoute: null,
  };
}
