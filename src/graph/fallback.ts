import { logger } from '../core/logger';
import { FallbackFailureError, RunCancelledError, errorMessage } from '../core/errors';
import { ContextChunk, ConversationTurn, TerminalAnswer } from '../types';
import { produceAnswer } from './nodes/generate-answer';
import { RunRuntime } from './runtime';
import { collectCitations } from './state';

export interface FallbackInput {
  conversation: readonly ConversationTurn[];
  query: string;
}

/**
 * Single pass: retrieve once, generate once. No grading, no rewriting and no
 * further fallback; a generation failure here ends the run.
 */
export async function runFallbackPipeline(
  runtime: RunRuntime,
  input: FallbackInput
): Promise<TerminalAnswer> {
  const { topK } = runtime.settings;

  const chunks = await runtime.step('fallback_retrieve', async (): Promise<ContextChunk[]> => {
    try {
      const retrieved = await runtime.call('retriever', signal =>
        runtime.capabilities.retriever.retrieve(input.query, topK, { signal })
      );
      return retrieved.slice(0, topK).map((chunk): ContextChunk => ({ ...chunk, verdict: 'unset' }));
    } catch (error) {
      if (error instanceof RunCancelledError) throw error;
      logger.warn('Fallback retrieval failed, generating without context', {
        error: errorMessage(error),
      });
      return [];
    }
  });

  runtime.recorder.retrievedChunkCount = chunks.length;

  const text = await runtime.step('fallback_generate', async () => {
    try {
      return await produceAnswer(runtime, {
        conversation: input.conversation,
        query: input.query,
        chunks,
      });
    } catch (error) {
      if (error instanceof RunCancelledError) throw error;
      throw new FallbackFailureError(errorMessage(error), { contextChunks: chunks.length });
    }
  });

  if (!text.trim()) {
    throw new FallbackFailureError('the generator returned an empty answer');
  }

  logger.info('Fallback answer produced', {
    contextChunks: chunks.length,
    answerLength: text.length,
  });

  return { text, citations: collectCitations(chunks), origin: 'fallback' };
}
