import { logger } from '../../core/logger';
import { MalformedCapabilityResponseError } from '../../core/errors';
import { AnswerRequest } from '../../types/graph';
import { RunRuntime } from '../runtime';
import { WorkflowState, WorkflowUpdate, collectCitations, selectAnswerContext } from '../state';

/**
 * Runs the generation capability, forwarding fragments as they arrive when
 * the run streams, and returns the full text.
 */
export async function produceAnswer(runtime: RunRuntime, request: AnswerRequest): Promise<string> {
  const { generator } = runtime.capabilities;

  if (runtime.streaming && generator.streamGenerate) {
    const streamGenerate = generator.streamGenerate.bind(generator);
    let text = '';
    for await (const fragment of runtime.stream('generator', signal =>
      streamGenerate(request, { signal })
    )) {
      text += fragment;
      runtime.emitFragment(fragment);
    }
    return text;
  }

  const text = await runtime.call('generator', signal => generator.generate(request, { signal }));
  runtime.emitFragment(text);
  return text;
}

/** Terminal node. Generation errors propagate: the orchestrator owns the fallback. */
export async function generateAnswerNode(
  state: WorkflowState,
  runtime: RunRuntime
): Promise<WorkflowUpdate> {
  const context = selectAnswerContext(state.retrievedChunks);

  logger.info('Generate-answer node executing', {
    contextChunks: context.length,
    relevant: context.filter(chunk => chunk.verdict === 'relevant').length,
    streaming: runtime.streaming,
  });

  const text = await produceAnswer(runtime, {
    conversation: state.conversation,
    query: state.query,
    chunks: context,
  });

  if (!text.trim()) {
    throw new MalformedCapabilityResponseError('generator', 'Generator returned an empty answer');
  }

  return {
    terminal: { text, citations: collectCitations(context), origin: 'generated' },
  };
}
