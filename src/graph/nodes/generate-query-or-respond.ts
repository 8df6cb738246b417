import { logger } from '../../core/logger';
import { RunCancelledError, errorMessage } from '../../core/errors';
import { parseRoutingSignal } from '../../services/response-parser';
import { maskSensitiveData } from '../../utils/security';
import { RunRuntime } from '../runtime';
import { WorkflowState, WorkflowUpdate } from '../state';

/**
 * Decides whether the question needs the knowledge base. Any doubt (failed
 * call, unparseable signal) resolves to retrieval.
 */
export async function generateQueryOrRespondNode(
  state: WorkflowState,
  runtime: RunRuntime
): Promise<WorkflowUpdate> {
  logger.info('Generate-query-or-respond node executing', {
    query: maskSensitiveData(state.query.substring(0, 100)),
    turns: state.conversation.length,
  });

  let raw: string;
  try {
    raw = await runtime.call('router', signal =>
      runtime.capabilities.generator.decide(state.conversation, state.query, { signal })
    );
  } catch (error) {
    if (error instanceof RunCancelledError) throw error;
    logger.warn('Routing call failed, defaulting to retrieval', { error: errorMessage(error) });
    return { queryRoute: 'retrieve' };
  }

  const routing = parseRoutingSignal(raw);
  if (!routing) {
    logger.warn('Unparseable routing signal, defaulting to retrieval', {
      preview: raw.substring(0, 120),
    });
    return { queryRoute: 'retrieve' };
  }

  if (routing.action === 'retrieve') {
    logger.debug('Router requested retrieval');
    return { queryRoute: 'retrieve' };
  }

  logger.info('Router answered directly', { answerLength: routing.answer.length });
  runtime.emitFragment(routing.answer);

  return {
    queryRoute: 'respond_directly',
    terminal: { text: routing.answer, citations: [], origin: 'direct' },
  };
}
