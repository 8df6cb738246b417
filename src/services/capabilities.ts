import { config } from '../core/config';
import { logger } from '../core/logger';
import { CapabilitySet, Retriever } from '../types/graph';
import { LLMAnswerGenerator, LLMQueryRewriter, LLMRelevanceGrader } from './llm-capabilities';
import { ChatClient, createLLMService } from './llm.service';
import { HttpRetriever, InMemoryRetriever, loadKnowledgeBase } from './retrieval.service';

export function createRetriever(): Retriever {
  if (config.retrieval.serviceUrl) {
    logger.info('Using retrieval service', { url: config.retrieval.serviceUrl });
    return new HttpRetriever(config.retrieval.serviceUrl, config.workflow.capabilityTimeout);
  }
  return new InMemoryRetriever(loadKnowledgeBase(config.retrieval.knowledgeBasePath));
}

/** Wires the configured chat model and retrieval backend into one capability set. */
export function createDefaultCapabilities(
  client: ChatClient = createLLMService(),
  retriever: Retriever = createRetriever()
): CapabilitySet {
  return {
    retriever,
    grader: new LLMRelevanceGrader(client, config.models.grader),
    rewriter: new LLMQueryRewriter(client, config.models.rewriter),
    generator: new LLMAnswerGenerator(client, config.models),
  };
}
