import { config } from '../core/config';
import { MalformedCapabilityResponseError } from '../core/errors';
import { logger } from '../core/logger';
import {
  buildAnswerMessages,
  buildBatchGraderMessages,
  buildGraderMessages,
  buildRewriteMessages,
  buildRouterMessages,
} from '../prompts/templates';
import { ConversationTurn } from '../types';
import {
  AnswerGenerator,
  AnswerRequest,
  CapabilityCallOptions,
  QueryRewriter,
  RelevanceGrader,
} from '../types/graph';
import { ChatClient } from './llm.service';
import { parseBinaryScore, parseBinaryScores } from './response-parser';

export interface ModelSelection {
  router: string;
  grader: string;
  rewriter: string;
  responder: string;
}

const DEFAULT_MODELS: ModelSelection = config.models;

/**
 * Routing and answer generation over a chat model. `decide` returns the raw
 * routing JSON; the workflow node owns its interpretation.
 */
export class LLMAnswerGenerator implements AnswerGenerator {
  constructor(
    private readonly client: ChatClient,
    private readonly models: ModelSelection = DEFAULT_MODELS
  ) {}

  async decide(
    conversation: readonly ConversationTurn[],
    query: string,
    options: CapabilityCallOptions
  ): Promise<string> {
    const response = await this.client.chat(buildRouterMessages(conversation, query), {
      model: this.models.router,
      temperature: 0,
      maxTokens: 800,
      signal: options.signal,
      capability: 'router',
    });
    return response.content;
  }

  async generate(request: AnswerRequest, options: CapabilityCallOptions): Promise<string> {
    const response = await this.client.chat(
      buildAnswerMessages(request.conversation, request.query, request.chunks),
      {
        model: this.models.responder,
        signal: options.signal,
        capability: 'generator',
      }
    );
    return response.content;
  }

  streamGenerate(request: AnswerRequest, options: CapabilityCallOptions): AsyncIterable<string> {
    return this.client.chatStream(
      buildAnswerMessages(request.conversation, request.query, request.chunks),
      {
        model: this.models.responder,
        signal: options.signal,
        capability: 'generator',
      }
    );
  }
}

export class LLMRelevanceGrader implements RelevanceGrader {
  constructor(
    private readonly client: ChatClient,
    private readonly model: string = DEFAULT_MODELS.grader
  ) {}

  async gradeRelevance(
    query: string,
    chunkText: string,
    options: CapabilityCallOptions
  ): Promise<boolean> {
    const response = await this.client.chat(buildGraderMessages(query, chunkText), {
      model: this.model,
      temperature: 0,
      maxTokens: 20,
      signal: options.signal,
      capability: 'grader',
    });

    const verdict = parseBinaryScore(response.content);
    if (verdict === null) {
      throw new MalformedCapabilityResponseError('grader', 'Grader did not return a yes/no score', {
        preview: response.content.substring(0, 80),
      });
    }
    return verdict;
  }

  async gradeRelevanceBatch(
    query: string,
    chunkTexts: readonly string[],
    options: CapabilityCallOptions
  ): Promise<boolean[]> {
    const response = await this.client.chat(buildBatchGraderMessages(query, chunkTexts), {
      model: this.model,
      temperature: 0,
      maxTokens: 40 * chunkTexts.length + 20,
      signal: options.signal,
      capability: 'grader',
    });

    const verdicts = parseBinaryScores(response.content, chunkTexts.length);
    if (!verdicts) {
      throw new MalformedCapabilityResponseError('grader', 'Batch grader returned an unusable list', {
        expected: chunkTexts.length,
        preview: response.content.substring(0, 120),
      });
    }
    logger.debug('Batch grading parsed', {
      total: verdicts.length,
      relevant: verdicts.filter(Boolean).length,
    });
    return verdicts;
  }
}

export class LLMQueryRewriter implements QueryRewriter {
  constructor(
    private readonly client: ChatClient,
    private readonly model: string = DEFAULT_MODELS.rewriter
  ) {}

  async rewrite(
    conversation: readonly ConversationTurn[],
    query: string,
    options: CapabilityCallOptions
  ): Promise<string> {
    const response = await this.client.chat(buildRewriteMessages(conversation, query), {
      model: this.model,
      temperature: 0,
      maxTokens: 200,
      signal: options.signal,
      capability: 'rewriter',
    });
    // Models sometimes wrap the question in quotes or a label
    return response.content
      .trim()
      .replace(/^(improved question:\s*)/i, '')
      .replace(/^["'](.*)["']$/s, '$1')
      .trim();
  }
}
