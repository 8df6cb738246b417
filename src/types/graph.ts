import { ContextChunk, ConversationTurn, RetrievedChunk } from '.';

export interface CapabilityCallOptions {
  signal: AbortSignal;
}

export interface AnswerRequest {
  conversation: readonly ConversationTurn[];
  query: string;
  chunks: readonly ContextChunk[];
}

export interface Retriever {
  retrieve(query: string, k: number, options: CapabilityCallOptions): Promise<RetrievedChunk[]>;
}

export interface RelevanceGrader {
  gradeRelevance(query: string, chunkText: string, options: CapabilityCallOptions): Promise<boolean>;
  gradeRelevanceBatch?(
    query: string,
    chunkTexts: readonly string[],
    options: CapabilityCallOptions
  ): Promise<boolean[]>;
}

export interface QueryRewriter {
  rewrite(
    conversation: readonly ConversationTurn[],
    query: string,
    options: CapabilityCallOptions
  ): Promise<string>;
}

export interface AnswerGenerator {
  /** Raw routing signal: either a direct answer or a request to retrieve. */
  decide(
    conversation: readonly ConversationTurn[],
    query: string,
    options: CapabilityCallOptions
  ): Promise<string>;
  generate(request: AnswerRequest, options: CapabilityCallOptions): Promise<string>;
  streamGenerate?(request: AnswerRequest, options: CapabilityCallOptions): AsyncIterable<string>;
}

export interface CapabilitySet {
  retriever: Retriever;
  grader: RelevanceGrader;
  rewriter: QueryRewriter;
  generator: AnswerGenerator;
}

export type RoutingSignal = { action: 'retrieve' } | { action: 'respond'; answer: string };
