import { Annotation } from '@langchain/langgraph';
import {
  ContextChunk,
  ConversationTurn,
  GradeRoute,
  QueryRoute,
  TerminalAnswer,
} from '../types';

export const WorkflowStateAnnotation = Annotation.Root({
  // Input
  conversation: Annotation<ConversationTurn[]>,
  originalQuery: Annotation<string>,
  query: Annotation<string>,

  // Data; replaced wholesale on every retrieval
  retrievedChunks: Annotation<ContextChunk[]>,

  // Flow control
  queryRoute: Annotation<QueryRoute | null>,
  gradeRoute: Annotation<GradeRoute | null>,
  rewriteCount: Annotation<number>,
  maxRewrites: Annotation<number>,
  retrievalCycles: Annotation<number>,
  topK: Annotation<number>,
  usedFallback: Annotation<boolean>,

  // Response
  terminal: Annotation<TerminalAnswer | null>,
});

export type WorkflowState = typeof WorkflowStateAnnotation.State;
export type WorkflowUpdate = typeof WorkflowStateAnnotation.Update;

export interface WorkflowLimits {
  maxRewrites: number;
  topK: number;
}

export function createInitialState(
  conversation: ConversationTurn[],
  query: string,
  limits: WorkflowLimits
): WorkflowState {
  return {
    conversation,
    originalQuery: query,
    query,
    retrievedChunks: [],
    queryRoute: null,
    gradeRoute: null,
    rewriteCount: 0,
    maxRewrites: limits.maxRewrites,
    retrievalCycles: 0,
    topK: limits.topK,
    usedFallback: false,
    terminal: null,
  };
}

/** Chunks the answer is built from: the relevant subset, or everything retrieved when none passed. */
export function selectAnswerContext(chunks: readonly ContextChunk[]): ContextChunk[] {
  const relevant = chunks.filter(chunk => chunk.verdict === 'relevant');
  return relevant.length > 0 ? relevant : [...chunks];
}

export function collectCitations(chunks: readonly ContextChunk[]): string[] {
  const seen = new Set<string>();
  const citations: string[] = [];
  for (const chunk of chunks) {
    if (!seen.has(chunk.sourceId)) {
      seen.add(chunk.sourceId);
      citations.push(chunk.sourceId);
    }
  }
  return citations;
}
