export type TurnRole = 'user' | 'assistant';

export interface ConversationTurn {
  role: TurnRole;
  text: string;
}

export type RelevanceVerdict = 'unset' | 'relevant' | 'irrelevant';

/** A chunk as handed back by a retrieval collaborator, before grading. */
export interface RetrievedChunk {
  text: string;
  sourceId: string;
  position: number;
}

export interface ContextChunk extends RetrievedChunk {
  verdict: RelevanceVerdict;
}

export type AnswerOrigin = 'direct' | 'generated' | 'fallback';

export interface TerminalAnswer {
  text: string;
  citations: string[];
  origin: AnswerOrigin;
}

export interface QueryResult {
  runId: string;
  answerText: string;
  citations: string[];
  usedFallback: boolean;
  rewriteCount: number;
  retrievalCycles: number;
  trace: StepName[];
  durationMs: number;
}

export type RunOutcome = 'answered' | 'failed' | 'cancelled';

export interface StepTiming {
  step: StepName;
  durationMs: number;
  ok: boolean;
}

/** Emitted once per run to every registered metrics sink. */
export interface RunMetrics {
  runId: string;
  outcome: RunOutcome;
  startedAt: number;
  durationMs: number;
  steps: StepTiming[];
  rewriteCount: number;
  retrievalCycles: number;
  retrievedChunkCount: number;
  relevantChunkCount: number;
  budgetExhausted: boolean;
  usedFallback: boolean;
  fallbackReason?: string;
  queryLength: number;
  answerLength: number;
  errorCode?: string;
}

export type MetricsSink = (metrics: RunMetrics) => void;

export type NodeName =
  | 'generate_query_or_respond'
  | 'retrieve_documents'
  | 'grade_documents'
  | 'rewrite_question'
  | 'generate_answer';

export type FallbackStepName = 'fallback_retrieve' | 'fallback_generate';

export type StepName = NodeName | FallbackStepName;

export type QueryRoute = 'retrieve' | 'respond_directly';
export type GradeRoute = 'generate_answer' | 'rewrite_question';

export interface RunCallbacks {
  onStep?: (step: StepName) => void;
  onFragment?: (text: string) => void;
  onFallback?: (reason: string) => void;
}

export interface RunOptions extends RunCallbacks {
  signal?: AbortSignal;
  /** Ask the generator for incremental fragments when it supports them. */
  stream?: boolean;
}

export type RunEvent =
  | { type: 'step'; step: StepName }
  | { type: 'fragment'; text: string }
  | { type: 'fallback'; reason: string }
  | { type: 'complete'; result: QueryResult }
  | { type: 'error'; error: { code: string; message: string } };
