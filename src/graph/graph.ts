// src/graph/graph.ts
import { END, START, StateGraph } from '@langchain/langgraph';
import { GradeRoute, NodeName, QueryRoute } from '../types';
import { generateAnswerNode } from './nodes/generate-answer';
import { generateQueryOrRespondNode } from './nodes/generate-query-or-respond';
import { gradeDocumentsNode } from './nodes/grade-documents';
import { retrieveDocumentsNode } from './nodes/retrieve-documents';
import { rewriteQuestionNode } from './nodes/rewrite-question';
import { RunRuntime } from './runtime';
import { WorkflowState, WorkflowStateAnnotation, WorkflowUpdate } from './state';

type WorkflowNode = (state: WorkflowState, runtime: RunRuntime) => Promise<WorkflowUpdate>;

export const QUERY_ROUTES = {
  retrieve: 'retrieve_documents',
  respond_directly: END,
} as const satisfies Record<QueryRoute, NodeName | typeof END>;

export const GRADE_ROUTES = {
  generate_answer: 'generate_answer',
  rewrite_question: 'rewrite_question',
} as const satisfies Record<GradeRoute, NodeName>;

export function routeAfterQueryDecision(state: WorkflowState): QueryRoute {
  return state.queryRoute === 'respond_directly' && state.terminal ? 'respond_directly' : 'retrieve';
}

export function routeAfterGrading(state: WorkflowState): GradeRoute {
  if (state.gradeRoute === 'rewrite_question' && state.rewriteCount < state.maxRewrites) {
    return 'rewrite_question';
  }
  return 'generate_answer';
}

/** Upper bound on graph steps for a given rewrite budget, with one step of slack. */
export function recursionLimitFor(maxRewrites: number): number {
  return 3 * maxRewrites + 6;
}

export function createWorkflowGraph(runtime: RunRuntime) {
  const step =
    (name: NodeName, fn: WorkflowNode) =>
    (state: WorkflowState): Promise<WorkflowUpdate> =>
      runtime.step(name, () => fn(state, runtime));

  const workflow = new StateGraph(WorkflowStateAnnotation)
    .addNode('generate_query_or_respond', step('generate_query_or_respond', generateQueryOrRespondNode))
    .addNode('retrieve_documents', step('retrieve_documents', retrieveDocumentsNode))
    .addNode('grade_documents', step('grade_documents', gradeDocumentsNode))
    .addNode('rewrite_question', step('rewrite_question', rewriteQuestionNode))
    .addNode('generate_answer', step('generate_answer', generateAnswerNode));

  workflow.addEdge(START, 'generate_query_or_respond');
  workflow.addConditionalEdges('generate_query_or_respond', routeAfterQueryDecision, QUERY_ROUTES);
  workflow.addEdge('retrieve_documents', 'grade_documents');
  workflow.addConditionalEdges('grade_documents', routeAfterGrading, GRADE_ROUTES);
  workflow.addEdge('rewrite_question', 'retrieve_documents');
  workflow.addEdge('generate_answer', END);

  return workflow.compile();
}

/** Mermaid rendering of the transition table, fallback edges included. */
export function describeWorkflow(): string {
  const label = (target: string) => (target === END ? 'terminal' : target);
  const lines = [
    'flowchart TD',
    `  start([query]) --> generate_query_or_respond`,
    ...Object.entries(QUERY_ROUTES).map(
      ([route, target]) => `  generate_query_or_respond -- ${route} --> ${label(target)}`
    ),
    '  retrieve_documents --> grade_documents',
    ...Object.entries(GRADE_ROUTES).map(
      ([route, target]) => `  grade_documents -- ${route} --> ${target}`
    ),
    '  rewrite_question --> retrieve_documents',
    '  generate_answer --> terminal',
    '  adaptive[[any node]] -- capability error --> fallback_retrieve',
    '  fallback_retrieve --> fallback_generate',
    '  fallback_generate --> terminal',
  ];
  return lines.join('\n');
}
