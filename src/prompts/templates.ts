import { ContextChunk, ConversationTurn } from '../types';
import { LLMMessage } from '../services/llm.service';

const HISTORY_TURNS = 10;
const HISTORY_TURN_CHARS = 600;

export const SYSTEM_PROMPTS = {
  ROUTER: `You are the front desk of a question-answering assistant backed by the user's own documents and web pages.

Decide whether the latest question needs a search of those documents.
- Greetings, thanks, small talk, and questions fully answered by the conversation so far can be answered directly.
- Anything that asks about facts, policies, figures or content that may live in the documents needs a search.
- When unsure, ask for a search.

Respond with JSON only, in exactly one of these forms:
{"action": "retrieve"}
{"action": "respond", "answer": "<your direct answer>"}`,

  GRADER: `You are a grader assessing the relevance of a retrieved document excerpt to a user question.
If the excerpt contains keywords or meaning related to the question, grade it as relevant.
The goal is to filter out clearly unrelated excerpts; it does not need to be a stringent test.

Respond with JSON only: {"binary_score": "yes"} or {"binary_score": "no"}.`,

  BATCH_GRADER: `You are a grader assessing the relevance of several retrieved document excerpts to one user question.
An excerpt is relevant if it contains keywords or meaning related to the question.

Respond with JSON only: an array with one entry per excerpt, in the order given, each {"binary_score": "yes"} or {"binary_score": "no"}.`,

  REWRITER: `You improve search queries. Look at the question and the conversation and reason about the underlying intent.
Write one standalone question that resolves pronouns and references from the conversation and uses the terms a document about the topic would likely contain.

Respond with the improved question only, without quotes or explanation.`,

  RESPONDER: `You are an assistant for question-answering tasks over the user's documents.
Use the numbered context excerpts to answer the question. If the excerpts do not contain the answer, say that you don't know rather than guessing.
Keep the answer concise and refer to excerpts by their source when it helps the reader.`,
};

export function formatHistory(conversation: readonly ConversationTurn[]): string {
  if (conversation.length === 0) {
    return '(no previous turns)';
  }
  return conversation
    .slice(-HISTORY_TURNS)
    .map(turn => {
      const text =
        turn.text.length > HISTORY_TURN_CHARS
          ? `${turn.text.substring(0, HISTORY_TURN_CHARS)}...`
          : turn.text;
      return `${turn.role}: ${text}`;
    })
    .join('\n');
}

export function formatContext(chunks: readonly ContextChunk[]): string {
  if (chunks.length === 0) {
    return '(no context was found)';
  }
  return chunks
    .map((chunk, idx) => `[${idx + 1}] (source: ${chunk.sourceId}, part ${chunk.position})\n${chunk.text}`)
    .join('\n\n');
}

export function buildRouterMessages(
  conversation: readonly ConversationTurn[],
  query: string
): LLMMessage[] {
  return [
    { role: 'system', content: SYSTEM_PROMPTS.ROUTER },
    {
      role: 'user',
      content: `Conversation so far:\n${formatHistory(conversation)}\n\nLatest question: ${query}`,
    },
  ];
}

export function buildGraderMessages(query: string, chunkText: string): LLMMessage[] {
  return [
    { role: 'system', content: SYSTEM_PROMPTS.GRADER },
    {
      role: 'user',
      content: `Retrieved excerpt:\n\n${chunkText}\n\nUser question: ${query}`,
    },
  ];
}

export function buildBatchGraderMessages(query: string, chunkTexts: readonly string[]): LLMMessage[] {
  const excerpts = chunkTexts.map((text, idx) => `Excerpt ${idx + 1}:\n${text}`).join('\n\n');
  return [
    { role: 'system', content: SYSTEM_PROMPTS.BATCH_GRADER },
    {
      role: 'user',
      content: `${excerpts}\n\nUser question: ${query}\n\nGrade all ${chunkTexts.length} excerpts.`,
    },
  ];
}

export function buildRewriteMessages(
  conversation: readonly ConversationTurn[],
  query: string
): LLMMessage[] {
  return [
    { role: 'system', content: SYSTEM_PROMPTS.REWRITER },
    {
      role: 'user',
      content: `Conversation so far:\n${formatHistory(conversation)}\n\nInitial question: ${query}\n\nImproved question:`,
    },
  ];
}

export function buildAnswerMessages(
  conversation: readonly ConversationTurn[],
  query: string,
  chunks: readonly ContextChunk[]
): LLMMessage[] {
  return [
    { role: 'system', content: SYSTEM_PROMPTS.RESPONDER },
    {
      role: 'user',
      content: `Conversation so far:\n${formatHistory(conversation)}\n\nContext:\n${formatContext(chunks)}\n\nQuestion: ${query}`,
    },
  ];
}
