import { readFileSync } from 'node:fs';
import axios, { AxiosAdapter, AxiosInstance } from 'axios';
import { z } from 'zod';
import { logger } from '../core/logger';
import {
  CapabilityUnavailableError,
  ConfigurationError,
  MalformedCapabilityResponseError,
  errorMessage,
} from '../core/errors';
import { RetrievedChunk } from '../types';
import { CapabilityCallOptions, Retriever } from '../types/graph';

const chunkSchema = z.object({
  text: z.string(),
  sourceId: z.string().min(1),
  position: z.number().int().nonnegative(),
});

const chunkListSchema = z.union([z.array(chunkSchema), z.object({ chunks: z.array(chunkSchema) })]);

function toChunks(data: z.infer<typeof chunkListSchema>): RetrievedChunk[] {
  return Array.isArray(data) ? data : data.chunks;
}

/**
 * Client for a retrieval service that owns the index. Sends `{ query, k }`
 * and expects the ranked chunks back, as an array or under `chunks`.
 */
export class HttpRetriever implements Retriever {
  private client: AxiosInstance;

  constructor(serviceUrl: string, timeoutMs: number = 30000, adapter?: AxiosAdapter) {
    this.client = axios.create({
      baseURL: serviceUrl,
      headers: { 'Content-Type': 'application/json' },
      timeout: timeoutMs,
      adapter,
    });
  }

  async retrieve(query: string, k: number, options: CapabilityCallOptions): Promise<RetrievedChunk[]> {
    let data: unknown;
    try {
      const response = await this.client.post('', { query, k }, { signal: options.signal });
      data = response.data;
    } catch (error) {
      throw new CapabilityUnavailableError('retriever', `Retrieval request failed: ${errorMessage(error)}`, {
        status: axios.isAxiosError(error) ? error.response?.status : undefined,
      });
    }

    const parsed = chunkListSchema.safeParse(data);
    if (!parsed.success) {
      throw new MalformedCapabilityResponseError('retriever', 'Retrieval service returned an unexpected payload', {
        issues: parsed.error.issues.slice(0, 3).map(issue => issue.message),
      });
    }

    const chunks = toChunks(parsed.data).slice(0, k);
    logger.debug('Retrieval service responded', { count: chunks.length });
    return chunks;
  }
}

const STOPWORDS = new Set([
  'a', 'an', 'and', 'are', 'as', 'at', 'be', 'by', 'can', 'do', 'does', 'for', 'from', 'how',
  'i', 'in', 'is', 'it', 'me', 'my', 'of', 'on', 'or', 'our', 'the', 'to', 'was', 'we',
  'what', 'when', 'where', 'which', 'who', 'why', 'with', 'you', 'your',
]);

export function tokenize(text: string): string[] {
  return (text.toLowerCase().match(/[\p{L}\p{N}]+/gu) ?? []).filter(
    token => token.length > 1 && !STOPWORDS.has(token)
  );
}

/**
 * Term-overlap ranking over a fixed set of chunks. Read-only after
 * construction, so any number of runs can query it at once.
 */
export class InMemoryRetriever implements Retriever {
  private readonly indexed: ReadonlyArray<{ chunk: RetrievedChunk; terms: Set<string> }>;

  constructor(chunks: readonly RetrievedChunk[]) {
    this.indexed = chunks.map(chunk => ({ chunk: { ...chunk }, terms: new Set(tokenize(chunk.text)) }));
  }

  async retrieve(query: string, k: number): Promise<RetrievedChunk[]> {
    const queryTerms = [...new Set(tokenize(query))];
    if (queryTerms.length === 0) return [];

    return this.indexed
      .map((entry, order) => ({
        entry,
        order,
        score: queryTerms.filter(term => entry.terms.has(term)).length,
      }))
      .filter(candidate => candidate.score > 0)
      .sort((a, b) => b.score - a.score || a.order - b.order)
      .slice(0, k)
      .map(candidate => ({ ...candidate.entry.chunk }));
  }
}

/** Reads a JSON chunk list (array, or `{ "chunks": [...] }`) produced by the ingestion pipeline. */
export function loadKnowledgeBase(path: string): RetrievedChunk[] {
  let raw: string;
  try {
    raw = readFileSync(path, 'utf8');
  } catch (error) {
    throw new ConfigurationError(`Cannot read knowledge base at ${path}: ${errorMessage(error)}`);
  }

  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (error) {
    throw new ConfigurationError(`Knowledge base at ${path} is not valid JSON: ${errorMessage(error)}`);
  }

  const parsed = chunkListSchema.safeParse(json);
  if (!parsed.success) {
    throw new ConfigurationError(`Knowledge base at ${path} does not match the chunk format`);
  }

  const chunks = toChunks(parsed.data);
  logger.info('Knowledge base loaded', { path, chunks: chunks.length });
  return chunks;
}
