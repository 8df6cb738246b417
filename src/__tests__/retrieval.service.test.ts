import { mkdtempSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import path from 'node:path';
import { AxiosAdapter, InternalAxiosRequestConfig } from 'axios';
import { CapabilityUnavailableError, ConfigurationError, MalformedCapabilityResponseError } from '../core/errors';
import { HttpRetriever, InMemoryRetriever, loadKnowledgeBase, tokenize } from '../services/retrieval.service';
import { chunk } from './helpers/stubs';

const DELIVERY = chunk('handbook/returns.md', 0, 'Refunds are issued within 30 days of delivery.');
const EXPRESS = chunk('handbook/shipping.md', 0, 'Express shipping takes one to two days.');
const FEES = chunk('handbook/returns.md', 1, 'Refunds for express shipping fees are not issued.');

describe('tokenize', () => {
  test('should lowercase and drop stopwords and single characters', () => {
    expect(tokenize('Hello, World! A b 42')).toEqual(['hello', 'world', '42']);
  });
});

describe('InMemoryRetriever', () => {
  const retriever = new InMemoryRetriever([DELIVERY, EXPRESS, FEES]);

  test('should rank chunks by the number of query terms they contain', async () => {
    await expect(retriever.retrieve('Are express shipping fees refunded?', 5)).resolves.toEqual([
      FEES,
      EXPRESS,
    ]);
  });

  test('should cap the results at k', async () => {
    await expect(retriever.retrieve('Are express shipping fees refunded?', 1)).resolves.toEqual([FEES]);
  });

  test('should keep the original order on ties', async () => {
    await expect(retriever.retrieve('issued', 5)).resolves.toEqual([DELIVERY, FEES]);
  });

  test('should return nothing for a query of stopwords', async () => {
    await expect(retriever.retrieve('what is the', 5)).resolves.toEqual([]);
  });

  test('should hand out copies', async () => {
    const [first] = await retriever.retrieve('delivery', 1);
    first.text = 'changed';

    await expect(retriever.retrieve('delivery', 1)).resolves.toEqual([DELIVERY]);
  });
});

describe('HttpRetriever', () => {
  const options = { signal: new AbortController().signal };

  function retrieverWith(reply: () => unknown) {
    const requests: InternalAxiosRequestConfig[] = [];
    const adapter: AxiosAdapter = async config => {
      requests.push(config);
      return { data: reply(), status: 200, statusText: 'OK', headers: {}, config };
    };
    return { retriever: new HttpRetriever('http://retrieval.test/search', 1000, adapter), requests };
  }

  test('should post the query and return the ranked chunks', async () => {
    const { retriever, requests } = retrieverWith(() => [DELIVERY, FEES, EXPRESS]);

    await expect(retriever.retrieve('refunds', 2, options)).resolves.toEqual([DELIVERY, FEES]);
    expect(requests[0].method).toBe('post');
    expect(JSON.parse(requests[0].data)).toEqual({ query: 'refunds', k: 2 });
  });

  test('should accept chunks wrapped in an object', async () => {
    const { retriever } = retrieverWith(() => ({ chunks: [EXPRESS] }));

    await expect(retriever.retrieve('shipping', 5, options)).resolves.toEqual([EXPRESS]);
  });

  test('should flag a payload that is not a chunk list as malformed', async () => {
    const { retriever } = retrieverWith(() => ({ results: [{ content: 'Refunds' }] }));

    await expect(retriever.retrieve('refunds', 5, options)).rejects.toBeInstanceOf(
      MalformedCapabilityResponseError
    );
  });

  test('should report an unreachable service as unavailable', async () => {
    const { retriever } = retrieverWith(() => {
      throw new Error('connect ECONNREFUSED');
    });

    const failure = retriever.retrieve('refunds', 5, options);

    await expect(failure).rejects.toBeInstanceOf(CapabilityUnavailableError);
    await expect(failure).rejects.toMatchObject({
      capability: 'retriever',
      message: 'Retrieval request failed: connect ECONNREFUSED',
    });
  });
});

describe('loadKnowledgeBase', () => {
  test('should load the bundled sample', () => {
    const chunks = loadKnowledgeBase(path.join(__dirname, '../../data/knowledge-base.json'));

    expect(chunks).toHaveLength(6);
    expect(chunks[0]).toMatchObject({ sourceId: 'handbook/returns.md', position: 0 });
  });

  test('should accept a bare array', () => {
    const dir = mkdtempSync(path.join(tmpdir(), 'kb-'));
    const file = path.join(dir, 'chunks.json');
    writeFileSync(file, JSON.stringify([DELIVERY]));

    expect(loadKnowledgeBase(file)).toEqual([DELIVERY]);
  });

  test('should reject a file in the wrong shape', () => {
    const dir = mkdtempSync(path.join(tmpdir(), 'kb-'));
    const file = path.join(dir, 'chunks.json');
    writeFileSync(file, JSON.stringify({ documents: [] }));

    expect(() => loadKnowledgeBase(file)).toThrow(ConfigurationError);
  });

  test('should reject a missing file', () => {
    expect(() => loadKnowledgeBase('/nonexistent/knowledge-base.json')).toThrow(ConfigurationError);
  });
});
