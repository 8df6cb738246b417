import { Readable } from 'node:stream';
import { StringDecoder } from 'node:string_decoder';
import axios, { AxiosAdapter, AxiosInstance } from 'axios';
import { z } from 'zod';
import { config } from '../core/config';
import { logger } from '../core/logger';
import {
  CapabilityName,
  CapabilityUnavailableError,
  MalformedCapabilityResponseError,
  errorMessage,
} from '../core/errors';

export interface LLMMessage {
  role: 'system' | 'user' | 'assistant';
  content: string;
}

export interface LLMResponse {
  content: string;
  model: string;
  usage?: {
    promptTokens: number;
    completionTokens: number;
    totalTokens: number;
  };
}

export interface LLMOptions {
  model?: string;
  temperature?: number;
  maxTokens?: number;
  signal?: AbortSignal;
  /** Capability the call serves; used to label failures. */
  capability?: CapabilityName;
}

/** The slice of an OpenAI-compatible chat API the capability adapters need. */
export interface ChatClient {
  chat(messages: LLMMessage[], options?: LLMOptions): Promise<LLMResponse>;
  chatStream(messages: LLMMessage[], options?: LLMOptions): AsyncIterable<string>;
}

export interface LLMServiceSettings {
  baseUrl: string;
  apiKey: string;
  temperature: number;
  requestsPerMinute: number;
  defaultModel: string;
  /** Transport override, as accepted by axios. */
  adapter?: AxiosAdapter;
}

const completionSchema = z.object({
  model: z.string().optional(),
  choices: z
    .array(
      z.object({
        message: z.object({ content: z.string().nullable() }),
      })
    )
    .min(1),
  usage: z
    .object({
      prompt_tokens: z.number(),
      completion_tokens: z.number(),
      total_tokens: z.number(),
    })
    .optional(),
});

const streamChunkSchema = z.object({
  model: z.string().optional(),
  choices: z
    .array(
      z.object({
        delta: z.object({ content: z.string().nullish() }).partial().optional(),
      })
    )
    .optional(),
});

class RateLimiter {
  private queue: Array<() => Promise<void>> = [];
  private processing = false;
  private minDelay: number;
  private lastRequestTime = 0;

  constructor(requestsPerMinute: number = 50) {
    this.minDelay = 60000 / requestsPerMinute;
  }

  async execute<T>(fn: () => Promise<T>): Promise<T> {
    return new Promise<T>((resolve, reject) => {
      this.queue.push(async () => {
        try {
          resolve(await fn());
        } catch (error) {
          reject(error);
        }
      });

      if (!this.processing) {
        void this.processQueue();
      }
    });
  }

  private async processQueue(): Promise<void> {
    this.processing = true;

    while (this.queue.length > 0) {
      const timeSinceLastRequest = Date.now() - this.lastRequestTime;

      if (timeSinceLastRequest < this.minDelay) {
        await new Promise(resolve => setTimeout(resolve, this.minDelay - timeSinceLastRequest));
      }

      const task = this.queue.shift();
      if (task) {
        this.lastRequestTime = Date.now();
        await task();
      }
    }

    this.processing = false;
  }
}

/**
 * Incremental parser for a server-sent events body. Feed it raw text as it
 * arrives; it returns the `data:` payloads of every complete line.
 */
export class SseDecoder {
  private pending = '';

  push(text: string): string[] {
    this.pending += text;
    const lines = this.pending.split('\n');
    this.pending = lines.pop() ?? '';
    return lines
      .map(line => line.replace(/\r$/, ''))
      .filter(line => line.startsWith('data:'))
      .map(line => line.slice(5).trim());
  }

  flush(): string[] {
    const rest = this.pending;
    this.pending = '';
    return rest ? this.push(`${rest}\n`) : [];
  }
}

/** Text of one streamed completion chunk; `null` for `[DONE]`. */
export function parseStreamData(data: string): string | null {
  if (data === '[DONE]') return null;
  try {
    const parsed = streamChunkSchema.safeParse(JSON.parse(data));
    if (!parsed.success) return '';
    return parsed.data.choices?.[0]?.delta?.content ?? '';
  } catch (error) {
    logger.debug('Skipping unparseable stream line', {
      error: errorMessage(error),
      preview: data.substring(0, 80),
    });
    return '';
  }
}

export class LLMService implements ChatClient {
  private client: AxiosInstance;
  private rateLimiter: RateLimiter;

  constructor(private readonly settings: LLMServiceSettings) {
    this.client = axios.create({
      baseURL: settings.baseUrl,
      headers: {
        Authorization: `Bearer ${settings.apiKey}`,
        'Content-Type': 'application/json',
      },
      timeout: 120000,
      adapter: settings.adapter,
    });

    this.rateLimiter = new RateLimiter(settings.requestsPerMinute);
  }

  private ensureConfigured(capability: CapabilityName): void {
    if (!this.settings.apiKey) {
      throw new CapabilityUnavailableError(capability, 'LLM API key is not configured');
    }
  }

  private payload(messages: LLMMessage[], options: LLMOptions, stream: boolean) {
    return {
      model: options.model || this.settings.defaultModel,
      messages,
      temperature: options.temperature ?? this.settings.temperature,
      max_tokens: options.maxTokens ?? 1500,
      stream,
    };
  }

  async chat(messages: LLMMessage[], options: LLMOptions = {}): Promise<LLMResponse> {
    const capability = options.capability ?? 'generator';
    this.ensureConfigured(capability);

    return this.rateLimiter.execute(async () => {
      const payload = this.payload(messages, options, false);
      logger.debug('LLM Request', { model: payload.model, capability, messageCount: messages.length });

      let data: unknown;
      try {
        const response = await this.client.post('/chat/completions', payload, {
          signal: options.signal,
        });
        data = response.data;
      } catch (error) {
        if (!axios.isCancel(error)) {
          logger.error('LLM Error', {
            capability,
            error: errorMessage(error),
            status: axios.isAxiosError(error) ? error.response?.status : undefined,
          });
        }
        throw new CapabilityUnavailableError(capability, `LLM request failed: ${errorMessage(error)}`);
      }

      const parsed = completionSchema.safeParse(data);
      if (!parsed.success) {
        throw new MalformedCapabilityResponseError(capability, 'LLM returned an unexpected payload', {
          issues: parsed.error.issues.slice(0, 3).map(issue => issue.message),
        });
      }

      const content = parsed.data.choices[0].message.content ?? '';
      const usage = parsed.data.usage;

      logger.debug('LLM Response', {
        model: parsed.data.model,
        capability,
        contentLength: content.length,
        tokens: usage?.total_tokens,
      });

      return {
        content,
        model: parsed.data.model ?? payload.model,
        usage: usage
          ? {
              promptTokens: usage.prompt_tokens,
              completionTokens: usage.completion_tokens,
              totalTokens: usage.total_tokens,
            }
          : undefined,
      };
    });
  }

  /**
   * Stream chat completion, yielding text deltas as they arrive. Aborting
   * `options.signal` closes the HTTP stream.
   */
  async *chatStream(messages: LLMMessage[], options: LLMOptions = {}): AsyncGenerator<string> {
    const capability = options.capability ?? 'generator';
    this.ensureConfigured(capability);

    const payload = this.payload(messages, options, true);
    logger.debug('LLM Streaming Request', { model: payload.model, capability, messageCount: messages.length });

    let body: unknown;
    try {
      const response = await this.rateLimiter.execute(() =>
        this.client.post('/chat/completions', payload, {
          responseType: 'stream',
          signal: options.signal,
        })
      );
      body = response.data;
    } catch (error) {
      throw new CapabilityUnavailableError(
        capability,
        `LLM stream request failed: ${errorMessage(error)}`
      );
    }

    if (!(body instanceof Readable)) {
      throw new MalformedCapabilityResponseError(capability, 'LLM stream has no readable body');
    }

    const decoder = new SseDecoder();
    // Characters may be split across network chunks
    const utf8 = new StringDecoder('utf8');
    try {
      for await (const chunk of body) {
        const part: unknown = chunk;
        const text = Buffer.isBuffer(part) ? utf8.write(part) : String(part);
        for (const data of decoder.push(text)) {
          const delta = parseStreamData(data);
          if (delta === null) return;
          if (delta) yield delta;
        }
      }
      for (const data of [...decoder.push(utf8.end()), ...decoder.flush()]) {
        const delta = parseStreamData(data);
        if (delta === null) return;
        if (delta) yield delta;
      }
    } catch (error) {
      logger.error('LLM Stream Error', { capability, error: errorMessage(error) });
      throw new CapabilityUnavailableError(capability, `LLM stream failed: ${errorMessage(error)}`);
    } finally {
      body.destroy();
    }
  }
}

export function createLLMService(): LLMService {
  return new LLMService({
    baseUrl: config.llm.baseUrl,
    apiKey: config.llm.apiKey,
    temperature: config.llm.temperature,
    requestsPerMinute: config.llm.requestsPerMinute,
    defaultModel: config.models.responder,
  });
}
