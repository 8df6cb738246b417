import dotenv from 'dotenv';
import { z } from 'zod';

dotenv.config();

const configSchema = z.object({
  llm: z.object({
    apiKey: z.string(),
    baseUrl: z.string().url(),
    temperature: z.coerce.number().min(0).max(2),
    requestsPerMinute: z.coerce.number().int().positive(),
  }),
  models: z.object({
    router: z.string().min(1),
    grader: z.string().min(1),
    rewriter: z.string().min(1),
    responder: z.string().min(1),
  }),
  retrieval: z.object({
    serviceUrl: z.string(),
    knowledgeBasePath: z.string().min(1),
    topK: z.coerce.number().int().min(1).max(50),
  }),
  workflow: z.object({
    maxRewrites: z.coerce.number().int().min(0).max(10),
    gradingMode: z.enum(['per-chunk', 'batch']),
    capabilityTimeout: z.coerce.number().int().positive(),
    totalTimeout: z.coerce.number().int().positive(),
  }),
  server: z.object({
    port: z.coerce.number().int().positive(),
    env: z.string(),
    sessionTtl: z.coerce.number().int().positive(),
  }),
  logging: z.object({
    level: z.enum(['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly']),
  }),
});

export type AppConfig = z.infer<typeof configSchema>;
export type GradingMode = AppConfig['workflow']['gradingMode'];

export const config: AppConfig = configSchema.parse({
  llm: {
    apiKey: process.env.LLM_API_KEY || process.env.OPENAI_API_KEY || '',
    baseUrl: process.env.LLM_BASE_URL || 'https://api.openai.com/v1',
    temperature: process.env.LLM_TEMPERATURE || '0',
    requestsPerMinute: process.env.LLM_REQUESTS_PER_MINUTE || '50',
  },
  models: {
    router: process.env.ROUTER_MODEL || 'gpt-4o-mini',
    grader: process.env.GRADER_MODEL || 'gpt-4o-mini',
    rewriter: process.env.REWRITER_MODEL || 'gpt-4o-mini',
    responder: process.env.RESPONDER_MODEL || 'gpt-4o-mini',
  },
  retrieval: {
    serviceUrl: process.env.RETRIEVAL_SERVICE_URL || '',
    knowledgeBasePath: process.env.KNOWLEDGE_BASE_PATH || 'data/knowledge-base.json',
    topK: process.env.RETRIEVAL_TOP_K || '5',
  },
  workflow: {
    maxRewrites: process.env.MAX_REWRITES || '2',
    gradingMode: process.env.GRADING_MODE || 'per-chunk',
    capabilityTimeout: process.env.CAPABILITY_TIMEOUT || '30000', // per capability call
    totalTimeout: process.env.TOTAL_TIMEOUT || '120000', // adaptive path as a whole
  },
  server: {
    port: process.env.PORT || '3002',
    env: process.env.NODE_ENV || 'development',
    sessionTtl: process.env.SESSION_TTL || '1800000', // 30 min
  },
  logging: {
    level: process.env.LOG_LEVEL || 'info',
  },
});
