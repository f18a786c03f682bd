import { BaseEnvSchema, BoolFromString, validateEnv } from '@helpdesk/config';
import { PORTS, SERVICE_URLS } from '@helpdesk/shared-kernel';
import { z } from 'zod';

export const EnvSchema = BaseEnvSchema.extend({
  PORT: z.coerce.number().default(PORTS.ASSISTANT),
  FUZZY_THRESHOLD: z.coerce.number().gt(0).max(1).default(0.7),
  TOPIC_SWITCH_THRESHOLD: z.coerce.number().gt(0).max(1).default(0.8),
  HISTORY_WINDOW: z.coerce.number().int().positive().default(6),
  QUERY_REFINEMENT_DEFAULT: BoolFromString.default(true),
  COMPLAINT_SLOTS: z.string().min(1).default('description,name,phone,email'),
  SESSION_TTL_MIN: z.coerce.number().int().positive().default(30),
  COMPLAINT_API_URL: z.string().url().default(SERVICE_URLS.COMPLAINT_API),
  COMPLAINT_API_TIMEOUT_MS: z.coerce.number().int().positive().default(10000),
  RAG_ENABLED: BoolFromString.default(true),
  RAG_BASE_URL: z.string().url().default(SERVICE_URLS.RAG_SERVICE),
  RAG_ENDPOINT: z.string().default('/v1/rag/answer'),
  RAG_TIMEOUT_MS: z.coerce.number().int().positive().default(12000),
  RATE_LIMIT_WINDOW_MS: z.coerce.number().int().positive().default(60000),
  RATE_LIMIT_MAX: z.coerce.number().int().positive().default(30),
});

export type AssistantEnv = z.infer<typeof EnvSchema>;

export function loadEnv(source: NodeJS.ProcessEnv = process.env): AssistantEnv {
  return validateEnv(EnvSchema, source);
}
