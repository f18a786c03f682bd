import { serviceRequest, ServiceHttpError } from '@helpdesk/http-client';
import { createLogger } from '@helpdesk/observability';
import { BackendFailureError, type HistoryEntryDto } from '@helpdesk/shared-kernel';
import { z } from 'zod';

const log = createLogger('rag-client');

const CitationSchema = z.object({
  source: z.string().optional(),
  chunkIndex: z.number().optional(),
});

const AnswerPayloadSchema = z.object({
  answer: z.string().default(''),
  citations: z.array(CitationSchema).default([]),
});

const AnswerEnvelopeSchema = z.union([z.object({ data: AnswerPayloadSchema }), AnswerPayloadSchema]);

export type RagCitation = z.infer<typeof CitationSchema>;

export interface RagAnswerResult {
  answer: string;
  citations: RagCitation[];
  latencyMs: number;
}

export interface DocumentAnswerClient {
  ask(query: string, history: HistoryEntryDto[], correlationId: string): Promise<RagAnswerResult>;
}

export interface DocumentAnswerClientOptions {
  baseUrl: string;
  endpoint: string;
  timeoutMs: number;
  maxAttempts?: number;
}

const RETRYABLE_STATUS = new Set([502, 503, 504]);
const RETRYABLE_ERROR_CODES = new Set(['ECONNRESET', 'ETIMEDOUT', 'UND_ERR_CONNECT_TIMEOUT', 'UND_ERR_HEADERS_TIMEOUT']);

function errorCode(error: Error): string {
  const code: unknown = Reflect.get(error, 'code');
  return typeof code === 'string' ? code : '';
}

function isRetryable(error: unknown): boolean {
  if (error instanceof ServiceHttpError) return RETRYABLE_STATUS.has(error.status);
  if (!(error instanceof Error)) return false;
  if (RETRYABLE_ERROR_CODES.has(errorCode(error))) return true;
  if (error.cause instanceof Error && RETRYABLE_ERROR_CODES.has(errorCode(error.cause))) return true;
  return error.name === 'AbortError';
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function parsePayload(raw: unknown): Omit<RagAnswerResult, 'latencyMs'> {
  const parsed = AnswerEnvelopeSchema.safeParse(raw ?? {});
  if (!parsed.success) return { answer: '', citations: [] };
  const payload = 'data' in parsed.data ? parsed.data.data : parsed.data;
  return { answer: payload.answer.trim(), citations: payload.citations };
}

/** Client for the document answer service; retries once on gateway errors and timeouts. */
export function createDocumentAnswerClient(options: DocumentAnswerClientOptions): DocumentAnswerClient {
  const maxAttempts = options.maxAttempts ?? 2;

  async function execute(query: string, history: HistoryEntryDto[], correlationId: string): Promise<RagAnswerResult> {
    const startedAt = Date.now();
    const raw = await serviceRequest(options.baseUrl, options.endpoint, {
      method: 'POST',
      body: { query, history },
      headers: { 'x-correlation-id': correlationId, 'x-request-id': correlationId },
      timeout: options.timeoutMs,
    });
    return { ...parsePayload(raw), latencyMs: Date.now() - startedAt };
  }

  return {
    async ask(query, history, correlationId) {
      let attempt = 0;
      let lastError: unknown;

      while (attempt < maxAttempts) {
        attempt += 1;
        try {
          return await execute(query, history, correlationId);
        } catch (error) {
          lastError = error;
          const retryable = isRetryable(error);
          log.warn({ correlationId, attempt, retryable, err: error }, 'rag request failed');
          if (!retryable || attempt >= maxAttempts) break;
          await sleep(250 * attempt);
        }
      }

      const message = lastError instanceof Error ? lastError.message : String(lastError);
      throw new BackendFailureError('rag', message);
    },
  };
}
