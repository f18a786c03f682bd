import { serviceRequest, ServiceHttpError } from '@helpdesk/http-client';
import { createLogger } from '@helpdesk/observability';
import {
  ComplaintCreatedDto,
  ComplaintRecordDto,
  ComplaintSlotName,
  CreateComplaintDto,
} from '@helpdesk/shared-kernel';
import type { SlotValues } from '../dialogue/types';

const log = createLogger('complaint-client');

export type SubmitResult = { type: 'submitted'; complaintId: string } | { type: 'failure'; message: string };

export type FetchResult =
  | { type: 'found'; record: ComplaintRecordDto }
  | { type: 'not_found'; id: string }
  | { type: 'failure'; message: string };

export interface ComplaintClient {
  submit(fields: SlotValues, correlationId?: string): Promise<SubmitResult>;
  fetch(id: string, correlationId?: string): Promise<FetchResult>;
}

export interface ComplaintClientOptions {
  baseUrl: string;
  timeoutMs: number;
}

function describeError(error: unknown): string {
  if (error instanceof ServiceHttpError) return `complaint service responded ${error.status}`;
  if (error instanceof Error && error.name === 'AbortError') return 'complaint service timed out';
  return error instanceof Error ? error.message : String(error);
}

function headersFor(correlationId?: string): Record<string, string> {
  return correlationId ? { 'x-request-id': correlationId } : {};
}

export function toCreateComplaintPayload(fields: SlotValues): CreateComplaintDto {
  return CreateComplaintDto.parse({
    name: fields[ComplaintSlotName.NAME] ?? '',
    phone_number: fields[ComplaintSlotName.PHONE] ?? '',
    email: fields[ComplaintSlotName.EMAIL] ?? '',
    complaint_details: fields[ComplaintSlotName.DESCRIPTION] ?? '',
  });
}

/** HTTP client for the complaint backend (`/api/complaints`). */
export function createComplaintClient(options: ComplaintClientOptions): ComplaintClient {
  return {
    async submit(fields, correlationId) {
      try {
        const raw = await serviceRequest(options.baseUrl, '/api/complaints', {
          method: 'POST',
          body: toCreateComplaintPayload(fields),
          headers: headersFor(correlationId),
          timeout: options.timeoutMs,
        });
        const created = ComplaintCreatedDto.safeParse(raw);
        if (!created.success) {
          log.warn({ correlationId, issues: created.error.issues }, 'complaint service returned no id');
          return { type: 'failure', message: 'complaint service returned no complaint id' };
        }
        const complaintId = created.data.complaint_id ?? created.data.id ?? '';
        log.info({ correlationId, complaintId }, 'complaint submitted');
        return { type: 'submitted', complaintId };
      } catch (error) {
        log.error({ correlationId, err: error }, 'complaint submit failed');
        return { type: 'failure', message: describeError(error) };
      }
    },

    async fetch(id, correlationId) {
      try {
        const raw = await serviceRequest(options.baseUrl, `/api/complaints/${encodeURIComponent(id)}`, {
          headers: headersFor(correlationId),
          timeout: options.timeoutMs,
        });
        const record = ComplaintRecordDto.safeParse(raw);
        if (!record.success) {
          return { type: 'failure', message: 'complaint service returned an unreadable record' };
        }
        return { type: 'found', record: record.data };
      } catch (error) {
        if (error instanceof ServiceHttpError && error.status === 404) return { type: 'not_found', id };
        log.error({ correlationId, complaintId: id, err: error }, 'complaint fetch failed');
        return { type: 'failure', message: describeError(error) };
      }
    },
  };
}
