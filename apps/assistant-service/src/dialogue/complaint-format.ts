import type { ComplaintDraft, ComplaintRecord } from './types';
import { SLOT_CATALOG } from './slots';

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

/** ISO timestamps are shown as UTC "YYYY-MM-DD HH:MM:SS"; anything else is shown as sent. */
export function formatCreatedAt(raw: string | undefined): string {
  if (!raw) return '';
  const date = new Date(raw);
  if (Number.isNaN(date.getTime())) return raw;
  return (
    `${date.getUTCFullYear()}-${pad(date.getUTCMonth() + 1)}-${pad(date.getUTCDate())} ` +
    `${pad(date.getUTCHours())}:${pad(date.getUTCMinutes())}:${pad(date.getUTCSeconds())}`
  );
}

export function formatComplaintDetails(record: ComplaintRecord): string {
  return [
    `**Complaint ID**: ${record.complaint_id ?? record._id ?? 'N/A'}`,
    `**Name**: ${record.name ?? 'N/A'}`,
    `**Phone**: ${record.phone_number ?? 'N/A'}`,
    `**Email**: ${record.email ?? 'N/A'}`,
    `**Details**: ${record.complaint_details ?? 'N/A'}`,
    `**Created At**: ${formatCreatedAt(record.created_at)}`,
  ].join('\n');
}

export function formatDraftSummary(draft: ComplaintDraft): string {
  const lines = draft.order.map((name) => `**${SLOT_CATALOG[name].label}**: ${draft.values[name] ?? ''}`);
  return ['Please confirm your complaint:', ...lines, 'Shall I submit it? (yes/no)'].join('\n');
}
