import { z } from 'zod';

// ─── Complaint backend ─────────────────────────────
export const CreateComplaintDto = z.object({
  name: z.string(),
  phone_number: z.string(),
  email: z.string(),
  complaint_details: z.string().min(1),
});
export type CreateComplaintDto = z.infer<typeof CreateComplaintDto>;

export const ComplaintCreatedDto = z
  .object({
    complaint_id: z.string().min(1).optional(),
    id: z.string().min(1).optional(),
  })
  .refine((value) => value.complaint_id !== undefined || value.id !== undefined, {
    message: 'complaint_id or id is required',
  });
export type ComplaintCreatedDto = z.infer<typeof ComplaintCreatedDto>;

export const ComplaintRecordDto = z.object({
  complaint_id: z.string().optional(),
  _id: z.string().optional(),
  name: z.string().optional(),
  phone_number: z.string().optional(),
  email: z.string().optional(),
  complaint_details: z.string().optional(),
  created_at: z.string().optional(),
});
export type ComplaintRecordDto = z.infer<typeof ComplaintRecordDto>;

// ─── Document answer service ───────────────────────
export const HistoryEntryDto = z.object({
  role: z.enum(['user', 'assistant']),
  content: z.string(),
});
export type HistoryEntryDto = z.infer<typeof HistoryEntryDto>;
