import { z } from 'zod';

export const ChatTurnBodyDto = z.object({
  sessionId: z.string().trim().min(1).max(128),
  text: z.string().max(4000),
});

export const SessionParamsDto = z.object({
  sessionId: z.string().trim().min(1).max(128),
});

export const SessionSettingsBodyDto = z.object({
  refineQuery: z.boolean(),
});

export type ChatTurnBody = z.infer<typeof ChatTurnBodyDto>;
export type SessionParams = z.infer<typeof SessionParamsDto>;
export type SessionSettingsBody = z.infer<typeof SessionSettingsBodyDto>;
