import { envDebug } from '@helpdesk/config';
import { createLogger } from '@helpdesk/observability';
import { createApp } from './app';
import { loadEnv } from './config';
import { createComplaintClient } from './clients/complaint.client';
import { createDocumentAnswerClient } from './clients/ragClient';
import { DialogueEngine } from './dialogue/dialogue-engine';
import { buildDialogueSettings } from './dialogue/settings';
import { createDialogueService } from './services/dialogue.service';

envDebug('assistant-service');

const log = createLogger('assistant-service');
const env = loadEnv();

const engine = new DialogueEngine({
  settings: buildDialogueSettings({
    fuzzyThreshold: env.FUZZY_THRESHOLD,
    topicSwitchThreshold: env.TOPIC_SWITCH_THRESHOLD,
    historyWindow: env.HISTORY_WINDOW,
    refinementDefault: env.QUERY_REFINEMENT_DEFAULT,
    slots: env.COMPLAINT_SLOTS,
  }),
  sessionTtlMs: env.SESSION_TTL_MIN * 60_000,
});

const service = createDialogueService({
  engine,
  complaints: createComplaintClient({ baseUrl: env.COMPLAINT_API_URL, timeoutMs: env.COMPLAINT_API_TIMEOUT_MS }),
  documents: env.RAG_ENABLED
    ? createDocumentAnswerClient({ baseUrl: env.RAG_BASE_URL, endpoint: env.RAG_ENDPOINT, timeoutMs: env.RAG_TIMEOUT_MS })
    : undefined,
});

const app = createApp(service, { rateLimitWindowMs: env.RATE_LIMIT_WINDOW_MS, rateLimitMax: env.RATE_LIMIT_MAX });

app.listen(env.PORT, () => {
  log.info({ slots: engine.settings.slotOrder, ragEnabled: env.RAG_ENABLED }, `assistant-service listening on http://localhost:${env.PORT}`);
});
