import { Router } from 'express';
import type { Router as ExpressRouter } from 'express';
import { ChatTurnBodyDto, SessionParamsDto, SessionSettingsBodyDto } from '../dtos/chat.dto';
import { createChatController } from '../controllers/chat.controller';
import { rateLimit } from '../middlewares/rate-limit';
import { validate } from '../middlewares/validate';
import type { DialogueService } from '../services/dialogue.service';

export interface V1RouterOptions {
  rateLimitWindowMs: number;
  rateLimitMax: number;
}

export function createV1Router(service: DialogueService, options: V1RouterOptions): ExpressRouter {
  const router: ExpressRouter = Router();
  const chatController = createChatController(service);

  router.post(
    '/chat/turn',
    validate({ body: ChatTurnBodyDto }),
    rateLimit({
      windowMs: options.rateLimitWindowMs,
      max: options.rateLimitMax,
      keyOf: (req) => (typeof req.body?.sessionId === 'string' ? req.body.sessionId : undefined),
    }),
    chatController.handleTurn,
  );

  router.post(
    '/chat/sessions/:sessionId/reset',
    validate({ params: SessionParamsDto }),
    chatController.resetSession,
  );

  router.patch(
    '/chat/sessions/:sessionId/settings',
    validate({ params: SessionParamsDto, body: SessionSettingsBodyDto }),
    chatController.updateSettings,
  );

  router.get(
    '/chat/sessions/:sessionId',
    validate({ params: SessionParamsDto }),
    chatController.describeSession,
  );

  return router;
}
