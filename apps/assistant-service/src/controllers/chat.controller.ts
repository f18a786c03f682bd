import { NextFunction, Request, Response } from 'express';
import { ok } from '@helpdesk/shared-kernel';
import type { ChatTurnBody, SessionSettingsBody } from '../dtos/chat.dto';
import type { DialogueService } from '../services/dialogue.service';

export function createChatController(service: DialogueService) {
  return {
    async handleTurn(req: Request, res: Response, next: NextFunction) {
      try {
        const body: ChatTurnBody = req.body;
        const result = await service.handleMessage(body.sessionId, body.text, req.requestId);
        res.status(200).json(ok(result));
      } catch (err) {
        next(err);
      }
    },

    async resetSession(req: Request, res: Response, next: NextFunction) {
      try {
        await service.resetSession(req.params.sessionId);
        res.status(200).json(ok({ sessionId: req.params.sessionId, state: 'idle' }));
      } catch (err) {
        next(err);
      }
    },

    async updateSettings(req: Request, res: Response, next: NextFunction) {
      try {
        const body: SessionSettingsBody = req.body;
        res.status(200).json(ok(await service.updateSettings(req.params.sessionId, body)));
      } catch (err) {
        next(err);
      }
    },

    describeSession(req: Request, res: Response) {
      res.status(200).json(ok(service.describeSession(req.params.sessionId)));
    },
  };
}
