import { Router } from 'express';
import { SMSController } from '../controllers/sms.controller';
import type { MessageStore } from '../repositories/message.repository';
import { createSmsRoutes } from './sms.routes';

export interface RouteDependencies {
  messageStore: MessageStore;
  bodyLimit?: string;
  enforceFieldLimits?: boolean;
}

export function createRoutes(deps: RouteDependencies): Router {
  const router = Router();
  const smsController = new SMSController(deps.messageStore, {
    enforceFieldLimits: deps.enforceFieldLimits,
  });

  router.use('/sms', createSmsRoutes(smsController, { bodyLimit: deps.bodyLimit }));

  return router;
}
