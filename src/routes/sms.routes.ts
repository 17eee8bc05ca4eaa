import express, { Router } from 'express';
import type { SMSController } from '../controllers/sms.controller';
import { methodNotAllowed } from '../middleware/error-handler';

export interface SmsRouteOptions {
  bodyLimit?: string;
}

export function createSmsRoutes(smsController: SMSController, options: SmsRouteOptions = {}): Router {
  const router = Router();

  // Twilio sends application/x-www-form-urlencoded; keep it raw so the controller can parse it strictly
  const rawForm = express.text({
    type: 'application/x-www-form-urlencoded',
    limit: options.bodyLimit ?? '100kb',
  });

  router.post('/', rawForm, (req, res, next) => smsController.handleIncoming(req, res, next));
  router.all('/', methodNotAllowed(['POST']));

  return router;
}
