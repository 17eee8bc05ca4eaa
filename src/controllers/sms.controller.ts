import type { NextFunction, Request, Response } from 'express';
import type { MessageStore } from '../repositories/message.repository';
import { FormFields, FormParseError, parseForm } from '../services/sms/form-parser.service';
import { extractMessageFields, validateMessageFields } from '../services/sms/message-extractor.service';
import { smsService } from '../services/sms/sms.service';
import type { IncomingMessage } from '../types/message.types';
import { MalformedRequestError, ResponseWriteError } from '../utils/errors';
import { logger } from '../utils/logger';

export interface SMSControllerOptions {
  /** Reject fields longer than their column. Defaults to true. */
  enforceFieldLimits?: boolean;
}

export class SMSController {
  constructor(
    private readonly messageStore: MessageStore,
    private readonly options: SMSControllerOptions = {}
  ) {}

  /**
   * Handle incoming SMS webhook from Twilio.
   * Failures are passed to the error handler, which picks the status and logs them.
   */
  async handleIncoming(req: Request, res: Response, next: NextFunction): Promise<void> {
    const connection = this.watchConnection(req, res);

    try {
      const form = this.parseRequestForm(req);
      const { fields, source } = extractMessageFields(form);
      const validated = validateMessageFields(fields, {
        enforceLimits: this.options.enforceFieldLimits,
      });

      const message: IncomingMessage = { ...validated, receivedAt: new Date() };
      await this.messageStore.save(message);
      connection.stored(message.messageSid);

      logger.info(`Saved SMS from ${message.fromNumber}: ${message.body}`, {
        messageSid: message.messageSid,
        source,
      });

      if (connection.isClosed()) {
        connection.reportWriteFailure();
        return;
      }

      res.status(200).type('application/xml').send(smsService.acknowledgment());
    } catch (error) {
      next(error);
    }
  }

  /**
   * The route hands the body over unparsed; anything that is not form-encoded arrives as `{}`.
   */
  private parseRequestForm(req: Request): FormFields {
    const raw: unknown = req.body;
    if (typeof raw !== 'string') {
      return new Map();
    }

    try {
      return parseForm(raw);
    } catch (error) {
      if (error instanceof FormParseError) {
        throw new MalformedRequestError('Invalid form data', { reason: error.message });
      }
      throw error;
    }
  }

  /**
   * Track the provider's connection from the start of the request, so a
   * hang-up during the insert is still reported once the row is stored.
   */
  private watchConnection(req: Request, res: Response) {
    let closed = false;
    let reported = false;
    let messageSid: string | undefined;

    const reportWriteFailure = () => {
      if (reported || messageSid === undefined) {
        return;
      }
      reported = true;
      const error = new ResponseWriteError({ messageSid });
      logger.error(error.message, { code: error.code, ...error.details });
    };

    res.once('close', () => {
      closed = true;
      if (!res.writableFinished) {
        reportWriteFailure();
      }
    });

    return {
      stored(sid: string): void {
        messageSid = sid;
      },
      isClosed(): boolean {
        return closed || res.destroyed || req.socket.destroyed;
      },
      reportWriteFailure,
    };
  }
}
