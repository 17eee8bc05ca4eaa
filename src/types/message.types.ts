/**
 * An inbound SMS as extracted from the provider webhook.
 */
export interface IncomingMessage {
  messageSid: string;
  fromNumber: string;
  body: string;
  /** Set by the server when the webhook is processed, never taken from the request. */
  receivedAt: Date;
}

export type MessageField = 'messageSid' | 'fromNumber' | 'body';

export type MessageFields = Pick<IncomingMessage, MessageField>;

/** One extraction pass's findings; absent and empty values are both left out. */
export type PartialMessageFields = Partial<MessageFields>;
