import type { Pool } from 'pg';
import type { IncomingMessage } from '../types/message.types';
import { PersistenceError } from '../utils/errors';

/**
 * Storage seam the webhook controller writes through.
 */
export interface MessageStore {
  /** Rejects with PersistenceError when the write fails. */
  save(message: IncomingMessage): Promise<void>;
}

/** The slice of pg's Pool the repository needs. */
export type Queryable = Pick<Pool, 'query'>;

export class MessageRepository implements MessageStore {
  constructor(private readonly pool: Queryable) {}

  // TODO: unique index on message_sid plus ON CONFLICT DO NOTHING, once deduplicating provider retries is confirmed as wanted
  /**
   * Append one message. Duplicate MessageSids produce duplicate rows.
   */
  async save(message: IncomingMessage): Promise<void> {
    try {
      await this.pool.query(
        `INSERT INTO sms_messages (message_sid, from_number, body, received_at)
         VALUES ($1, $2, $3, $4)`,
        [message.messageSid, message.fromNumber, message.body, message.receivedAt]
      );
    } catch (error) {
      throw new PersistenceError(error);
    }
  }
}
