import twilio from 'twilio';

export const ACKNOWLEDGMENT_TEXT = 'Message received! Thank you.';

export class SMSService {
  /**
   * Generate TwiML response
   */
  generateTwiMLResponse(message?: string): string {
    const twiml = new twilio.twiml.MessagingResponse();
    if (message) {
      twiml.message(message);
    }
    return twiml.toString();
  }

  /**
   * TwiML body confirming receipt of an inbound message
   */
  acknowledgment(): string {
    return this.generateTwiMLResponse(ACKNOWLEDGMENT_TEXT);
  }
}

export const smsService = new SMSService();
