import { describe, it, expect } from 'vitest';
import { smsService } from '../../src/services/sms/sms.service';

describe('SMSService', () => {
  it('renders the acknowledgment TwiML', () => {
    expect(smsService.acknowledgment()).toBe(
      '<?xml version="1.0" encoding="UTF-8"?><Response><Message>Message received! Thank you.</Message></Response>'
    );
  });

  it('escapes XML in the message text', () => {
    expect(smsService.generateTwiMLResponse('a < b & c')).toBe(
      '<?xml version="1.0" encoding="UTF-8"?><Response><Message>a &lt; b &amp; c</Message></Response>'
    );
  });

  it('renders an empty response without a message', () => {
    expect(smsService.generateTwiMLResponse()).toBe('<?xml version="1.0" encoding="UTF-8"?><Response/>');
  });
});
