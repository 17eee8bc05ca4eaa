import type { MessageField, MessageFields, PartialMessageFields } from '../../types/message.types';
import { MalformedRequestError, ValidationError } from '../../utils/errors';
import { FormFields, FormParseError, getFormValue, parseForm } from './form-parser.service';

export const MESSAGE_FIELDS: readonly MessageField[] = ['messageSid', 'fromNumber', 'body'];

/** Provider key for each field. The lower-cased key is tried when it is absent. */
export const PROVIDER_KEYS: Readonly<Record<MessageField, string>> = {
  messageSid: 'MessageSid',
  fromNumber: 'From',
  body: 'Body',
};

/**
 * Some senders re-encode the whole webhook query string into this one field.
 */
export const ENVELOPE_KEY = 'body';

export const FIELD_MAX_LENGTHS: Readonly<Record<MessageField, number>> = {
  messageSid: 50,
  fromNumber: 15,
  body: 1600,
};

export type ExtractionSource = 'direct' | 'envelope';

export interface ExtractionResult {
  fields: PartialMessageFields;
  missing: MessageField[];
  source: ExtractionSource;
}

/**
 * Look up each field by its provider key, then by the lower-cased key.
 * Keys listed in `excludeKeys` are treated as absent.
 */
export function lookupFields(
  form: FormFields,
  excludeKeys: readonly string[] = []
): PartialMessageFields {
  const found: PartialMessageFields = {};

  for (const field of MESSAGE_FIELDS) {
    const key = PROVIDER_KEYS[field];
    for (const candidate of [key, key.toLowerCase()]) {
      if (excludeKeys.includes(candidate)) {
        continue;
      }
      const value = getFormValue(form, candidate);
      if (value !== '') {
        found[field] = value;
        break;
      }
    }
  }

  return found;
}

/**
 * Merge extraction passes in priority order: the first non-empty value of each field wins.
 */
export function mergeFields(...passes: PartialMessageFields[]): PartialMessageFields {
  const merged: PartialMessageFields = {};

  for (const field of MESSAGE_FIELDS) {
    for (const pass of passes) {
      const value = pass[field];
      if (value) {
        merged[field] = value;
        break;
      }
    }
  }

  return merged;
}

export function missingFields(fields: PartialMessageFields): MessageField[] {
  return MESSAGE_FIELDS.filter((field) => !fields[field]);
}

/**
 * Parse the query string nested in the envelope field, if there is one.
 * A single leading `?` is dropped. `+` stays literal: the outer form
 * decoding already turned encoded spaces into spaces.
 */
export function parseEnvelope(form: FormFields): FormFields | null {
  const raw = getFormValue(form, ENVELOPE_KEY);
  if (raw === '') {
    return null;
  }

  const nested = raw.startsWith('?') ? raw.slice(1) : raw;
  try {
    return parseForm(nested, { plusAsSpace: false });
  } catch (error) {
    if (error instanceof FormParseError) {
      throw new MalformedRequestError('Invalid body parameter', { reason: error.message });
    }
    throw error;
  }
}

/**
 * Two-pass field extraction.
 *
 * The direct pass reads the form's own fields. Only when it leaves a field
 * empty is the envelope parsed; it fills the gaps without overriding any
 * direct value. While the envelope is in use its raw text is never taken
 * as the message body.
 */
export function extractMessageFields(form: FormFields): ExtractionResult {
  const direct = lookupFields(form);
  const directMissing = missingFields(direct);
  if (directMissing.length === 0) {
    return { fields: direct, missing: [], source: 'direct' };
  }

  const envelope = parseEnvelope(form);
  if (!envelope) {
    return { fields: direct, missing: directMissing, source: 'direct' };
  }

  const fields = mergeFields(lookupFields(form, [ENVELOPE_KEY]), lookupFields(envelope));
  return { fields, missing: missingFields(fields), source: 'envelope' };
}

function characterLength(value: string): number {
  return Array.from(value).length;
}

export interface ValidateOptions {
  enforceLimits?: boolean;
}

/**
 * Require every field and, unless disabled, check the column length limits.
 */
export function validateMessageFields(
  fields: PartialMessageFields,
  options: ValidateOptions = {}
): MessageFields {
  const { messageSid, fromNumber, body } = fields;
  if (!messageSid || !fromNumber || !body) {
    throw new ValidationError('Missing required fields', { missingFields: missingFields(fields) });
  }

  const complete: MessageFields = { messageSid, fromNumber, body };

  if (options.enforceLimits ?? true) {
    const exceeded = MESSAGE_FIELDS.filter(
      (field) => characterLength(complete[field]) > FIELD_MAX_LENGTHS[field]
    ).map((field) => ({
      field,
      length: characterLength(complete[field]),
      max: FIELD_MAX_LENGTHS[field],
    }));

    if (exceeded.length > 0) {
      throw new ValidationError('Input length exceeded', { exceeded });
    }
  }

  return complete;
}
