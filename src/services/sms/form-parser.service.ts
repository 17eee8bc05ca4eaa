/**
 * Parsed `application/x-www-form-urlencoded` data: every value of each key, in order.
 */
export type FormFields = Map<string, string[]>;

export class FormParseError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'FormParseError';
  }
}

export interface ParseFormOptions {
  /** Decode `+` as a space. Defaults to true. */
  plusAsSpace?: boolean;
}

function decodeComponent(raw: string, plusAsSpace: boolean): string {
  const text = plusAsSpace ? raw.replace(/\+/g, ' ') : raw;
  try {
    return decodeURIComponent(text);
  } catch {
    throw new FormParseError(`invalid percent-encoding in "${raw}"`);
  }
}

/**
 * Strictly parse a form-encoded string.
 * Unlike URLSearchParams this rejects bad percent-escapes and `;` separators
 * instead of passing them through.
 */
export function parseForm(raw: string, options: ParseFormOptions = {}): FormFields {
  const plusAsSpace = options.plusAsSpace ?? true;
  const fields: FormFields = new Map();

  for (const pair of raw.split('&')) {
    if (pair === '') {
      continue;
    }
    if (pair.includes(';')) {
      throw new FormParseError(`invalid semicolon separator in "${pair}"`);
    }

    const eq = pair.indexOf('=');
    const key = decodeComponent(eq === -1 ? pair : pair.slice(0, eq), plusAsSpace);
    const value = eq === -1 ? '' : decodeComponent(pair.slice(eq + 1), plusAsSpace);

    const values = fields.get(key);
    if (values) {
      values.push(value);
    } else {
      fields.set(key, [value]);
    }
  }

  return fields;
}

/**
 * First value for `key`, or '' when the key is absent.
 */
export function getFormValue(fields: FormFields, key: string): string {
  return fields.get(key)?.[0] ?? '';
}
