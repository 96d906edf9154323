import { RecipientError } from './errors.js';

const E164 = /^\+\d{7,15}$/;

export interface PhoneOptions {
  /** Country code applied when the number carries none, e.g. '1'. */
  defaultCountryCode?: string;
}

/**
 * Normalises a phone number to E.164 (`+<country><number>`).
 *
 * Without a default country code a bare number only gains the leading '+'.
 * With one, a number already starting with that code keeps it
 * ('15551234567' → '+15551234567'); otherwise the code is prefixed.
 */
export const normalizePhoneNumber = (raw: string, opts: PhoneOptions = {}): string => {
  let cleaned = raw.trim().replace(/[\s\-().]/g, '');
  if (cleaned.startsWith('00')) cleaned = `+${cleaned.slice(2)}`;

  if (!cleaned.startsWith('+')) {
    const cc = opts.defaultCountryCode;
    cleaned = !cc || cleaned.startsWith(cc) ? `+${cleaned}` : `+${cc}${cleaned}`;
  }

  if (!E164.test(cleaned)) {
    throw new RecipientError(`Invalid phone number: ${raw}`);
  }
  return cleaned;
};
