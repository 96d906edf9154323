import { describe, expect, it } from 'vitest';
import { RecipientError } from '../../src/core/errors.js';
import { normalizePhoneNumber } from '../../src/core/phone.js';

describe('normalizePhoneNumber', () => {
  it('keeps numbers already in E.164 form', () => {
    expect(normalizePhoneNumber('+1234567890')).toBe('+1234567890');
  });

  it('strips spacing and adds the leading +', () => {
    expect(normalizePhoneNumber(' 60 12-345 6789 ')).toBe('+60123456789');
  });

  it('applies the default country code to bare national numbers', () => {
    expect(normalizePhoneNumber('5551234567', { defaultCountryCode: '1' })).toBe('+15551234567');
    expect(normalizePhoneNumber('(555) 123-4567', { defaultCountryCode: '1' })).toBe('+15551234567');
  });

  it('keeps a leading country code instead of doubling it', () => {
    expect(normalizePhoneNumber('15551234567', { defaultCountryCode: '1' })).toBe('+15551234567');
  });

  it('treats 00 as the international prefix', () => {
    expect(normalizePhoneNumber('0066632377765')).toBe('+66632377765');
  });

  it('rejects values that are not phone numbers', () => {
    expect(() => normalizePhoneNumber('abc')).toThrow(RecipientError);
    expect(() => normalizePhoneNumber('12')).toThrow('Invalid phone number: 12');
  });
});
