import { addDays } from '@common/time';
import { Rule, ValidationRule } from '../validation/validation-rules';

// TODO: confirm the amount ceiling and phone format with the service operator;
// both were carried over from the previous integration.
export const MAX_AMOUNT = 999999;
export const PHONE_NUMBER_FORMAT = /^\d{2,5}-\d{2,5}-\d{3,4}$/;
export const MAX_EXPIRY_DAYS = 60;

export const ID_RULES: readonly ValidationRule<string>[] = [
  Rule.minLength(1),
  Rule.maxLength(18),
];

export const NAME_RULES: readonly ValidationRule<string>[] = [
  Rule.minLength(1),
  Rule.maxLength(40),
];

export const NAME_KATAKANA_RULES: readonly ValidationRule<string>[] = [
  Rule.minLength(1),
  Rule.maxLength(30),
];

export const PHONE_NUMBER_RULES: readonly ValidationRule<string>[] = [
  Rule.minLength(1),
  Rule.maxLength(13),
  Rule.format(PHONE_NUMBER_FORMAT),
];

export const AMOUNT_RULES: readonly ValidationRule<number>[] = [
  Rule.integer(),
  Rule.min(1),
  Rule.max(MAX_AMOUNT),
];

export const EXPIRY_RULES: readonly ValidationRule<Date>[] = [
  Rule.after((now) => now),
  Rule.notAfter((now) => addDays(now, MAX_EXPIRY_DAYS)),
];
