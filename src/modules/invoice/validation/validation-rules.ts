import {
  isDate,
  isInt,
  matches,
  max as isAtMost,
  maxDate as isNotAfter,
  maxLength as hasMaxLength,
  min as isAtLeast,
  minLength as hasMinLength,
} from 'class-validator';

/**
 * Field name → violation messages, in rule order. Empty means valid.
 */
export type ValidationErrors = Record<string, string[]>;

/**
 * Returns a violation message, or undefined when the value passes.
 * `now` is the moment the whole object is being validated at.
 */
export type ValidationRule<T> = (value: T, now: Date) => string | undefined;

export const Rule = {
  minLength(n: number): ValidationRule<string> {
    return (value) =>
      hasMinLength(value, n)
        ? undefined
        : `must be at least ${n} characters long`;
  },

  maxLength(n: number): ValidationRule<string> {
    return (value) =>
      hasMaxLength(value, n)
        ? undefined
        : `must be at most ${n} characters long`;
  },

  min(n: number): ValidationRule<number> {
    return (value) => (isAtLeast(value, n) ? undefined : `must be at least ${n}`);
  },

  max(n: number): ValidationRule<number> {
    return (value) => (isAtMost(value, n) ? undefined : `must be at most ${n}`);
  },

  integer(): ValidationRule<number> {
    return (value) => (isInt(value) ? undefined : 'must be an integer');
  },

  format(pattern: RegExp): ValidationRule<string> {
    return (value) => (matches(value, pattern) ? undefined : 'invalid format');
  },

  /**
   * Value must be strictly later than `bound(now)`.
   */
  after(bound: (now: Date) => Date): ValidationRule<Date> {
    return (value, now) => {
      const limit = bound(now);
      return isDate(value) && value.getTime() > limit.getTime()
        ? undefined
        : `must be after ${limit.toISOString()}`;
    };
  },

  /**
   * Value must not be later than `bound(now)`.
   */
  notAfter(bound: (now: Date) => Date): ValidationRule<Date> {
    return (value, now) => {
      const limit = bound(now);
      return isDate(value) && isNotAfter(value, limit)
        ? undefined
        : `must not be after ${limit.toISOString()}`;
    };
  },
} as const;

export function applyRules<T>(
  errors: ValidationErrors,
  field: string,
  value: T,
  rules: readonly ValidationRule<T>[],
  now: Date,
): void {
  rules.forEach((rule) => {
    const message = rule(value, now);
    if (message === undefined) return;

    if (errors[field]) {
      errors[field].push(message);
    } else {
      errors[field] = [message];
    }
  });
}
