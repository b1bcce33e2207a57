import { parseJstMinute } from '@common/time';
import { InvalidRequestAppError, UnauthorizedRequestAppError } from '../errors';
import { InvoiceCredentials } from '../interfaces/invoice-credentials.interface';
import { InvoiceStatus } from '../interfaces/invoice-status.interface';
import { DEPOSIT_STATUS_CODES } from '../invoice.constants';

/**
 * Inbound notification fields: either raw form params or a parsed body
 */
export type InboundForm = URLSearchParams | Readonly<Record<string, unknown>>;

const DIGITS = /^\d+$/;

function formValue(form: InboundForm, key: string): string {
  if (form instanceof URLSearchParams) {
    return form.get(key) ?? '';
  }

  const value = form[key];
  const first: unknown = Array.isArray(value) ? value[0] : value;
  return typeof first === 'string' ? first : '';
}

function indexedKey(prefix: string, index: number): string {
  return `${prefix}_${index.toString().padStart(4, '0')}`;
}

function parseInteger(raw: string, key: string): number {
  const value = parseInt(raw, 10);
  if (!DIGITS.test(raw) || !Number.isSafeInteger(value)) {
    throw new InvalidRequestAppError(`${key} must be a non-negative integer`);
  }
  return value;
}

function parseStatusAt(form: InboundForm, index: number): InvoiceStatus {
  const idKey = indexedKey('receipt_no', index);
  const id = formValue(form, idKey);
  if (!id) {
    throw new InvalidRequestAppError(`${idKey} is missing`);
  }

  const amountKey = indexedKey('payment', index);
  const amount = parseInteger(formValue(form, amountKey), amountKey);

  const statusKey = indexedKey('status', index);
  const status = DEPOSIT_STATUS_CODES.get(formValue(form, statusKey));
  if (!status) {
    throw new InvalidRequestAppError(`${statusKey} is not a known status`);
  }

  const dateKey = indexedKey('receipt_date', index);
  const updatedAt = parseJstMinute(formValue(form, dateKey));
  if (!updatedAt) {
    throw new InvalidRequestAppError(`${dateKey} must be YYYYMMDDHHMM`);
  }

  return { id, amount, status, updatedAt };
}

/**
 * Parses an inbound status notification. Either every status in the batch
 * parses or the whole batch is rejected.
 */
export function parseInvoiceStatuses(
  form: InboundForm,
  credentials: InvoiceCredentials,
): InvoiceStatus[] {
  if (
    formValue(form, 'login_user_id') !== credentials.loginUserId ||
    formValue(form, 'login_password') !== credentials.loginPassword
  ) {
    throw new UnauthorizedRequestAppError();
  }

  const count = parseInteger(
    formValue(form, 'number_of_notify'),
    'number_of_notify',
  );

  const statuses: InvoiceStatus[] = [];
  for (let index = 0; index < count; index += 1) {
    statuses.push(parseStatusAt(form, index));
  }
  return statuses;
}
