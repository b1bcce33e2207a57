import { formatJstDate } from '@common/time';
import { InvoiceCredentials } from '../interfaces/invoice-credentials.interface';
import { RegistType } from '../invoice.constants';
import {
  applyRules,
  ValidationErrors,
} from '../validation/validation-rules';
import {
  AMOUNT_RULES,
  EXPIRY_RULES,
  NAME_KATAKANA_RULES,
  NAME_RULES,
  PHONE_NUMBER_RULES,
} from './invoice-field.rules';

export interface InvoiceDetails {
  name: string;
  nameKatakana: string;
  phoneNumber: string;
  amount: number;
  expiry: Date;
}

/**
 * Ordered form fields as sent to the invoice API.
 */
export type InvoiceForm = Map<string, string>;

export function credentialsForm(
  credentials: InvoiceCredentials,
  registType: RegistType,
): InvoiceForm {
  return new Map<string, string>([
    ['login_user_id', credentials.loginUserId],
    ['login_password', credentials.loginPassword],
    ['regist_type', registType],
  ]);
}

/**
 * Invoice fields shared by issue and modify requests.
 *
 * Missing values fall back to empty ones, which fail validation.
 */
export abstract class InvoiceParams implements InvoiceDetails {
  public readonly name: string;

  public readonly nameKatakana: string;

  public readonly phoneNumber: string;

  public readonly amount: number;

  public readonly expiry: Date;

  protected constructor(details: Partial<InvoiceDetails>) {
    this.name = details.name ?? '';
    this.nameKatakana = details.nameKatakana ?? '';
    this.phoneNumber = details.phoneNumber ?? '';
    this.amount = details.amount ?? 0;
    this.expiry = details.expiry
      ? new Date(details.expiry.getTime())
      : new Date(Number.NaN);
  }

  public isValid(now: Date = new Date()): boolean {
    return Object.keys(this.errors(now)).length === 0;
  }

  public abstract errors(now?: Date): ValidationErrors;

  public abstract toForm(credentials: InvoiceCredentials): InvoiceForm;

  protected collectDetailErrors(errors: ValidationErrors, now: Date): void {
    applyRules(errors, 'name', this.name, NAME_RULES, now);
    applyRules(errors, 'name_katakana', this.nameKatakana, NAME_KATAKANA_RULES, now);
    applyRules(errors, 'phone_number', this.phoneNumber, PHONE_NUMBER_RULES, now);
    applyRules(errors, 'amount', this.amount, AMOUNT_RULES, now);
    applyRules(errors, 'expiry', this.expiry, EXPIRY_RULES, now);
  }

  protected appendDetails(form: InvoiceForm): InvoiceForm {
    form.set('name', this.name);
    form.set('kana', this.nameKatakana);
    form.set('phone_no', this.phoneNumber);
    form.set('payment', this.amount.toString());
    form.set('date_of_expiry', formatJstDate(this.expiry));
    return form;
  }
}
