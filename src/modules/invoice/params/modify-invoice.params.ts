import { InvoiceCredentials } from '../interfaces/invoice-credentials.interface';
import { RegistType } from '../invoice.constants';
import { applyRules, ValidationErrors } from '../validation/validation-rules';
import { ID_RULES } from './invoice-field.rules';
import {
  credentialsForm,
  InvoiceDetails,
  InvoiceForm,
  InvoiceParams,
} from './invoice-params';

export interface ModifyInvoiceDetails extends InvoiceDetails {
  id: string;
}

export class ModifyInvoiceParams extends InvoiceParams {
  public readonly id: string;

  constructor(details: Partial<ModifyInvoiceDetails> = {}) {
    super(details);
    this.id = details.id ?? '';
  }

  public errors(now: Date = new Date()): ValidationErrors {
    const errors: ValidationErrors = {};
    applyRules(errors, 'id', this.id, ID_RULES, now);
    this.collectDetailErrors(errors, now);
    return errors;
  }

  public toForm(credentials: InvoiceCredentials): InvoiceForm {
    const form = credentialsForm(credentials, RegistType.Modify);
    form.set('receipt_no', this.id);
    return this.appendDetails(form);
  }
}
