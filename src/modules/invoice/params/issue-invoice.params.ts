import { InvoiceCredentials } from '../interfaces/invoice-credentials.interface';
import { RegistType } from '../invoice.constants';
import { ValidationErrors } from '../validation/validation-rules';
import {
  credentialsForm,
  InvoiceDetails,
  InvoiceForm,
  InvoiceParams,
} from './invoice-params';

export class IssueInvoiceParams extends InvoiceParams {
  constructor(details: Partial<InvoiceDetails> = {}) {
    super(details);
  }

  public errors(now: Date = new Date()): ValidationErrors {
    const errors: ValidationErrors = {};
    this.collectDetailErrors(errors, now);
    return errors;
  }

  public toForm(credentials: InvoiceCredentials): InvoiceForm {
    return this.appendDetails(credentialsForm(credentials, RegistType.Issue));
  }
}
