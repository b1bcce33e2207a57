import { maskName, maskPhoneNumber } from '@common/utils/data-masker.util';
import { Inject, Injectable, Logger } from '@nestjs/common';
// eslint-disable-next-line import/no-extraneous-dependencies
import { fetch } from 'undici';
import {
  decodeShiftJis,
  encodeForm,
  encodeShiftJis,
} from '../codec/shift-jis.codec';
import {
  InvalidParamsAppError,
  ServerAppError,
  TransportAppError,
} from '../errors';
import { InvoiceClientOptions } from '../interfaces/invoice-credentials.interface';
import {
  FORM_CONTENT_TYPE,
  RegistType,
  TEXT_CONTENT_TYPE,
} from '../invoice.constants';
import { InvoiceConfig } from '../invoice.config';
import { ID_RULES } from '../params/invoice-field.rules';
import { credentialsForm, InvoiceForm } from '../params/invoice-params';
import { IssueInvoiceParams } from '../params/issue-invoice.params';
import { ModifyInvoiceParams } from '../params/modify-invoice.params';
import {
  applyRules,
  ValidationErrors,
} from '../validation/validation-rules';

interface RawResponse {
  status: number;
  bytes: Buffer;
}

function throwIfInvalid(errors: ValidationErrors): void {
  if (Object.keys(errors).length > 0) {
    throw new InvalidParamsAppError(errors);
  }
}

/**
 * Client for the convenience-store invoice API.
 *
 * Every call is a single POST to the configured endpoint: no retries,
 * no timeouts beyond undici's defaults.
 */
@Injectable()
export class InvoiceApiClientService {
  private readonly logger = new Logger(InvoiceApiClientService.name);

  constructor(
    @Inject(InvoiceConfig)
    private readonly options: InvoiceClientOptions,
  ) {}

  /**
   * Issues a new invoice
   * @returns Identifier of the created invoice
   */
  async issueInvoice(params: IssueInvoiceParams): Promise<string> {
    throwIfInvalid(params.errors());

    this.logger.log(
      `Issuing invoice for ${maskName(params.name)} (${maskPhoneNumber(params.phoneNumber)}), ${params.amount} JPY`,
    );

    const id = await this.submit(params.toForm(this.options));
    this.logger.log(`Invoice issued: ${id}`);
    return id;
  }

  /**
   * Replaces the details of an existing invoice
   * @returns Identifier line confirmed by the API
   */
  async modifyInvoice(params: ModifyInvoiceParams): Promise<string> {
    throwIfInvalid(params.errors());

    this.logger.log(`Modifying invoice ${params.id}, ${params.amount} JPY`);

    const confirmed = await this.submit(params.toForm(this.options));
    this.logger.log(`Invoice modified: ${params.id}`);
    return confirmed;
  }

  /**
   * Cancels an existing invoice. Only the identifier is checked locally.
   */
  async cancelInvoice(id: string): Promise<string> {
    const errors: ValidationErrors = {};
    applyRules(errors, 'id', id, ID_RULES, new Date());
    throwIfInvalid(errors);

    this.logger.log(`Canceling invoice ${id}`);

    const form = credentialsForm(this.options, RegistType.Cancel);
    form.set('receipt_no', id);

    const confirmed = await this.submit(form);
    this.logger.log(`Invoice canceled: ${id}`);
    return confirmed;
  }

  /**
   * Confirms receipt of status notifications. The body is the identifiers
   * joined by CRLF, without credentials.
   */
  async acknowledgeStatuses(ids: readonly string[]): Promise<void> {
    const body = encodeShiftJis(ids.join('\r\n'));
    const response = await this.post(body, TEXT_CONTENT_TYPE);

    if (response.status !== 200) {
      const text = decodeShiftJis(response.bytes, { strict: false });
      this.logger.error(
        `Acknowledgement of ${ids.length} status(es) failed with HTTP ${response.status}`,
      );
      throw new ServerAppError(response.status, text);
    }

    this.logger.log(`Acknowledged ${ids.length} invoice status(es)`);
  }

  /**
   * Sends a form request. A 200 with a single-line body carries the result;
   * anything else carries an error message.
   */
  private async submit(form: InvoiceForm): Promise<string> {
    const response = await this.post(encodeForm(form), FORM_CONTENT_TYPE);

    if (response.status !== 200) {
      const text = decodeShiftJis(response.bytes, { strict: false });
      this.logger.error(`Invoice API returned HTTP ${response.status}`);
      throw new ServerAppError(response.status, text);
    }

    const text = decodeShiftJis(response.bytes);
    const lines = text.split('\n');
    if (lines.length === 1) {
      return lines[0];
    }

    this.logger.error(
      `Invoice API rejected ${form.get('regist_type') ?? 'unknown'} request: ${lines.join(' ')}`,
    );
    throw new ServerAppError(response.status, text);
  }

  private async post(
    body: string | Buffer,
    contentType: string,
  ): Promise<RawResponse> {
    const { endpoint } = this.options;

    let response: Awaited<ReturnType<typeof fetch>>;
    try {
      response = await fetch(endpoint, {
        method: 'POST',
        headers: { 'Content-Type': contentType },
        body,
      });
    } catch (error) {
      const errorMessage =
        error instanceof Error ? error.message : String(error);
      this.logger.error(`Invoice API request failed: ${errorMessage}`);
      throw new TransportAppError('Invoice API request failed', error);
    }

    try {
      const bytes = Buffer.from(await response.arrayBuffer());
      return { status: response.status, bytes };
    } catch (error) {
      throw new TransportAppError('Could not read invoice API response', error);
    }
  }
}
