import { Inject, Injectable, Logger, OnModuleDestroy } from '@nestjs/common';
import { Observable, Subject } from 'rxjs';
import { InvoiceCredentials } from '../interfaces/invoice-credentials.interface';
import { InvoiceStatus } from '../interfaces/invoice-status.interface';
import { InvoiceConfig } from '../invoice.config';
import {
  InboundForm,
  parseInvoiceStatuses,
} from '../utils/invoice-status.parser';
import { InvoiceApiClientService } from './invoice-api-client.service';

/**
 * Receives status notifications pushed by the invoice API, acknowledges
 * them and then publishes them on `statuses$`. A batch whose
 * acknowledgement fails is not published; the API sends it again.
 */
@Injectable()
export class InvoiceNotificationService implements OnModuleDestroy {
  private readonly logger = new Logger(InvoiceNotificationService.name);

  private readonly statuses = new Subject<InvoiceStatus>();

  public readonly statuses$: Observable<InvoiceStatus> =
    this.statuses.asObservable();

  constructor(
    @Inject(InvoiceConfig)
    private readonly credentials: InvoiceCredentials,
    private readonly apiClient: InvoiceApiClientService,
  ) {}

  async receive(form: InboundForm): Promise<InvoiceStatus[]> {
    const statuses = parseInvoiceStatuses(form, this.credentials);
    if (statuses.length === 0) {
      this.logger.debug('Received an empty status notification');
      return statuses;
    }

    await this.apiClient.acknowledgeStatuses(statuses.map((s) => s.id));

    statuses.forEach((status) => {
      this.logger.log(
        `Invoice ${status.id}: ${status.status}, ${status.amount} JPY at ${status.updatedAt.toISOString()}`,
      );
      this.statuses.next(status);
    });
    return statuses;
  }

  onModuleDestroy(): void {
    this.statuses.complete();
  }
}
