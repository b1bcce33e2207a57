import { DepositStatus } from '../invoice.constants';

export interface InvoiceStatus {
  readonly id: string;
  readonly amount: number;
  readonly status: DepositStatus;
  readonly updatedAt: Date;
}
