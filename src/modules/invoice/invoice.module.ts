import { Module } from '@nestjs/common';
import { InvoiceNotificationController } from './invoice-notification.controller';
import { InvoiceConfig } from './invoice.config';
import { InvoiceApiClientService } from './services/invoice-api-client.service';
import { InvoiceNotificationService } from './services/invoice-notification.service';

@Module({
  providers: [InvoiceConfig, InvoiceApiClientService, InvoiceNotificationService],
  exports: [InvoiceApiClientService, InvoiceNotificationService],
  controllers: [InvoiceNotificationController],
})
export class InvoiceModule {}
