import { WebserverModule } from '@infra/webserver/webserver.module';
import { InvoiceModule } from '@modules/invoice/invoice.module';
import { Module } from '@nestjs/common';

@Module({
  imports: [
    // Infra
    WebserverModule,

    // Features
    InvoiceModule,
  ],
})
export class AppModule {}
