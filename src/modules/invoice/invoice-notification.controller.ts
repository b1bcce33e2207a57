import {
  Body,
  Controller,
  HttpCode,
  HttpStatus,
  Logger,
  Post,
} from '@nestjs/common';
import { decodeForm } from './codec/shift-jis.codec';
import { InvalidRequestAppError } from './errors';
import { InvoiceNotificationService } from './services/invoice-notification.service';

@Controller('api/invoices')
export class InvoiceNotificationController {
  private readonly logger = new Logger(InvoiceNotificationController.name);

  constructor(
    private readonly notificationService: InvoiceNotificationService,
  ) {}

  /**
   * Webhook for deposit status notifications. The body arrives as raw bytes:
   * a form percent-encoded over Shift_JIS.
   */
  @Post('notifications')
  @HttpCode(HttpStatus.OK)
  async handleNotification(@Body() body: unknown): Promise<void> {
    if (!Buffer.isBuffer(body)) {
      throw new InvalidRequestAppError('body is not form-encoded');
    }

    const form = decodeForm(body.toString('latin1'));
    const statuses = await this.notificationService.receive(form);
    this.logger.debug(`Processed ${statuses.length} invoice status(es)`);
  }
}
