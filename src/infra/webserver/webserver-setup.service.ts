import { Injectable, Logger } from '@nestjs/common';
import { NestExpressApplication } from '@nestjs/platform-express';
import { WebserverConfig } from '@infra/webserver/webserver.config';
import { prettyAppName } from '@common/env';

/** Largest accepted request body; fits a full 10000-status notification */
export const BODY_LIMIT = '2mb';

@Injectable()
export class WebserverSetupService {
  constructor(private readonly config: WebserverConfig) {}

  /**
   * Registers body parsers. The app must be created with
   * `bodyParser: false`: form bodies stay raw bytes, since the invoice API
   * sends them percent-encoded over Shift_JIS and without a parameter cap.
   */
  public configure(app: NestExpressApplication): void {
    app.useBodyParser('json', { limit: BODY_LIMIT });
    app.useBodyParser('raw', {
      type: 'application/x-www-form-urlencoded',
      limit: BODY_LIMIT,
    });
  }

  public async setup(app: NestExpressApplication): Promise<void> {
    this.configure(app);
    await app.listen(this.config.port);

    const msg = `Serving ${prettyAppName()} on ${this.config.publicUrl}`;
    new Logger('Webserver').log(msg);
    new Logger('Webserver').log(
      `Invoice notifications: ${this.config.publicUrl}/api/invoices/notifications`,
    );
  }
}
